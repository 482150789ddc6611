/**
 * Check command: which configured stations offer the elements worth harvesting
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import {
  DEFAULT_ELIGIBILITY_RULES,
  createLogger,
  evaluateEligibility,
  sleep,
} from '@station-harvest/shared';
import type { EligibilityResult, EligibilityRules, Logger, Sleep, Station } from '@station-harvest/shared';

export const ELIGIBILITY_FILE = 'station_eligibility.csv';

// Frost allows a handful of requests per second
export const CHECK_PACING_MS = 300;

export interface ElementCatalog {
  listAvailableElements(stationId: string): Promise<string[] | null>;
}

export interface StationCheck {
  station: Station;
  result: EligibilityResult | null;   // null when the lookup failed
}

export interface CheckOptions {
  rules?: EligibilityRules;
  pacingMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export async function checkStations(
  catalog: ElementCatalog,
  stations: readonly Station[],
  options: CheckOptions = {}
): Promise<StationCheck[]> {
  const logger = options.logger ?? createLogger('StationCheck');
  const pause = options.sleep ?? sleep;
  const rules = options.rules ?? DEFAULT_ELIGIBILITY_RULES;
  const checks: StationCheck[] = [];

  for (const [index, station] of stations.entries()) {
    if (index > 0) {
      await pause(options.pacingMs ?? CHECK_PACING_MS);
    }

    const available = await catalog.listAvailableElements(station.id);
    if (available === null) {
      logger.warn(`${station.name} (${station.id}): time series lookup failed`);
      checks.push({ station, result: null });
      continue;
    }

    const result = evaluateEligibility(available, rules);
    logger.info(
      `${station.name} (${station.id}): ${result.eligible ? `eligible, ${result.reasons.join(' + ')}` : 'not eligible'}`,
      { matched: result.matchedCore.length }
    );
    checks.push({ station, result });
  }

  return checks;
}

export function formatEligibilityReport(checks: readonly StationCheck[]): string {
  const lines = ['name,id,latitude,longitude,eligible,match_count,matched_core,matched_radiation,reasons'];

  for (const { station, result } of checks) {
    lines.push([
      station.name,
      station.id,
      station.lat ?? '',
      station.lon ?? '',
      result === null ? 'unknown' : String(result.eligible),
      result?.matchedCore.length ?? '',
      result?.matchedCore.join(' ') ?? '',
      result?.matchedRadiation.join(' ') ?? '',
      result?.reasons.join(' + ') ?? '',
    ].map(cell => {
      const text = String(cell);
      return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
    }).join(','));
  }

  return `${lines.join('\n')}\n`;
}

export async function writeEligibilityReport(dir: string, checks: readonly StationCheck[]): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, ELIGIBILITY_FILE);
  await writeFile(filePath, formatEligibilityReport(checks), 'utf8');
  return filePath;
}
