/**
 * Station Runner
 * Harvests every configured station in order: primary download, optional
 * secondary download, merge. One station failing never stops the next.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger, withContext } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import type { Sleep } from '../utils/sleep';
import { chunkRange } from '../utils/time';
import { stationCoordinates } from '../types/station';
import type { Coordinates, Station } from '../types/station';
import type { MergedRecord, StationTable } from '../types/observation';
import type { SourceFetcher } from '../weather/source';
import { downloadStation } from './batch-downloader';
import type { DownloadOptions, StationDownload, WindowFailure } from './batch-downloader';
import { mergeTables } from './reconcile';

export interface SecondaryPlan {
  elements: readonly string[];
  maxSpanDays: number;
}

export interface HarvestPlan {
  stations: readonly Station[];
  start: Date;
  end: Date;
  elements: readonly string[];
  maxSpanDays: number;
  pacingMs: number;
  stationPacingMs: number;
  maxAttempts: number;
  backoffMs: number;
  narrowOnTooLarge: boolean;
  secondary?: SecondaryPlan;
}

export type SecondaryStatus = 'merged' | 'unavailable' | 'no-coordinates' | 'disabled';

export interface StationResult {
  station: Station;
  records: MergedRecord[];
  windowFailures: WindowFailure[];
  secondaryStatus: SecondaryStatus;
  secondaryFailures: WindowFailure[];
}

export interface StationReport {
  station: Station;
  status: 'succeeded' | 'failed';
  rows: number;
  windowFailures: WindowFailure[];
  secondaryStatus: SecondaryStatus;
  secondaryFailures: WindowFailure[];
  error?: string;
}

export interface RunCounters {
  stationsSucceeded: number;
  stationsFailed: number;
  totalRows: number;
  windowFailures: number;
}

export interface RunResult {
  runId: string;
  tables: Map<string, StationResult>;   // keyed by station name; failed stations are absent
  reports: StationReport[];             // one per station, in configured order
  counters: RunCounters;
}

export type RunEvent =
  | { type: 'station-started'; station: Station; index: number; total: number }
  | { type: 'station-completed'; report: StationReport }
  | { type: 'station-failed'; report: StationReport }
  | { type: 'run-completed'; runId: string; counters: RunCounters };

export interface StationRunnerDeps {
  primary: SourceFetcher<string>;
  secondary?: SourceFetcher<Coordinates>;
  sleep?: Sleep;
  logger?: Logger;
  runId?: string;
  onEvent?: (event: RunEvent) => void;
  /** Receives each merged station before the next one starts; a rejection fails that station */
  onStationTable?: (station: StationResult) => Promise<void>;
}

interface SecondaryResult {
  table: StationTable;
  status: SecondaryStatus;
  failures: WindowFailure[];
}

function downloadOptions(plan: HarvestPlan, maxSpanDays: number, pause: Sleep, logger: Logger): DownloadOptions {
  return {
    maxSpanDays,
    pacingMs: plan.pacingMs,
    maxAttempts: plan.maxAttempts,
    backoffMs: plan.backoffMs,
    narrowOnTooLarge: plan.narrowOnTooLarge,
    sleep: pause,
    logger,
  };
}

async function downloadSecondary(
  station: Station,
  plan: HarvestPlan,
  deps: StationRunnerDeps,
  pause: Sleep,
  logger: Logger
): Promise<SecondaryResult> {
  if (!deps.secondary || !plan.secondary) {
    return { table: [], status: 'disabled', failures: [] };
  }

  const coordinates = stationCoordinates(station);
  if (!coordinates) {
    logger.warn('No coordinates, secondary values left empty');
    return { table: [], status: 'no-coordinates', failures: [] };
  }

  try {
    await pause(plan.pacingMs);
    const download = await downloadStation(
      deps.secondary,
      coordinates,
      plan.start,
      plan.end,
      plan.secondary.elements,
      downloadOptions(plan, plan.secondary.maxSpanDays, pause, logger)
    );
    const status = download.table.length > 0 ? 'merged' : 'unavailable';
    if (status === 'unavailable') {
      logger.warn('Secondary source returned nothing, secondary values left empty');
    }
    return { table: download.table, status, failures: download.failures };
  } catch (error) {
    logger.error('Secondary download failed, secondary values left empty', { error });
    return { table: [], status: 'unavailable', failures: [] };
  }
}

function describeEmptyPrimary(download: StationDownload): string {
  return download.yieldedNothing ? 'every window failed' : 'no observations in range';
}

/**
 * Fail fast on a malformed range before any station is touched
 */
function assertPlanRanges(plan: HarvestPlan): void {
  chunkRange(plan.start, plan.end, plan.maxSpanDays);
  if (plan.secondary) {
    chunkRange(plan.start, plan.end, plan.secondary.maxSpanDays);
  }
}

export async function runStations(plan: HarvestPlan, deps: StationRunnerDeps): Promise<RunResult> {
  assertPlanRanges(plan);

  const runId = deps.runId ?? uuidv4();
  const pause = deps.sleep ?? sleep;
  const baseLogger = deps.logger ?? createLogger('StationRunner');
  const onEvent = deps.onEvent;

  const tables = new Map<string, StationResult>();
  const reports: StationReport[] = [];
  const counters: RunCounters = { stationsSucceeded: 0, stationsFailed: 0, totalRows: 0, windowFailures: 0 };

  const emit = (event: RunEvent): void => {
    if (!onEvent) return;
    try {
      onEvent(event);
    } catch (error) {
      baseLogger.warn(`Event listener failed on ${event.type}`, { run_id: runId, error });
    }
  };

  const total = plan.stations.length;
  baseLogger.info(`Harvesting ${total} stations`, {
    run_id: runId,
    range: `${plan.start.toISOString()}/${plan.end.toISOString()}`,
  });

  for (const [index, station] of plan.stations.entries()) {
    if (index > 0) {
      await pause(plan.stationPacingMs);
    }

    const logger = withContext(baseLogger, { run_id: runId, station: station.name });
    emit({ type: 'station-started', station, index, total });
    logger.info(`Station ${index + 1}/${total} (${station.id})`);

    let report: StationReport;
    let primaryFailures: WindowFailure[] = [];
    try {
      const primary = await downloadStation(
        deps.primary,
        station.id,
        plan.start,
        plan.end,
        plan.elements,
        downloadOptions(plan, plan.maxSpanDays, pause, logger)
      );
      primaryFailures = primary.failures;
      counters.windowFailures += primary.failures.length;

      if (primary.table.length === 0) {
        report = {
          station,
          status: 'failed',
          rows: 0,
          windowFailures: primary.failures,
          secondaryStatus: 'disabled',
          secondaryFailures: [],
          error: describeEmptyPrimary(primary),
        };
      } else {
        const secondary = await downloadSecondary(station, plan, deps, pause, logger);
        const records = mergeTables(primary.table, secondary.table);

        const harvested: StationResult = {
          station,
          records,
          windowFailures: primary.failures,
          secondaryStatus: secondary.status,
          secondaryFailures: secondary.failures,
        };
        if (deps.onStationTable) {
          await deps.onStationTable(harvested);
        }

        tables.set(station.name, harvested);
        report = {
          station,
          status: 'succeeded',
          rows: records.length,
          windowFailures: primary.failures,
          secondaryStatus: secondary.status,
          secondaryFailures: secondary.failures,
        };
      }
    } catch (error) {
      logger.error('Station harvest failed', { error });
      report = {
        station,
        status: 'failed',
        rows: 0,
        windowFailures: primaryFailures,
        secondaryStatus: 'disabled',
        secondaryFailures: [],
        error: error instanceof Error ? error.message : String(error),
      };
    }

    reports.push(report);
    if (report.status === 'succeeded') {
      counters.stationsSucceeded++;
      counters.totalRows += report.rows;
      logger.info(
        `Done: ${report.rows} rows, ${report.windowFailures.length} failed windows, secondary ${report.secondaryStatus}`
      );
      emit({ type: 'station-completed', report });
    } else {
      counters.stationsFailed++;
      logger.warn(`No data: ${report.error}`);
      emit({ type: 'station-failed', report });
    }
  }

  baseLogger.info(
    `Run complete: ${counters.stationsSucceeded}/${total} stations, ${counters.totalRows} rows`,
    { run_id: runId }
  );
  emit({ type: 'run-completed', runId, counters });

  return { runId, tables, reports, counters };
}
