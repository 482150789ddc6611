/**
 * Stations file
 *
 * {
 *   "stations": [
 *     { "name": "Vigra", "id": "SN60990", "lat": 62.56, "lon": 6.10 }
 *   ]
 * }
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from '../config';
import type { Station } from '../types/station';

const stationSchema = z.object({
  name: z.string().trim().min(1),
  id: z.string().trim().min(1),
  lat: z.number().min(-90).max(90).optional(),
  lon: z.number().min(-180).max(180).optional(),
});

const stationsFileSchema = z.object({
  stations: z.array(stationSchema).min(1, 'at least one station is required'),
});

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate parsed JSON. Names become file names, so they must be unique
 * once lowercased.
 */
export function parseStations(json: unknown): Station[] {
  const parsed = stationsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError('Invalid stations file', parsed.error.issues.map(describeIssue));
  }

  const stations = parsed.data.stations;
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const station of stations) {
    const key = station.name.toLowerCase();
    if (seen.has(key)) duplicates.push(`duplicate station name "${station.name}"`);
    seen.add(key);
  }
  if (duplicates.length > 0) {
    throw new ConfigError('Invalid stations file', duplicates);
  }

  return stations;
}

export function loadStations(filePath: string): Station[] {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read stations file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Stations file ${filePath} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parseStations(json);
}
