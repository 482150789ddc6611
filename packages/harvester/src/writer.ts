/**
 * Output writer: one delimited file per harvested station plus the run summary
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import {
  delimiterFor,
  stationFileName,
  toDelimited,
} from '@station-harvest/shared';
import type { OutputFormat, StationResult } from '@station-harvest/shared';

export const RUN_SUMMARY_FILE = 'run_summary.txt';

export interface WriteOptions {
  dir: string;
  format: OutputFormat;
  columns: readonly string[];
}

/**
 * Write one station's merged table, replacing any earlier file of the same name.
 * Returns the path written.
 */
export async function writeStationTable(station: StationResult, options: WriteOptions): Promise<string> {
  await mkdir(options.dir, { recursive: true });

  const filePath = path.join(options.dir, stationFileName(station.station.name, options.format));
  await writeFile(filePath, toDelimited(station.records, options.columns, delimiterFor(options.format)), 'utf8');
  return filePath;
}

export async function writeRunSummary(dir: string, summary: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, RUN_SUMMARY_FILE);
  await writeFile(filePath, summary, 'utf8');
  return filePath;
}
