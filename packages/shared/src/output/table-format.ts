/**
 * Output formatting: delimited station tables and the run summary
 */

import type { OutputFormat } from '../config';
import { flattenRecord } from '../harvest/reconcile';
import type { RunResult } from '../harvest/station-runner';
import type { MergedRecord } from '../types/observation';
import { canonicalElementName, snowVariable } from '../weather/element-names';
import type { SnowVariable } from '../weather/element-names';
import { describeWindow, formatTableTimestamp, toIsoSeconds } from '../utils/time';

export const TIMESTAMP_COLUMN = 'timestamp';

const DELIMITERS: Readonly<Record<OutputFormat, string>> = {
  csv: ',',
  tsv: '\t',
};

export function delimiterFor(format: OutputFormat): string {
  return DELIMITERS[format];
}

/**
 * Value columns in output order: primary elements as configured, then any
 * secondary column not already produced by the primary source
 */
export function outputColumns(
  elements: readonly string[],
  elementNames: Readonly<Record<string, string>>,
  snowHourly: readonly string[] = [],
  snowVariables: Readonly<Record<string, SnowVariable>> = {}
): string[] {
  const columns: string[] = [];
  const add = (column: string) => {
    if (!columns.includes(column)) columns.push(column);
  };

  for (const element of elements) add(canonicalElementName(element, elementNames));
  for (const variable of snowHourly) add(snowVariable(variable, snowVariables).column);
  return columns;
}

function escapeCell(value: string, delimiter: string): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Header line plus one line per record, newline terminated.
 * A value the record does not carry is an empty cell.
 */
export function toDelimited(records: readonly MergedRecord[], columns: readonly string[], delimiter: string): string {
  const lines = [[TIMESTAMP_COLUMN, ...columns].map(c => escapeCell(c, delimiter)).join(delimiter)];

  for (const record of records) {
    const values = flattenRecord(record);
    const cells = columns.map(column => {
      const value = values[column];
      return value === undefined ? '' : String(value);
    });
    lines.push([formatTableTimestamp(record.time), ...cells].join(delimiter));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * "SURNADAL - SYLTE" -> "surnadal___sylte_hourly_data.csv"
 */
export function stationFileName(stationName: string, format: OutputFormat): string {
  const safeName = stationName
    .trim()
    .toLowerCase()
    .replace(/[\s-]/g, '_')
    .replace(/[\\/:*?"<>|]/g, '');
  return `${safeName}_hourly_data.${format}`;
}

function formatElapsed(ms: number): string {
  const seconds = Math.round(ms / 100) / 10;
  if (seconds < 60) return `${seconds.toFixed(1)} s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes} min ${Math.round(seconds - minutes * 60)} s`;
}

export interface SummaryInput {
  result: RunResult;
  start: Date;
  end: Date;
  files: readonly string[];
  elapsedMs: number;
}

export function formatRunSummary({ result, start, end, files, elapsedMs }: SummaryInput): string {
  const { counters } = result;
  const lines = [
    `Harvest run ${result.runId}`,
    `Range: ${toIsoSeconds(start)} to ${toIsoSeconds(end)}`,
    `Elapsed: ${formatElapsed(elapsedMs)}`,
    '',
    `Stations: ${counters.stationsSucceeded} succeeded, ${counters.stationsFailed} failed`,
    `Total rows: ${counters.totalRows}`,
    `Window failures: ${counters.windowFailures}`,
    '',
  ];

  for (const report of result.reports) {
    const label = `${report.station.name} (${report.station.id})`;
    const failedWindows = `${report.windowFailures.length} failed windows`;
    lines.push(
      report.status === 'failed'
        ? `${label}: failed, ${report.error ?? 'unknown error'}, ${failedWindows}`
        : `${label}: ${report.rows} rows, ${failedWindows}, secondary ${report.secondaryStatus}`
    );
    for (const failure of report.windowFailures) {
      lines.push(`  failed window ${describeWindow(failure.window)}: ${failure.reason} (${failure.cause})`);
    }
    for (const failure of report.secondaryFailures) {
      lines.push(`  failed secondary window ${describeWindow(failure.window)}: ${failure.reason} (${failure.cause})`);
    }
  }

  lines.push('', 'Files:');
  if (files.length === 0) {
    lines.push('  (none)');
  }
  for (const file of files) {
    lines.push(`  ${file}`);
  }

  return `${lines.join('\n')}\n`;
}
