/**
 * Batch Downloader
 * Walks one station's range window by window and assembles a single table.
 *
 * A failed window costs the table those hours and nothing more; the download
 * always moves on to the next window.
 */

import { createLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import type { Sleep } from '../utils/sleep';
import { DAY_MS, bisectWindow, chunkRange, describeWindow, getTimeWindowDuration } from '../utils/time';
import type { FatalCause } from '../types/outcome';
import type { ObservationRow, StationTable, TimeWindow } from '../types/observation';
import type { SourceFetcher } from '../weather/source';
import { fetchWithRetry } from './retry';

export interface DownloadOptions {
  maxSpanDays: number;
  pacingMs: number;          // wait between consecutive window requests
  maxAttempts: number;
  backoffMs: number;
  narrowOnTooLarge?: boolean;
  sleep?: Sleep;
  logger?: Logger;
}

export interface WindowFailure {
  window: TimeWindow;
  reason: string;
  cause: FatalCause;
}

export interface StationDownload {
  table: StationTable;
  windowsRequested: number;
  windowsWithData: number;
  windowsEmpty: number;
  failures: WindowFailure[];
  yieldedNothing: boolean;   // no window came back as success or empty
}

/**
 * Dedupe by timestamp (first occurrence wins) and sort ascending
 */
export function assembleTable(rows: readonly ObservationRow[]): ObservationRow[] {
  const seen = new Set<number>();
  const unique: ObservationRow[] = [];

  for (const row of rows) {
    const time = row.time.getTime();
    if (seen.has(time)) continue;
    seen.add(time);
    unique.push(row);
  }

  return unique.sort((a, b) => a.time.getTime() - b.time.getTime());
}

/**
 * Download [start, end) for one station reference.
 * Throws InvalidRangeError for a malformed range; every other failure is recorded per window.
 */
export async function downloadStation<TRef>(
  source: SourceFetcher<TRef>,
  ref: TRef,
  start: Date,
  end: Date,
  elements: readonly string[],
  options: DownloadOptions
): Promise<StationDownload> {
  const windows = chunkRange(start, end, options.maxSpanDays)[Symbol.iterator]();
  const pause = options.sleep ?? sleep;
  const logger = options.logger ?? createLogger('BatchDownloader');
  const narrow = options.narrowOnTooLarge ?? true;

  // Halves of narrowed windows go ahead of the remaining chunks
  const pending: TimeWindow[] = [];
  const nextWindow = (): TimeWindow | undefined => {
    const split = pending.shift();
    if (split) return split;
    const next = windows.next();
    return next.done ? undefined : next.value;
  };

  const accumulated: ObservationRow[] = [];
  const failures: WindowFailure[] = [];
  let windowsRequested = 0;
  let windowsWithData = 0;
  let windowsEmpty = 0;

  for (let window = nextWindow(); window; window = nextWindow()) {
    if (windowsRequested > 0) {
      await pause(options.pacingMs);
    }
    windowsRequested++;

    const outcome = await fetchWithRetry(source, ref, window, elements, {
      maxAttempts: options.maxAttempts,
      backoffMs: options.backoffMs,
      sleep: pause,
      logger,
    });

    switch (outcome.kind) {
      case 'success':
        windowsWithData++;
        for (const row of outcome.rows) {
          accumulated.push(row);
        }
        logger.info(`Window ${describeWindow(window)}: ${outcome.rows.length} rows`, { source: source.name });
        break;

      case 'empty':
        windowsEmpty++;
        logger.info(`Window ${describeWindow(window)}: no data`, { source: source.name });
        break;

      case 'fatal': {
        const halves = narrow && outcome.cause === 'window-too-large' && getTimeWindowDuration(window) > DAY_MS
          ? bisectWindow(window)
          : null;
        if (halves) {
          logger.warn(`Window ${describeWindow(window)} too large, splitting in two`, { source: source.name });
          pending.unshift(...halves);
          break;
        }

        failures.push({ window, reason: outcome.reason, cause: outcome.cause });
        logger.warn(`Window ${describeWindow(window)} failed: ${outcome.reason}`, { source: source.name });
        break;
      }
    }
  }

  const table = assembleTable(accumulated);
  return {
    table,
    windowsRequested,
    windowsWithData,
    windowsEmpty,
    failures,
    yieldedNothing: windowsWithData + windowsEmpty === 0,
  };
}
