/**
 * Time Window Utilities
 */

import type { TimeWindow } from '../types/observation';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Thrown when a requested range or chunk size is malformed
 */
export class InvalidRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

function isValidDate(date: Date): boolean {
  return date instanceof Date && !isNaN(date.getTime());
}

/**
 * Calculate time window duration in milliseconds
 */
export function getTimeWindowDuration(tw: TimeWindow): number {
  return tw.end.getTime() - tw.start.getTime();
}

/**
 * Split [start, end) into contiguous windows of at most maxSpanDays.
 * The returned iterable is lazy and can be iterated more than once.
 */
export function chunkRange(start: Date, end: Date, maxSpanDays: number): Iterable<TimeWindow> {
  if (!Number.isFinite(maxSpanDays) || maxSpanDays < 1) {
    throw new InvalidRangeError(`maxSpanDays must be at least 1, got ${maxSpanDays}`);
  }
  if (!isValidDate(start) || !isValidDate(end)) {
    throw new InvalidRangeError('start and end must be valid dates');
  }
  if (start.getTime() >= end.getTime()) {
    throw new InvalidRangeError(`start ${start.toISOString()} must be before end ${end.toISOString()}`);
  }

  const startMs = start.getTime();
  const endMs = end.getTime();
  const spanMs = maxSpanDays * DAY_MS;

  return {
    *[Symbol.iterator]() {
      for (let cursor = startMs; cursor < endMs; cursor += spanMs) {
        yield { start: new Date(cursor), end: new Date(Math.min(cursor + spanMs, endMs)) };
      }
    },
  };
}

/**
 * Truncate a timestamp (ms) to the start of its UTC hour
 */
export function floorToHour(ms: number): number {
  return Math.floor(ms / HOUR_MS) * HOUR_MS;
}

/**
 * Split a window at an hour-aligned midpoint.
 * Returns null when the window is too short to split.
 */
export function bisectWindow(tw: TimeWindow): [TimeWindow, TimeWindow] | null {
  const startMs = tw.start.getTime();
  const mid = startMs + floorToHour(getTimeWindowDuration(tw) / 2);
  if (mid <= startMs || mid >= tw.end.getTime()) return null;
  return [
    { start: tw.start, end: new Date(mid) },
    { start: new Date(mid), end: tw.end },
  ];
}

/**
 * "2024-03-01T06:00:00Z" (seconds precision, UTC)
 */
export function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * "2024-03-01" (UTC calendar day)
 */
export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * "2024-03-01 06:00:00" (UTC), the timestamp format of output tables
 */
export function formatTableTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function describeWindow(tw: TimeWindow): string {
  return `${toIsoSeconds(tw.start)}/${toIsoSeconds(tw.end)}`;
}
