/**
 * Test fixtures: stub sources, hourly rows and a silent logger
 */

import type { Logger } from '../utils/logger';
import { HOUR_MS } from '../utils/time';
import type { FetchOutcome } from '../types/outcome';
import type { ElementValues, ObservationRow, TimeWindow } from '../types/observation';
import type { SourceFetcher } from '../weather/source';

export interface StubCall<TRef> {
  ref: TRef;
  window: TimeWindow;
  elements: readonly string[];
}

export type StubResponder<TRef> = (window: TimeWindow, callIndex: number, ref: TRef) => FetchOutcome | Promise<FetchOutcome>;

/**
 * Source that answers from a function and records every call
 */
export class StubSource<TRef> implements SourceFetcher<TRef> {
  readonly calls: StubCall<TRef>[] = [];

  constructor(
    private readonly respond: StubResponder<TRef>,
    readonly name: string = 'stub'
  ) {}

  async fetch(ref: TRef, window: TimeWindow, elements: readonly string[]): Promise<FetchOutcome> {
    this.calls.push({ ref, window, elements });
    return this.respond(window, this.calls.length - 1, ref);
  }
}

/**
 * One row per hour in [start, end)
 */
export function rowsForWindow(
  window: TimeWindow,
  values: (time: Date) => ElementValues = () => ({ air_temperature_c: 1 })
): ObservationRow[] {
  const rows: ObservationRow[] = [];
  for (let t = window.start.getTime(); t < window.end.getTime(); t += HOUR_MS) {
    const time = new Date(t);
    rows.push({ time, values: values(time) });
  }
  return rows;
}

export function hourlyRows(startIso: string, hours: number, values?: (time: Date) => ElementValues): ObservationRow[] {
  const start = new Date(startIso);
  return rowsForWindow({ start, end: new Date(start.getTime() + hours * HOUR_MS) }, values);
}

/**
 * Stub answering every window with one row per hour
 */
export function fullCoverageSource<TRef>(values?: (time: Date) => ElementValues): StubSource<TRef> {
  return new StubSource<TRef>(window => ({ kind: 'success', rows: rowsForWindow(window, values) }));
}

export function createSilentLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };
}

export function createNoopSleep(): jest.Mock<Promise<void>, [number]> {
  return jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
}
