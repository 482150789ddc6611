/**
 * End-to-End Harvest Scenarios
 * Full runs through the station runner with in-process sources
 */

import { runStations } from '../../harvest/station-runner';
import type { HarvestPlan } from '../../harvest/station-runner';
import { outputColumns, toDelimited } from '../../output/table-format';
import { DAY_MS, HOUR_MS } from '../../utils/time';
import type { Coordinates } from '../../types/station';
import { StubSource, createNoopSleep, createSilentLogger, hourlyRows, rowsForWindow } from '../fixtures';

const START = new Date('2024-01-01T00:00:00Z');
const END = new Date(START.getTime() + 65 * DAY_MS);

function plan(overrides: Partial<HarvestPlan> = {}): HarvestPlan {
  return {
    stations: [{ name: 'A', id: 'SN-A' }, { name: 'B', id: 'SN-B' }],
    start: START,
    end: END,
    elements: ['air_temperature'],
    maxSpanDays: 30,
    pacingMs: 2000,
    stationPacingMs: 1000,
    maxAttempts: 3,
    backoffMs: 5000,
    narrowOnTooLarge: true,
    ...overrides,
  };
}

describe('End-to-End Harvest Scenarios', () => {
  it('should assemble 24 x 65 unique sorted rows from 30, 30 and 5 day windows', async () => {
    const primary = new StubSource<string>(window => ({ kind: 'success', rows: rowsForWindow(window) }));

    const result = await runStations(plan({ stations: [{ name: 'A', id: 'SN-A' }] }), {
      primary,
      sleep: createNoopSleep(),
      logger: createSilentLogger(),
    });

    const records = result.tables.get('A')?.records ?? [];
    expect(primary.calls.map(c => (c.window.end.getTime() - c.window.start.getTime()) / DAY_MS)).toEqual([30, 30, 5]);
    expect(records).toHaveLength(24 * 65);
    expect(records.every((r, i) => i === 0 || r.time.getTime() - records[i - 1].time.getTime() === HOUR_MS)).toBe(true);
    expect(result.counters).toEqual({ stationsSucceeded: 1, stationsFailed: 0, totalRows: 1560, windowFailures: 0 });
  });

  it('should keep a station whose middle window always fails', async () => {
    const secondWindowStart = START.getTime() + 30 * DAY_MS;
    const primary = new StubSource<string>((window, _, ref) => (
      ref === 'SN-B' && window.start.getTime() === secondWindowStart
        ? { kind: 'fatal', reason: 'HTTP 400: bad request', cause: 'http-status' }
        : { kind: 'success', rows: rowsForWindow(window) }
    ));

    const result = await runStations(plan(), {
      primary,
      sleep: createNoopSleep(),
      logger: createSilentLogger(),
    });

    const b = result.tables.get('B');
    const times = (b?.records ?? []).map(r => r.time.getTime());
    expect(times).toHaveLength(24 * 35);
    expect(times.every(t => t < secondWindowStart || t >= secondWindowStart + 30 * DAY_MS)).toBe(true);
    expect(b?.windowFailures).toHaveLength(1);
    expect(result.reports[1]).toMatchObject({ status: 'succeeded', rows: 840 });
    expect(result.reports[1].windowFailures).toEqual(b?.windowFailures);
    expect(result.counters).toEqual({ stationsSucceeded: 2, stationsFailed: 0, totalRows: 2400, windowFailures: 1 });
  });

  it('should left join secondary values and render them', async () => {
    const t1 = '2024-01-01T01:00:00Z';
    const primary = new StubSource<string>(() => ({
      kind: 'success',
      rows: hourlyRows(t1, 3, time => ({ air_temperature_c: time.getUTCHours() })),
    }));
    // T2 and T4
    const secondary = new StubSource<Coordinates>(() => ({
      kind: 'success',
      rows: [
        { time: new Date('2024-01-01T02:00:00Z'), values: { snow_depth_cm: 20 } },
        { time: new Date('2024-01-01T04:00:00Z'), values: { snow_depth_cm: 40 } },
      ],
    }));

    const result = await runStations(plan({
      stations: [{ name: 'Vigra', id: 'SN60990', lat: 62.56, lon: 6.1 }],
      start: new Date('2024-01-01T00:00:00Z'),
      end: new Date('2024-01-01T06:00:00Z'),
      maxSpanDays: 1,
      secondary: { elements: ['snow_depth'], maxSpanDays: 1 },
    }), {
      primary,
      secondary,
      sleep: createNoopSleep(),
      logger: createSilentLogger(),
    });

    const records = result.tables.get('Vigra')?.records ?? [];
    expect(records.map(r => r.secondary)).toEqual([null, { snow_depth_cm: 20 }, null]);
    expect(toDelimited(records, outputColumns(['air_temperature'], { air_temperature: 'air_temperature_c' }, ['snow_depth'], {
      snow_depth: { column: 'snow_depth_cm', scale: 100 },
    }), ',')).toBe(
      'timestamp,air_temperature_c,snow_depth_cm\n' +
      '2024-01-01 01:00:00,1,\n' +
      '2024-01-01 02:00:00,2,20\n' +
      '2024-01-01 03:00:00,3,\n'
    );
  });
});
