/**
 * Reconciler
 * Left join of the primary table with the secondary table on exact timestamp.
 * The primary table decides which hours exist.
 */

import type { ElementValues, MergedRecord, StationTable } from '../types/observation';

export function mergeTables(primary: StationTable, secondary: StationTable): MergedRecord[] {
  if (primary.length === 0) return [];

  const secondaryByTime = new Map<number, Readonly<ElementValues>>();
  for (const row of secondary) {
    const time = row.time.getTime();
    if (!secondaryByTime.has(time)) {
      secondaryByTime.set(time, row.values);
    }
  }

  return primary.map(row => ({
    time: row.time,
    primary: row.values,
    secondary: secondaryByTime.get(row.time.getTime()) ?? null,
  }));
}

/**
 * Single value map for output; primary values win on a name clash
 */
export function flattenRecord(record: MergedRecord): ElementValues {
  return { ...(record.secondary ?? {}), ...record.primary };
}
