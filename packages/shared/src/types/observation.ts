/**
 * Observation Types
 */

// Half-open interval [start, end)
export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
}

// Canonical element name -> value. A missing key means "not measured".
export type ElementValues = Record<string, number>;

export interface ObservationRow {
  readonly time: Date;       // UTC, hour-aligned
  readonly values: Readonly<ElementValues>;
}

// Ascending by time with unique timestamps once assembled
export type StationTable = readonly ObservationRow[];

export interface MergedRecord {
  readonly time: Date;
  readonly primary: Readonly<ElementValues>;
  readonly secondary: Readonly<ElementValues> | null;
}
