/**
 * Fetch Outcome Types
 * Result of a single request against an upstream source
 */

import type { ObservationRow } from './observation';

export type FatalCause = 'window-too-large' | 'http-status' | 'parse-error' | 'exhausted-retries';

export type FetchOutcome =
  | { kind: 'success'; rows: ObservationRow[] }
  | { kind: 'empty' }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; reason: string; cause: FatalCause };

// What the retrying fetcher hands back: retryable is resolved internally
export type ResolvedOutcome = Exclude<FetchOutcome, { kind: 'retryable' }>;

export type FatalOutcome = Extract<FetchOutcome, { kind: 'fatal' }>;

export const success = (rows: ObservationRow[]): FetchOutcome => ({ kind: 'success', rows });

export const empty = (): FetchOutcome => ({ kind: 'empty' });

export const retryable = (reason: string): FetchOutcome => ({ kind: 'retryable', reason });

export const fatal = (reason: string, cause: FatalCause): FatalOutcome => ({ kind: 'fatal', reason, cause });
