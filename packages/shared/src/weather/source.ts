/**
 * Weather Source contract
 * A source performs exactly one upstream request per fetch and never retries or sleeps.
 */

import type { FetchOutcome } from '../types/outcome';
import type { TimeWindow } from '../types/observation';

export interface SourceFetcher<TRef> {
    readonly name: string;
    fetch(ref: TRef, window: TimeWindow, elements: readonly string[]): Promise<FetchOutcome>;
}
