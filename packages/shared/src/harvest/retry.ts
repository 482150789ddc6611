/**
 * Retrying Fetcher
 * Bounded retry with a fixed backoff around a single-request source.
 * Retryable outcomes never leave this function.
 */

import { createLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import type { Sleep } from '../utils/sleep';
import { describeWindow } from '../utils/time';
import { fatal } from '../types/outcome';
import type { ResolvedOutcome } from '../types/outcome';
import type { TimeWindow } from '../types/observation';
import type { SourceFetcher } from '../weather/source';

export const EXHAUSTED_RETRIES = 'exhausted retries';

export interface RetryOptions {
  maxAttempts: number;
  backoffMs: number;
  sleep?: Sleep;
  logger?: Logger;
}

export async function fetchWithRetry<TRef>(
  source: SourceFetcher<TRef>,
  ref: TRef,
  window: TimeWindow,
  elements: readonly string[],
  options: RetryOptions
): Promise<ResolvedOutcome> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const pause = options.sleep ?? sleep;
  const logger = options.logger ?? createLogger('Retry');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const outcome = await source.fetch(ref, window, elements);
    if (outcome.kind !== 'retryable') {
      return outcome;
    }

    logger.warn(`Attempt ${attempt}/${maxAttempts} failed: ${outcome.reason}`, {
      source: source.name,
      window: describeWindow(window),
    });

    if (attempt < maxAttempts) {
      await pause(options.backoffMs);
    }
  }

  return fatal(EXHAUSTED_RETRIES, 'exhausted-retries');
}
