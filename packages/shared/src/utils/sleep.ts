/**
 * Timed suspension used for request pacing and retry backoff
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
