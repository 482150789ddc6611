/**
 * Harvest Configuration
 *
 * Built once from the environment and passed down explicitly. Nothing here
 * reads process.env at import time.
 */

import { FROST_BASE_URL } from './weather/frost-source';
import { OPEN_METEO_ARCHIVE_URL } from './weather/snow-source';
import { DEFAULT_SNOW_HOURLY, FROST_ELEMENT_NAMES, FROST_HOURLY_ELEMENTS } from './weather/element-names';
import { DEFAULT_TIMEOUT_MS } from './weather/http';
import { DAY_MS } from './utils/time';
import type { HarvestPlan } from './harvest/station-runner';
import type { Station } from './types/station';

export type OutputFormat = 'csv' | 'tsv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'tsv'];

export type Env = Readonly<Record<string, string | undefined>>;

export interface HarvestConfig {
  frost: {
    clientId: string;
    baseUrl: string;
    levels: string;
    elementNames: Readonly<Record<string, string>>;
  };

  // Open-Meteo archive, used for snow depth only
  snow: {
    enabled: boolean;
    baseUrl: string;
    variables: string[];
    maxSpanDays: number;
  };

  harvest: {
    stationsFile: string;
    start: Date;
    end: Date;
    elements: string[];
    maxSpanDays: number;
    pacingMs: number;
    stationPacingMs: number;
    maxAttempts: number;
    backoffMs: number;
    narrowOnTooLarge: boolean;
  };

  http: {
    timeoutMs: number;
  };

  output: {
    dir: string;
    format: OutputFormat;
  };
}

export class ConfigError extends Error {
  constructor(message: string, public readonly problems: string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

const BOOLEAN_VALUES: Readonly<Record<string, boolean>> = {
  true: true,
  '1': true,
  yes: true,
  false: false,
  '0': false,
  no: false,
};

function raw(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function numberFromEnv(env: Env, key: string, fallback: number): number {
  const value = raw(env, key);
  return value === undefined ? fallback : Number(value);
}

function booleanFromEnv(env: Env, key: string, fallback: boolean): boolean {
  const value = raw(env, key)?.toLowerCase();
  return value === undefined ? fallback : BOOLEAN_VALUES[value] ?? fallback;
}

function listFromEnv(env: Env, key: string, fallback: readonly string[]): string[] {
  const value = raw(env, key);
  if (value === undefined) return [...fallback];
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Default range: end is today (UTC midnight) minus the archive lag unless
 * an explicit end is given, start is a whole number of 365-day years before the end.
 */
export function defaultHarvestRange(
  now: Date,
  endLagDays: number,
  years: number,
  explicitEnd?: Date
): { start: Date; end: Date } {
  const end = explicitEnd && !Number.isNaN(explicitEnd.getTime())
    ? explicitEnd
    : new Date(startOfUtcDay(now).getTime() - endLagDays * DAY_MS);
  const start = new Date(end.getTime() - years * 365 * DAY_MS);
  return { start, end };
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function buildConfig(env: Env = process.env, now: Date = new Date()): HarvestConfig {
  const start = raw(env, 'HARVEST_START');
  const endRaw = raw(env, 'HARVEST_END');
  const end = endRaw === undefined ? undefined : new Date(endRaw);
  const range = defaultHarvestRange(
    now,
    numberFromEnv(env, 'HARVEST_END_LAG_DAYS', 5),
    numberFromEnv(env, 'HARVEST_YEARS', 5),
    end
  );
  const format = raw(env, 'HARVEST_OUTPUT_FORMAT')?.toLowerCase() ?? 'csv';

  return {
    frost: {
      clientId: raw(env, 'FROST_CLIENT_ID') ?? '',
      baseUrl: raw(env, 'FROST_BASE_URL') ?? FROST_BASE_URL,
      levels: raw(env, 'FROST_LEVELS') ?? 'default',
      elementNames: FROST_ELEMENT_NAMES,
    },

    snow: {
      enabled: booleanFromEnv(env, 'SNOW_ENABLED', true),
      baseUrl: raw(env, 'OPEN_METEO_ARCHIVE_URL') ?? OPEN_METEO_ARCHIVE_URL,
      variables: listFromEnv(env, 'SNOW_HOURLY_VARIABLES', DEFAULT_SNOW_HOURLY),
      maxSpanDays: numberFromEnv(env, 'SNOW_MAX_SPAN_DAYS', 365),
    },

    harvest: {
      stationsFile: raw(env, 'HARVEST_STATIONS_FILE') ?? 'config/stations.json',
      start: start === undefined ? range.start : new Date(start),
      end: end ?? range.end,
      elements: listFromEnv(env, 'HARVEST_ELEMENTS', FROST_HOURLY_ELEMENTS),
      maxSpanDays: numberFromEnv(env, 'HARVEST_MAX_SPAN_DAYS', 365),
      pacingMs: numberFromEnv(env, 'HARVEST_PACING_MS', 2000),
      stationPacingMs: numberFromEnv(env, 'HARVEST_STATION_PACING_MS', 1000),
      maxAttempts: numberFromEnv(env, 'HARVEST_MAX_ATTEMPTS', 3),
      backoffMs: numberFromEnv(env, 'HARVEST_BACKOFF_MS', 5000),
      narrowOnTooLarge: booleanFromEnv(env, 'HARVEST_NARROW_ON_TOO_LARGE', true),
    },

    http: {
      timeoutMs: numberFromEnv(env, 'REQUEST_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    },

    output: {
      dir: raw(env, 'HARVEST_OUTPUT_DIR') ?? 'met_norway_data',
      format: isOutputFormat(format) ? format : 'csv',
    },
  };
}

/**
 * Validate the values buildConfig cannot represent once parsed
 */
export function validateEnv(env: Env = process.env): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  const format = raw(env, 'HARVEST_OUTPUT_FORMAT');
  if (format !== undefined && !isOutputFormat(format.toLowerCase())) {
    errors.push(`HARVEST_OUTPUT_FORMAT must be one of ${OUTPUT_FORMATS.join(', ')} (got "${format}")`);
  }

  for (const key of ['SNOW_ENABLED', 'HARVEST_NARROW_ON_TOO_LARGE']) {
    const value = raw(env, key);
    if (value !== undefined && !(value.toLowerCase() in BOOLEAN_VALUES)) {
      errors.push(`${key} must be true or false (got "${value}")`);
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validate a built configuration
 */
export function validateConfig(config: HarvestConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const { harvest } = config;

  if (!config.frost.clientId) errors.push('FROST_CLIENT_ID is required');

  if (Number.isNaN(harvest.start.getTime())) errors.push('HARVEST_START is not a valid date');
  if (Number.isNaN(harvest.end.getTime())) errors.push('HARVEST_END is not a valid date');
  if (harvest.start.getTime() >= harvest.end.getTime()) {
    errors.push('harvest start must be before harvest end');
  }

  if (harvest.elements.length === 0) errors.push('HARVEST_ELEMENTS must name at least one element');

  const atLeastOne: Array<[string, number]> = [
    ['HARVEST_MAX_SPAN_DAYS', harvest.maxSpanDays],
    ['HARVEST_MAX_ATTEMPTS', harvest.maxAttempts],
    ['SNOW_MAX_SPAN_DAYS', config.snow.maxSpanDays],
    ['REQUEST_TIMEOUT_MS', config.http.timeoutMs],
  ];
  for (const [key, value] of atLeastOne) {
    if (!Number.isFinite(value) || value < 1) errors.push(`${key} must be a number of at least 1`);
  }

  const nonNegative: Array<[string, number]> = [
    ['HARVEST_PACING_MS', harvest.pacingMs],
    ['HARVEST_STATION_PACING_MS', harvest.stationPacingMs],
    ['HARVEST_BACKOFF_MS', harvest.backoffMs],
  ];
  for (const [key, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) errors.push(`${key} must be a non-negative number`);
  }

  if (config.snow.enabled && config.snow.variables.length === 0) {
    errors.push('SNOW_HOURLY_VARIABLES must name at least one variable');
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Build and validate in one step; throws ConfigError listing every problem
 */
export function loadConfig(env: Env = process.env, now: Date = new Date()): HarvestConfig {
  const envCheck = validateEnv(env);
  const config = buildConfig(env, now);
  const configCheck = validateConfig(config);
  const errors = [...envCheck.errors, ...configCheck.errors];

  if (errors.length > 0) {
    throw new ConfigError('Invalid configuration', errors);
  }
  return config;
}

export function toHarvestPlan(config: HarvestConfig, stations: readonly Station[]): HarvestPlan {
  const { harvest, snow } = config;
  return {
    stations,
    start: harvest.start,
    end: harvest.end,
    elements: harvest.elements,
    maxSpanDays: harvest.maxSpanDays,
    pacingMs: harvest.pacingMs,
    stationPacingMs: harvest.stationPacingMs,
    maxAttempts: harvest.maxAttempts,
    backoffMs: harvest.backoffMs,
    narrowOnTooLarge: harvest.narrowOnTooLarge,
    secondary: snow.enabled ? { elements: snow.variables, maxSpanDays: snow.maxSpanDays } : undefined,
  };
}
