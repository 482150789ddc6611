/**
 * Open-Meteo Snow Source
 * Fetches hourly snow depth for a coordinate from the Open-Meteo historical archive.
 * The archive works in whole days and lags real time by about five days.
 */

import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { toIsoDay } from '../utils/time';
import { empty, fatal, success } from '../types/outcome';
import type { FetchOutcome } from '../types/outcome';
import type { TimeWindow } from '../types/observation';
import type { Coordinates } from '../types/station';
import type { SourceFetcher } from './source';
import { SNOW_VARIABLES, snowVariable } from './element-names';
import type { SnowVariable } from './element-names';
import { HourlyRowBuilder } from './hourly-rows';
import {
    DEFAULT_TIMEOUT_MS,
    acceptAnyStatus,
    classifyFailedResponse,
    classifyRequestError,
    createHttpClient,
    isSuccessStatus,
} from './http';

export const OPEN_METEO_ARCHIVE_URL = 'https://archive-api.open-meteo.com';

const hourlySchema = z.object({
    hourly: z.object({ time: z.array(z.string()) }).passthrough(),
});

const seriesSchema = z.array(z.number().nullable());

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Open-Meteo returns "2024-01-01T00:00" for timezone=UTC; read it as UTC
 */
export function parseArchiveTime(value: string): number {
    return Date.parse(ZONE_SUFFIX.test(value) ? value : `${value}Z`);
}

function roundValue(value: number): number {
    return Math.round(value * 1e6) / 1e6;
}

export interface OpenMeteoSnowSourceOptions {
    baseUrl?: string;
    timeoutMs?: number;
    variables?: Readonly<Record<string, SnowVariable>>;
    http?: AxiosInstance;
}

export class OpenMeteoSnowSource implements SourceFetcher<Coordinates> {
    readonly name = 'open-meteo';

    private readonly http: AxiosInstance;
    private readonly baseUrl: string;
    private readonly variables: Readonly<Record<string, SnowVariable>>;

    constructor(options: OpenMeteoSnowSourceOptions = {}) {
        this.http = options.http ?? createHttpClient(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
        this.baseUrl = (options.baseUrl ?? OPEN_METEO_ARCHIVE_URL).replace(/\/+$/, '');
        this.variables = options.variables ?? SNOW_VARIABLES;
    }

    async fetch(location: Coordinates, window: TimeWindow, hourly: readonly string[]): Promise<FetchOutcome> {
        // end_date is inclusive; the window end is not
        const lastInstant = new Date(window.end.getTime() - 1);

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.get<unknown>(`${this.baseUrl}/v1/archive`, {
                params: {
                    latitude: String(location.lat),
                    longitude: String(location.lon),
                    start_date: toIsoDay(window.start),
                    end_date: toIsoDay(lastInstant),
                    hourly: hourly.join(','),
                    timezone: 'UTC',
                },
                validateStatus: acceptAnyStatus,
            });
        } catch (error) {
            return classifyRequestError(error);
        }

        if (!isSuccessStatus(response.status)) {
            return classifyFailedResponse(response.status, response.data);
        }

        return this.parseHourly(response.data, window, hourly);
    }

    private parseHourly(body: unknown, window: TimeWindow, hourly: readonly string[]): FetchOutcome {
        const parsed = hourlySchema.safeParse(body);
        if (!parsed.success) {
            return fatal('unparseable Open-Meteo response: missing hourly.time', 'parse-error');
        }

        const series = parsed.data.hourly;
        const startMs = window.start.getTime();
        const endMs = window.end.getTime();
        const rows = new HourlyRowBuilder();

        for (const variable of hourly) {
            const values = seriesSchema.safeParse(series[variable]);
            if (!values.success) {
                return fatal(`unparseable Open-Meteo response: hourly.${variable} is not a numeric series`, 'parse-error');
            }

            const { column, scale } = snowVariable(variable, this.variables);
            series.time.forEach((time, i) => {
                const value = values.data[i];
                const timeMs = parseArchiveTime(time);
                if (value === null || value === undefined || isNaN(timeMs)) return;
                if (timeMs < startMs || timeMs >= endMs) return;
                rows.set(timeMs, column, roundValue(value * scale));
            });
        }

        if (rows.size === 0) {
            return empty();
        }
        return success(rows.build());
    }
}
