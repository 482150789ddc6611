/**
 * Frost Source
 * Fetches hourly station observations from the MET Norway Frost API
 *
 * Endpoints:
 * - GET /observations/v0.jsonld                     - observations for a station and interval
 * - GET /observations/availableTimeSeries/v0.jsonld - element ids a station has recorded
 */

import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { toIsoSeconds } from '../utils/time';
import { empty, fatal, success } from '../types/outcome';
import type { FetchOutcome } from '../types/outcome';
import type { TimeWindow } from '../types/observation';
import type { SourceFetcher } from './source';
import { FROST_ELEMENT_NAMES, canonicalElementName } from './element-names';
import { HourlyRowBuilder } from './hourly-rows';
import {
    DEFAULT_TIMEOUT_MS,
    acceptAnyStatus,
    bodyExcerpt,
    classifyFailedResponse,
    classifyRequestError,
    createHttpClient,
    isSuccessStatus,
} from './http';

export const FROST_BASE_URL = 'https://frost.met.no';

// Frost answers 404 with this reason when the interval holds no observations
const NO_DATA_PATTERN = /no data found/i;

const frostObservationSchema = z.object({
    elementId: z.string(),
    value: z.number().nullable().optional(),
});

const frostResponseSchema = z.object({
    data: z.array(z.object({
        referenceTime: z.string(),
        observations: z.array(frostObservationSchema).default([]),
    })).optional(),
});

const frostTimeSeriesSchema = z.object({
    data: z.array(z.object({ elementId: z.string() })).default([]),
});

export interface FrostSourceOptions {
    clientId: string;
    baseUrl?: string;
    timeoutMs?: number;
    levels?: string;
    elementNames?: Readonly<Record<string, string>>;
    http?: AxiosInstance;
    logger?: Logger;
}

export class FrostSource implements SourceFetcher<string> {
    readonly name = 'frost';

    private readonly http: AxiosInstance;
    private readonly baseUrl: string;
    private readonly auth: { username: string; password: string };
    private readonly levels?: string;
    private readonly elementNames: Readonly<Record<string, string>>;
    private readonly logger: Logger;

    constructor(options: FrostSourceOptions) {
        this.http = options.http ?? createHttpClient(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
        this.baseUrl = (options.baseUrl ?? FROST_BASE_URL).replace(/\/+$/, '');
        // Client id as the basic-auth username, empty password
        this.auth = { username: options.clientId, password: '' };
        this.levels = options.levels;
        this.elementNames = options.elementNames ?? FROST_ELEMENT_NAMES;
        this.logger = options.logger ?? createLogger('FrostSource');
    }

    async fetch(stationId: string, window: TimeWindow, elements: readonly string[]): Promise<FetchOutcome> {
        const params: Record<string, string> = {
            sources: stationId,
            elements: elements.join(','),
            referencetime: `${toIsoSeconds(window.start)}/${toIsoSeconds(window.end)}`,
            timeresolutions: 'PT1H',
        };
        if (this.levels) {
            params.levels = this.levels;
        }

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.get<unknown>(`${this.baseUrl}/observations/v0.jsonld`, {
                params,
                auth: this.auth,
                validateStatus: acceptAnyStatus,
            });
        } catch (error) {
            return classifyRequestError(error);
        }

        if (response.status === 404 && NO_DATA_PATTERN.test(bodyExcerpt(response.data))) {
            return empty();
        }
        if (!isSuccessStatus(response.status)) {
            return classifyFailedResponse(response.status, response.data);
        }

        return this.parseObservations(response.data, window);
    }

    /**
     * Element ids a station has time series for, or null if the lookup failed
     */
    async listAvailableElements(stationId: string): Promise<string[] | null> {
        try {
            const response = await this.http.get<unknown>(`${this.baseUrl}/observations/availableTimeSeries/v0.jsonld`, {
                params: { sources: stationId },
                auth: this.auth,
                validateStatus: acceptAnyStatus,
            });

            if (!isSuccessStatus(response.status)) {
                this.logger.warn('Available time series lookup failed', {
                    station: stationId,
                    status: response.status,
                    body: bodyExcerpt(response.data),
                });
                return null;
            }

            const parsed = frostTimeSeriesSchema.safeParse(response.data);
            if (!parsed.success) {
                this.logger.warn('Unparseable time series response', { station: stationId });
                return null;
            }

            return [...new Set(parsed.data.data.map(series => series.elementId))];
        } catch (error) {
            this.logger.error('Available time series lookup failed', { station: stationId, error });
            return null;
        }
    }

    private parseObservations(body: unknown, window: TimeWindow): FetchOutcome {
        const parsed = frostResponseSchema.safeParse(body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            return fatal(`unparseable Frost response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown shape'}`, 'parse-error');
        }

        const startMs = window.start.getTime();
        const endMs = window.end.getTime();
        const rows = new HourlyRowBuilder();

        for (const item of parsed.data.data ?? []) {
            const timeMs = Date.parse(item.referenceTime);
            if (isNaN(timeMs)) {
                this.logger.debug('Skipping observation with invalid referenceTime', { referenceTime: item.referenceTime });
                continue;
            }
            if (timeMs < startMs || timeMs >= endMs) continue;

            rows.touch(timeMs);
            for (const observation of item.observations) {
                if (typeof observation.value !== 'number' || !Number.isFinite(observation.value)) continue;
                rows.set(timeMs, canonicalElementName(observation.elementId, this.elementNames), observation.value);
            }
        }

        if (rows.size === 0) {
            return empty();
        }
        return success(rows.build());
    }
}
