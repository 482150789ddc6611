/**
 * Frost Source Unit Tests
 */

import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosInstance } from 'axios';
import { FrostSource } from './frost-source';
import type { TimeWindow } from '../types/observation';

const silentLogger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
};

function createSource() {
    const get = jest.fn();
    const http = { get } as unknown as AxiosInstance;
    const source = new FrostSource({
        clientId: 'test-client-id',
        baseUrl: 'https://frost.example.test/',
        levels: 'default',
        http,
        logger: silentLogger,
    });
    return { source, get };
}

const window: TimeWindow = {
    start: new Date('2024-01-01T00:00:00Z'),
    end: new Date('2024-01-02T00:00:00Z'),
};

function badGatewayError(): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError('Request failed with status code 502', 'ERR_BAD_RESPONSE', config, undefined, {
        status: 502,
        statusText: 'Bad Gateway',
        data: '<html>Bad Gateway</html>',
        headers: {},
        config,
    });
}

const ELEMENTS = ['mean(surface_downwelling_shortwave_flux_in_air PT1H)', 'air_temperature'];

describe('FrostSource', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('request', () => {
        it('should send station, elements, interval and hourly resolution with basic auth', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({ status: 200, data: { data: [] } });

            await source.fetch('SN60990', window, ELEMENTS);

            expect(get).toHaveBeenCalledTimes(1);
            const [url, config] = get.mock.calls[0];
            expect(url).toBe('https://frost.example.test/observations/v0.jsonld');
            expect(config.params).toEqual({
                sources: 'SN60990',
                elements: 'mean(surface_downwelling_shortwave_flux_in_air PT1H),air_temperature',
                referencetime: '2024-01-01T00:00:00Z/2024-01-02T00:00:00Z',
                timeresolutions: 'PT1H',
                levels: 'default',
            });
            expect(config.auth).toEqual({ username: 'test-client-id', password: '' });
            expect(config.validateStatus(500)).toBe(true);
        });
    });

    describe('success', () => {
        it('should normalize observations to rows with canonical names', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({
                status: 200,
                data: {
                    data: [
                        {
                            referenceTime: '2024-01-01T01:00:00.000Z',
                            observations: [
                                { elementId: 'mean(surface_downwelling_shortwave_flux_in_air PT1H)', value: 12.5 },
                                { elementId: 'air_temperature', value: -3.2 },
                            ],
                        },
                        {
                            referenceTime: '2024-01-01T00:00:00.000Z',
                            observations: [{ elementId: 'air_temperature', value: -2.9 }],
                        },
                    ],
                },
            });

            const outcome = await source.fetch('SN60990', window, ELEMENTS);

            expect(outcome).toEqual({
                kind: 'success',
                rows: [
                    { time: new Date('2024-01-01T00:00:00Z'), values: { air_temperature_c: -2.9 } },
                    { time: new Date('2024-01-01T01:00:00Z'), values: { global_radiation: 12.5, air_temperature_c: -3.2 } },
                ],
            });
        });

        it('should merge entries sharing a timestamp and keep the first value per element', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({
                status: 200,
                data: {
                    data: [
                        { referenceTime: '2024-01-01T05:00:00Z', observations: [{ elementId: 'air_temperature', value: 1 }] },
                        {
                            referenceTime: '2024-01-01T05:00:00Z',
                            observations: [
                                { elementId: 'air_temperature', value: 2 },
                                { elementId: 'cloud_area_fraction', value: 7 },
                            ],
                        },
                    ],
                },
            });

            const outcome = await source.fetch('SN60990', window, ELEMENTS);

            expect(outcome).toEqual({
                kind: 'success',
                rows: [{ time: new Date('2024-01-01T05:00:00Z'), values: { air_temperature_c: 1, cloud_cover_percent: 7 } }],
            });
        });

        it('should leave null values absent rather than zero', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({
                status: 200,
                data: {
                    data: [{
                        referenceTime: '2024-01-01T03:00:00Z',
                        observations: [
                            { elementId: 'air_temperature', value: null },
                            { elementId: 'cloud_area_fraction', value: 0 },
                        ],
                    }],
                },
            });

            const outcome = await source.fetch('SN60990', window, ELEMENTS);

            expect(outcome).toEqual({
                kind: 'success',
                rows: [{ time: new Date('2024-01-01T03:00:00Z'), values: { cloud_cover_percent: 0 } }],
            });
        });

        it('should drop observations outside the window', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({
                status: 200,
                data: {
                    data: [
                        { referenceTime: '2023-12-31T23:00:00Z', observations: [{ elementId: 'air_temperature', value: 1 }] },
                        { referenceTime: '2024-01-01T23:00:00Z', observations: [{ elementId: 'air_temperature', value: 2 }] },
                        { referenceTime: '2024-01-02T00:00:00Z', observations: [{ elementId: 'air_temperature', value: 3 }] },
                    ],
                },
            });

            const outcome = await source.fetch('SN60990', window, ELEMENTS);

            expect(outcome).toEqual({
                kind: 'success',
                rows: [{ time: new Date('2024-01-01T23:00:00Z'), values: { air_temperature_c: 2 } }],
            });
        });
    });

    describe('empty', () => {
        it('should return empty for a response without data points', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({ status: 200, data: { data: [] } });

            expect(await source.fetch('SN60990', window, ELEMENTS)).toEqual({ kind: 'empty' });
        });

        it('should return empty for a 404 "No data found"', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({
                status: 404,
                data: { error: { code: 404, message: 'Not found', reason: 'No data found' } },
            });

            expect(await source.fetch('SN60990', window, ELEMENTS)).toEqual({ kind: 'empty' });
        });
    });

    describe('failures', () => {
        it('should classify 413 as window too large', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({ status: 413, data: 'Payload Too Large' });

            expect(await source.fetch('SN60990', window, ELEMENTS)).toEqual({
                kind: 'fatal',
                reason: 'window too large (HTTP 413): Payload Too Large',
                cause: 'window-too-large',
            });
        });

        it('should classify a 403 that exceeds the observation limit as window too large', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({
                status: 403,
                data: { error: { code: 403, message: 'This request exceeds the maximum number of observations' } },
            });

            const outcome = await source.fetch('SN60990', window, ELEMENTS);

            expect(outcome.kind).toBe('fatal');
            expect(outcome.kind === 'fatal' && outcome.cause).toBe('window-too-large');
        });

        it.each([429, 500, 503])('should classify HTTP %i as retryable', async (status) => {
            const { source, get } = createSource();
            get.mockResolvedValue({ status, data: '' });

            expect(await source.fetch('SN60990', window, ELEMENTS)).toEqual({ kind: 'retryable', reason: `HTTP ${status}` });
        });

        it('should classify a thrown 502 response as retryable', async () => {
            const { source, get } = createSource();
            get.mockRejectedValue(badGatewayError());

            expect(await source.fetch('SN60990', window, ELEMENTS)).toEqual({ kind: 'retryable', reason: 'HTTP 502' });
        });

        it('should classify a timeout as retryable', async () => {
            const { source, get } = createSource();
            get.mockRejectedValue(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'));

            expect(await source.fetch('SN60990', window, ELEMENTS)).toEqual({
                kind: 'retryable',
                reason: 'ECONNABORTED: timeout of 30000ms exceeded',
            });
        });

        it('should classify other statuses as fatal with a body excerpt', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({ status: 401, data: { error: { code: 401, message: 'Unauthorized' } } });

            expect(await source.fetch('SN60990', window, ELEMENTS)).toEqual({
                kind: 'fatal',
                reason: 'HTTP 401: {"error":{"code":401,"message":"Unauthorized"}}',
                cause: 'http-status',
            });
        });

        it('should truncate long bodies to 200 characters', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({ status: 400, data: 'x'.repeat(500) });

            const outcome = await source.fetch('SN60990', window, ELEMENTS);

            expect(outcome).toEqual({ kind: 'fatal', reason: `HTTP 400: ${'x'.repeat(200)}...`, cause: 'http-status' });
        });

        it('should return a parse error for an unexpected body', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({ status: 200, data: { data: 'not-a-list' } });

            const outcome = await source.fetch('SN60990', window, ELEMENTS);

            expect(outcome.kind).toBe('fatal');
            expect(outcome.kind === 'fatal' && outcome.cause).toBe('parse-error');
        });
    });

    describe('listAvailableElements', () => {
        it('should return distinct element ids', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({
                status: 200,
                data: { data: [{ elementId: 'air_temperature' }, { elementId: 'air_temperature' }, { elementId: 'cloud_area_fraction' }] },
            });

            expect(await source.listAvailableElements('SN60990')).toEqual(['air_temperature', 'cloud_area_fraction']);
            expect(get.mock.calls[0][0]).toBe('https://frost.example.test/observations/availableTimeSeries/v0.jsonld');
        });

        it('should return null when the lookup fails', async () => {
            const { source, get } = createSource();
            get.mockResolvedValue({ status: 412, data: 'No time series found' });

            expect(await source.listAvailableElements('SN00000')).toBeNull();
            expect(silentLogger.warn).toHaveBeenCalled();
        });
    });
});
