/**
 * HTTP plumbing shared by the weather sources:
 * axios client construction and response classification
 */

import axios, { AxiosInstance } from 'axios';
import { fatal, retryable } from '../types/outcome';
import type { FetchOutcome } from '../types/outcome';

export const DEFAULT_TIMEOUT_MS = 30000;

export const DEFAULT_HEADERS = { 'User-Agent': 'station-harvest/1.0' };

const BODY_EXCERPT_LENGTH = 200;

// Upstream wording for requests rejected because of their size
const TOO_LARGE_PATTERN = /too (large|many|much|big)|exceed/i;

export function createHttpClient(timeoutMs: number = DEFAULT_TIMEOUT_MS): AxiosInstance {
    return axios.create({
        timeout: timeoutMs,
        headers: DEFAULT_HEADERS,
    });
}

// Status handling is done by the classifiers below, not by axios
export const acceptAnyStatus = (): boolean => true;

export function isSuccessStatus(status: number): boolean {
    return status >= 200 && status < 300;
}

function stringifyBody(body: unknown): string {
    if (body === undefined || body === null) return '';
    if (typeof body === 'string') return body;
    try {
        return JSON.stringify(body) ?? '';
    } catch {
        return String(body);
    }
}

/**
 * Response body as text, truncated for diagnostics
 */
export function bodyExcerpt(body: unknown, maxLength: number = BODY_EXCERPT_LENGTH): string {
    const text = stringifyBody(body);
    return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Classify a non-2xx response
 */
export function classifyFailedResponse(status: number, body: unknown): FetchOutcome {
    if (status === 429 || status >= 500) {
        return retryable(`HTTP ${status}`);
    }

    const excerpt = bodyExcerpt(body);
    const sizeRejection = status === 413
        || ((status === 400 || status === 403) && TOO_LARGE_PATTERN.test(excerpt));

    if (sizeRejection) {
        return fatal(`window too large (HTTP ${status}): ${excerpt}`, 'window-too-large');
    }

    return fatal(`HTTP ${status}: ${excerpt}`, 'http-status');
}

/**
 * Classify an error thrown while performing the request
 */
export function classifyRequestError(error: unknown): FetchOutcome {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            return classifyFailedResponse(error.response.status, error.response.data);
        }
        // Timeout, DNS failure, connection reset: nothing came back
        return retryable(`${error.code ?? 'transport error'}: ${error.message}`);
    }

    const message = error instanceof Error ? error.message : String(error);
    return fatal(`unexpected error: ${message}`, 'parse-error');
}
