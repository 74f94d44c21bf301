/**
 * Throttled Fetch
 *
 * Rate-limited fetch wrapper built on bottleneck so vendor APIs are not hammered.
 * Dynamically adjusts the limiter from Retry-After headers on 429 responses.
 */

import Bottleneck from 'bottleneck';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ThrottleOptions {
    maxConcurrent?: number;
    minTime?: number;
    /** Underlying fetch; defaults to the global one. */
    fetchImpl?: FetchLike;
}

const DEFAULT_MAX_CONCURRENT = 2;
const DEFAULT_MIN_TIME = 500;
const FALLBACK_BACKOFF_MS = 5000;

/**
 * Parse Retry-After header value.
 * Supports both numeric (seconds) and HTTP-date formats.
 * @returns Number of milliseconds to wait, or null if invalid
 */
export function parseRetryAfter(retryAfter: string | null, now: number = Date.now()): number | null {
    if (!retryAfter) {
        return null;
    }

    const numericValue = parseInt(retryAfter, 10);
    if (!Number.isNaN(numericValue) && numericValue > 0) {
        return numericValue * 1000;
    }

    const dateValue = Date.parse(retryAfter);
    if (!Number.isNaN(dateValue)) {
        const waitMs = dateValue - now;
        return waitMs > 0 ? waitMs : null;
    }

    return null;
}

/**
 * Creates a fetch that runs through its own limiter. Each connector builds
 * one; no rate state is shared between connectors.
 */
export function createThrottledFetch(options: ThrottleOptions = {}): FetchLike {
    const defaultMinTime = options.minTime ?? DEFAULT_MIN_TIME;
    const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
    const limiter = new Bottleneck({
        maxConcurrent: options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT,
        minTime: defaultMinTime,
    });

    // Last Retry-After seen, used to double the wait when a 429 comes without one
    let lastRetryAfter: number | null = null;

    const handleRetryAfter = (retryAfterMs: number) => {
        lastRetryAfter = retryAfterMs;

        // Small buffer so we don't retry too early
        limiter.updateSettings({ minTime: retryAfterMs + 100 });

        const reset = setTimeout(() => {
            limiter.updateSettings({ minTime: defaultMinTime });
            lastRetryAfter = null;
        }, retryAfterMs);
        reset.unref();
    };

    return (url, init) =>
        limiter.schedule(async () => {
            const method = init?.method ?? 'GET';

            try {
                const response = await fetchImpl(url, init);

                if (response.status === 429) {
                    const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'));
                    handleRetryAfter(retryAfterMs ?? (lastRetryAfter ? lastRetryAfter * 2 : FALLBACK_BACKOFF_MS));
                }

                return response;
            } catch (error) {
                if (error instanceof Error) {
                    throw new Error(`Network error during ${method} ${url}: ${error.message}`, { cause: error });
                }
                throw error;
            }
        });
}
