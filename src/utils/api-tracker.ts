/**
 * API Tracker Utility
 *
 * Times vendor API invocations and logs the outcome with status code and duration.
 */

import { errorMessage, statusCodeOf, VendorApiError } from '@/utils/errors.js';
import { logger as rootLogger, type SimpleLogger } from '@/utils/logger.js';

export interface ApiCallOptions {
    apiName: string;
    platform: string;
    logger?: SimpleLogger;
}

export interface ApiCallRecord {
    apiName: string;
    platform: string;
    success: boolean;
    durationMs: number;
    statusCode?: number;
    error?: string;
}

/**
 * Logs a finished API call.
 *
 * @param startTime - performance.now() timestamp taken when the call started
 */
export function trackApiCall(options: ApiCallOptions, startTime: number, success: boolean, statusCode?: number, error?: string): ApiCallRecord {
    const record: ApiCallRecord = {
        apiName: options.apiName,
        platform: options.platform,
        success,
        durationMs: Math.round(performance.now() - startTime),
        ...(statusCode !== undefined ? { statusCode } : {}),
        ...(error !== undefined ? { error } : {}),
    };

    const log = options.logger ?? rootLogger;
    if (success) {
        log.info(record, `${options.platform} ${options.apiName} completed`);
    } else {
        log.warn(record, `${options.platform} ${options.apiName} failed`);
    }
    return record;
}

/**
 * Wraps an async vendor call so its duration and outcome are logged.
 *
 * @param fn - The call to wrap; the vendor status on a thrown VendorApiError is picked up
 */
export async function withTracking<T>(options: ApiCallOptions, fn: () => Promise<T>): Promise<T> {
    const startTime = performance.now();

    try {
        const result = await fn();
        trackApiCall(options, startTime, true, statusCodeOf(result));
        return result;
    } catch (err) {
        const statusCode = err instanceof VendorApiError ? err.upstreamStatus : statusCodeOf(err);
        trackApiCall(options, startTime, false, statusCode, errorMessage(err));
        throw err;
    }
}
