/**
 * Google Ads API Configuration
 */

import type { SimpleLogger } from '@/utils/logger.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';

export const GOOGLE_ADS_API_BASE_URL = 'https://googleads.googleapis.com';

export interface GoogleAdsContext {
    fetch: FetchLike;
    getAccessToken: () => Promise<string>;
    developerToken: string;
    /** Manager account the request is made through, if any */
    loginCustomerId?: string;
    apiVersion: string;
    baseUrl?: string;
    logger?: SimpleLogger;
}

/**
 * Customer ids are accepted as 123-456-7890 or 1234567890.
 */
export function normalizeCustomerId(customerId: string): string {
    return customerId.replace(/-/g, '').trim();
}

export async function buildHeaders(ctx: GoogleAdsContext): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
        Authorization: `Bearer ${await ctx.getAccessToken()}`,
        'developer-token': ctx.developerToken,
        'Content-Type': 'application/json',
    };
    if (ctx.loginCustomerId) {
        headers['login-customer-id'] = normalizeCustomerId(ctx.loginCustomerId);
    }
    return headers;
}
