/**
 * DV360 API Configuration
 * Shared configuration for the Bid Manager (DV360 reporting) API
 */

import type { FetchLike } from '@/utils/throttled-fetch.js';
import type { SimpleLogger } from '@/utils/logger.js';

export const DV360_API_BASE_URL = 'https://doubleclickbidmanager.googleapis.com/v2';

export const DV360_SCOPES = ['https://www.googleapis.com/auth/doubleclickbidmanager'];

/**
 * What every DV360 bridge call needs: a (throttled) fetch and a bearer token source.
 */
export interface Dv360Context {
    fetch: FetchLike;
    getAccessToken: () => Promise<string>;
    baseUrl?: string;
    logger?: SimpleLogger;
}

export function getApiBaseUrl(ctx: Pick<Dv360Context, 'baseUrl'>): string {
    return ctx.baseUrl ?? DV360_API_BASE_URL;
}

export async function buildHeaders(ctx: Dv360Context): Promise<Record<string, string>> {
    const accessToken = await ctx.getAccessToken();
    return {
        Authorization: `Bearer ${accessToken}`,
        'Content-Type': 'application/json',
    };
}
