/**
 * LinkedIn API Configuration
 */

import type { SimpleLogger } from '@/utils/logger.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';

export const LINKEDIN_API_BASE_URL = 'https://api.linkedin.com/v2';

export interface LinkedInContext {
    fetch: FetchLike;
    accessToken: string;
    baseUrl?: string;
    logger?: SimpleLogger;
}

export function getApiBaseUrl(ctx: Pick<LinkedInContext, 'baseUrl'>): string {
    return ctx.baseUrl ?? LINKEDIN_API_BASE_URL;
}

export function buildHeaders(ctx: LinkedInContext): Record<string, string> {
    return {
        Authorization: `Bearer ${ctx.accessToken}`,
        'X-Restli-Protocol-Version': '2.0.0',
    };
}
