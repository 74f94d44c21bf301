/**
 * TikTok Business API Configuration
 */

import type { SimpleLogger } from '@/utils/logger.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';

export const TIKTOK_API_BASE_URL = 'https://business-api.tiktok.com/open_api';

export const TIKTOK_PAGE_SIZE = 1000;

export interface TikTokContext {
    fetch: FetchLike;
    accessToken: string;
    apiVersion: string;
    baseUrl?: string;
    logger?: SimpleLogger;
}

export function getApiBaseUrl(ctx: Pick<TikTokContext, 'apiVersion' | 'baseUrl'>): string {
    return `${ctx.baseUrl ?? TIKTOK_API_BASE_URL}/${ctx.apiVersion}`;
}
