/**
 * TikTok Business API - Integrated Report Bridge
 * Synchronous reporting endpoint; pages are followed until the last one
 */

import { z } from 'zod';
import { withTracking } from '@/utils/api-tracker.js';
import { VendorApiError } from '@/utils/errors.js';
import { parseJsonResponse, REQUEST_TIMEOUT_MS } from '@/utils/http.js';
import { getApiBaseUrl, TIKTOK_PAGE_SIZE, type TikTokContext } from './config.js';

// ============================================================================
// Schemas
// ============================================================================

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const reportItemSchema = z.object({
    dimensions: z.record(cellSchema).default({}),
    metrics: z.record(cellSchema).default({}),
});

const pageInfoSchema = z.object({
    page: z.number().int(),
    page_size: z.number().int().optional(),
    total_number: z.number().int().optional(),
    total_page: z.number().int(),
});

const integratedReportResponseSchema = z.object({
    code: z.number().int(), // 0 on success
    message: z.string().optional(),
    request_id: z.string().optional(),
    data: z
        .object({
            list: z.array(reportItemSchema).default([]),
            page_info: pageInfoSchema.optional(),
        })
        .nullish(),
});

// ============================================================================
// Types
// ============================================================================

export type TikTokReportCell = z.infer<typeof cellSchema>;
export type TikTokReportRow = Record<string, TikTokReportCell>;

export interface IntegratedReportOptions {
    advertiserId: string;
    /** YYYY-MM-DD */
    startDate: string;
    /** YYYY-MM-DD */
    endDate: string;
    dimensions: readonly string[];
    metrics: readonly string[];
    /** AUCTION_CAMPAIGN | AUCTION_ADGROUP | AUCTION_AD | AUCTION_ADVERTISER */
    dataLevel: string;
    /** BASIC, AUDIENCE, ... */
    reportType: string;
}

// ============================================================================
// API Bridge Function
// ============================================================================

export function buildReportQuery(options: IntegratedReportOptions, page: number): URLSearchParams {
    return new URLSearchParams({
        advertiser_id: options.advertiserId,
        report_type: options.reportType,
        data_level: options.dataLevel,
        dimensions: JSON.stringify(options.dimensions),
        metrics: JSON.stringify(options.metrics),
        start_date: options.startDate,
        end_date: options.endDate,
        lifetime: 'false',
        query_lifetime: 'false',
        page: String(page),
        page_size: String(TIKTOK_PAGE_SIZE),
    });
}

async function getReportPage(ctx: TikTokContext, options: IntegratedReportOptions, page: number) {
    return withTracking({ apiName: 'getIntegratedReport', platform: 'tiktok', logger: ctx.logger }, async () => {
        const url = `${getApiBaseUrl(ctx)}/report/integrated/get/?${buildReportQuery(options, page).toString()}`;

        const response = await ctx.fetch(url, {
            method: 'GET',
            headers: {
                'Access-Token': ctx.accessToken,
                'Content-Type': 'application/json',
            },
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        const body = await parseJsonResponse(response, integratedReportResponseSchema, `get TikTok report for advertiser ${options.advertiserId}`);
        if (body.code !== 0) {
            throw new VendorApiError(`TikTok report request failed for advertiser ${options.advertiserId}: ${body.code} ${body.message ?? ''}`.trim(), {
                context: { advertiserId: options.advertiserId, requestId: body.request_id },
            });
        }
        return body;
    });
}

/**
 * Fetches every page of an integrated report and merges each item's
 * dimensions and metrics into one row.
 */
export async function getIntegratedReport(ctx: TikTokContext, options: IntegratedReportOptions): Promise<TikTokReportRow[]> {
    const rows: TikTokReportRow[] = [];
    let page = 1;

    for (;;) {
        const { data } = await getReportPage(ctx, options, page);
        if (!data) {
            ctx.logger?.info({ advertiserId: options.advertiserId, page }, 'No data for advertiser');
            break;
        }

        for (const item of data.list) {
            rows.push({ ...item.dimensions, ...item.metrics });
        }

        const totalPages = data.page_info?.total_page ?? 1;
        if (page >= totalPages) {
            break;
        }
        page++;
    }

    return rows;
}
