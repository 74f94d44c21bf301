/**
 * DV360 API - Get Report Bridge
 * Reads the status of one report run; a pure read that never re-triggers it
 */

import { z } from 'zod';
import { withTracking } from '@/utils/api-tracker.js';
import { parseJsonResponse, REQUEST_TIMEOUT_MS } from '@/utils/http.js';
import { buildHeaders, type Dv360Context, getApiBaseUrl } from './config.js';
import { reportKeySchema } from './run-query.js';

// ============================================================================
// Schemas
// ============================================================================

const reportStatusSchema = z
    .object({
        state: z.string().optional(), // QUEUED | RUNNING | DONE | FAILED
        finishTime: z.string().optional(),
        format: z.string().optional(),
    })
    .passthrough();

const reportMetadataSchema = z
    .object({
        status: reportStatusSchema.optional(),
        reportDataStartDate: z.unknown().optional(),
        reportDataEndDate: z.unknown().optional(),
        googleCloudStoragePath: z.string().optional(), // gs://bucket/path, set once DONE
    })
    .passthrough();

const getReportResponseSchema = z
    .object({
        key: reportKeySchema,
        metadata: reportMetadataSchema,
    })
    .passthrough();

// ============================================================================
// Types
// ============================================================================

export type GetReportResponse = z.infer<typeof getReportResponseSchema>;

// ============================================================================
// API Bridge Function
// ============================================================================

/**
 * Gets a report run (queries.reports.get)
 */
export async function getReport(ctx: Dv360Context, queryId: string, reportId: string): Promise<GetReportResponse> {
    return withTracking({ apiName: 'getReport', platform: 'dv360', logger: ctx.logger }, async () => {
        const url = `${getApiBaseUrl(ctx)}/queries/${encodeURIComponent(queryId)}/reports/${encodeURIComponent(reportId)}`;

        const response = await ctx.fetch(url, {
            method: 'GET',
            headers: await buildHeaders(ctx),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        return parseJsonResponse(response, getReportResponseSchema, `get DV360 report ${reportId}`);
    });
}
