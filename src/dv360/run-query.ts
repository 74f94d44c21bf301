/**
 * DV360 API - Run Query Bridge
 * Triggers an asynchronous run of a saved report definition
 */

import { z } from 'zod';
import { withTracking } from '@/utils/api-tracker.js';
import { parseJsonResponse, REQUEST_TIMEOUT_MS } from '@/utils/http.js';
import { buildHeaders, type Dv360Context, getApiBaseUrl } from './config.js';

// ============================================================================
// Schemas
// ============================================================================

/** DV360 ids come back as strings or int64 numbers */
const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

export const reportKeySchema = z.object({
    queryId: idSchema,
    reportId: idSchema,
});

const runQueryResponseSchema = z
    .object({
        key: reportKeySchema,
    })
    .passthrough();

// ============================================================================
// Types
// ============================================================================

export type ReportKey = z.infer<typeof reportKeySchema>;
export type RunQueryResponse = z.infer<typeof runQueryResponseSchema>;

// ============================================================================
// API Bridge Function
// ============================================================================

/**
 * Runs a query (queries.run) with synchronous=false so the call returns as
 * soon as the report run is queued.
 */
export async function runQuery(ctx: Dv360Context, queryId: string): Promise<RunQueryResponse> {
    return withTracking({ apiName: 'runQuery', platform: 'dv360', logger: ctx.logger }, async () => {
        const url = `${getApiBaseUrl(ctx)}/queries/${encodeURIComponent(queryId)}:run?synchronous=false`;

        const response = await ctx.fetch(url, {
            method: 'POST',
            headers: await buildHeaders(ctx),
            body: JSON.stringify({}),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        return parseJsonResponse(response, runQueryResponseSchema, `run DV360 query ${queryId}`);
    });
}
