/**
 * Google Ads API - Search Stream Bridge
 * Runs a GAQL query for one customer and returns every result row
 */

import { z } from 'zod';
import type { JsonObject, JsonValue } from '@/lib/flatten.js';
import { withTracking } from '@/utils/api-tracker.js';
import { parseJsonResponse, REQUEST_TIMEOUT_MS } from '@/utils/http.js';
import { buildHeaders, GOOGLE_ADS_API_BASE_URL, type GoogleAdsContext, normalizeCustomerId } from './config.js';

// ============================================================================
// Schemas
// ============================================================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const searchStreamBatchSchema = z.object({
    results: z.array(z.record(jsonValueSchema)).optional(),
    fieldMask: z.string().optional(),
    requestId: z.string().optional(),
});

const searchStreamResponseSchema = z.array(searchStreamBatchSchema);

// ============================================================================
// Types
// ============================================================================

export type SearchStreamBatch = z.infer<typeof searchStreamBatchSchema>;

// ============================================================================
// Query helpers
// ============================================================================

const TRAILING_CLAUSE = /\b(ORDER\s+BY|LIMIT|PARAMETERS)\b/i;

/**
 * Restrict a GAQL query to a date range, adding to an existing WHERE clause
 * when there is one. The condition goes before any ORDER BY, LIMIT or
 * PARAMETERS clause.
 */
export function withDateFilter(query: string, startDate: string, endDate: string): string {
    const trimmed = query.trim();
    const trailing = TRAILING_CLAUSE.exec(trimmed);
    const head = (trailing ? trimmed.slice(0, trailing.index) : trimmed).trimEnd();
    const tail = trailing ? ` ${trimmed.slice(trailing.index)}` : '';
    const keyword = /\bWHERE\b/i.test(head) ? 'AND' : 'WHERE';

    return `${head} ${keyword} segments.date BETWEEN '${startDate}' AND '${endDate}'${tail}`;
}

// ============================================================================
// API Bridge Function
// ============================================================================

/**
 * Streams a GAQL query (googleAds:searchStream) for one customer
 */
export async function searchStream(ctx: GoogleAdsContext, customerId: string, query: string): Promise<JsonObject[]> {
    const id = normalizeCustomerId(customerId);

    return withTracking({ apiName: 'searchStream', platform: 'google-ads', logger: ctx.logger }, async () => {
        const url = `${ctx.baseUrl ?? GOOGLE_ADS_API_BASE_URL}/${ctx.apiVersion}/customers/${id}/googleAds:searchStream`;

        const response = await ctx.fetch(url, {
            method: 'POST',
            headers: await buildHeaders(ctx),
            body: JSON.stringify({ query }),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS * 4),
        });

        const batches = await parseJsonResponse(response, searchStreamResponseSchema, `search Google Ads customer ${id}`);
        return batches.flatMap(batch => batch.results ?? []);
    });
}
