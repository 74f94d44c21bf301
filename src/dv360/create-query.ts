/**
 * DV360 API - Create Query Bridge
 * Saves a report definition and returns its query id
 */

import { z } from 'zod';
import type { QueryPayload } from '@/lib/report-job/specification.js';
import { withTracking } from '@/utils/api-tracker.js';
import { parseJsonResponse, REQUEST_TIMEOUT_MS } from '@/utils/http.js';
import { buildHeaders, type Dv360Context, getApiBaseUrl } from './config.js';

// ============================================================================
// Schemas
// ============================================================================

/** DV360 ids come back as strings or int64 numbers */
const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

const createQueryResponseSchema = z
    .object({
        queryId: idSchema,
        metadata: z.object({ title: z.string().optional() }).passthrough().optional(),
    })
    .passthrough();

// ============================================================================
// Types
// ============================================================================

export type CreateQueryResponse = z.infer<typeof createQueryResponseSchema>;

// ============================================================================
// API Bridge Function
// ============================================================================

/**
 * Creates a report definition (queries.create)
 */
export async function createQuery(ctx: Dv360Context, payload: QueryPayload): Promise<CreateQueryResponse> {
    return withTracking({ apiName: 'createQuery', platform: 'dv360', logger: ctx.logger }, async () => {
        const response = await ctx.fetch(`${getApiBaseUrl(ctx)}/queries`, {
            method: 'POST',
            headers: await buildHeaders(ctx),
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        return parseJsonResponse(response, createQueryResponseSchema, 'create DV360 query');
    });
}
