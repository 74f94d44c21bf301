/**
 * Google Ads connector
 *
 * Runs one GAQL query per customer over the requested window and loads the
 * flattened result rows.
 */

import { z } from 'zod';
import { destinationId } from '@/gcp/bigquery.js';
import { resolveSecretAs, resolveServiceAccount } from '@/gcp/secrets.js';
import { createGoogleAdsTokenProvider, type GoogleAdsSecret, googleAdsSecretSchema } from '@/google-ads/auth.js';
import { type GoogleAdsContext, normalizeCustomerId } from '@/google-ads/config.js';
import { searchStream, withDateFilter } from '@/google-ads/search-stream.js';
import { flattenRecord } from '@/lib/flatten.js';
import { normalizeRows, type RawRow } from '@/lib/normalize/index.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';
import { baseRequestSchema, idListSchema, parseRequest, resolveDateRange, resolveDestination, resolveRefresh, resolveSecretIds } from './request.js';
import { runInvocation } from './run.js';
import type { Connector, ConnectorDefaults, ConnectorRuntime, LoadResult } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

export const googleAdsRequestSchema = baseRequestSchema.extend({
    customer_ids: idListSchema,
    query: z.string().trim().min(1),
    google_ads_secret_id: z.string().trim().min(1).nullish(),
    login_customer_id: z.union([z.string().min(1), z.number()]).transform(String).nullish(),
});

export type GoogleAdsRequest = z.infer<typeof googleAdsRequestSchema>;

// ============================================================================
// Connector
// ============================================================================

const ENTITY_COLUMN = 'customer_id';
const TIMESTAMP_COLUMNS = ['segments.date', 'ingestion_time'];

export interface GoogleAdsDependencies {
    fetch: FetchLike;
    createTokenProvider?: (secret: GoogleAdsSecret) => () => Promise<string>;
}

export function createGoogleAdsConnector(runtime: ConnectorRuntime, defaults: ConnectorDefaults, deps: GoogleAdsDependencies): Connector {
    const createTokenProvider = deps.createTokenProvider ?? createGoogleAdsTokenProvider;

    return {
        name: 'google-ads',
        load: body =>
            runInvocation<LoadResult>('google-ads', runtime, defaults, async ({ log, now, tracker }) => {
                const request = parseRequest(googleAdsRequestSchema, body);
                tracker.setWebhookUrl(request.notification_webhook_url);

                const range = resolveDateRange(request, defaults, now());
                const secretIds = resolveSecretIds(request, request.google_ads_secret_id, 'google_ads_secret_id', defaults);
                const destination = resolveDestination(request, defaults);
                const customerIds = request.customer_ids.map(normalizeCustomerId);
                const refresh = resolveRefresh({
                    deleteExisting: request.delete_existing ?? false,
                    partitionColumn: request.partition_column,
                    range,
                    entityIds: customerIds,
                    entityColumn: request.entity_column ?? ENTITY_COLUMN,
                });
                const query = withDateFilter(request.query, range.startDate, range.endDate);

                tracker.update({
                    dateRange: [range.startDate, range.endDate],
                    destination: destinationId(destination),
                    entityIds: customerIds,
                });

                const secret = await resolveSecretAs(
                    runtime.secrets,
                    { projectId: secretIds.projectId, secretId: secretIds.vendorSecretId },
                    googleAdsSecretSchema,
                    'Google Ads'
                );
                const bqCredentials = await resolveServiceAccount(runtime.secrets, { projectId: secretIds.projectId, secretId: secretIds.bqSecretId });

                const ctx: GoogleAdsContext = {
                    fetch: deps.fetch,
                    getAccessToken: createTokenProvider(secret),
                    developerToken: secret.developer_token,
                    loginCustomerId: request.login_customer_id ?? secret.login_customer_id,
                    apiVersion: defaults.googleAdsApiVersion,
                    logger: log,
                };

                const ingestionTime = now().toISOString();
                const rows: RawRow[] = [];
                for (const customerId of customerIds) {
                    const results = await searchStream(ctx, customerId, query);
                    log.info({ customerId, rows: results.length }, 'Fetched customer rows');
                    for (const result of results) {
                        rows.push({ ...flattenRecord(result), customer_id: customerId, ingestion_time: ingestionTime });
                    }
                }

                const normalized = normalizeRows(rows, { timestampColumns: TIMESTAMP_COLUMNS, dropColumns: request.drop_columns ?? [] });
                const rowsLoaded = await runtime.createLoader(bqCredentials, destination.projectId).load(normalized, destination, refresh);

                return {
                    success: true,
                    rows_loaded: rowsLoaded,
                    date_range: [range.startDate, range.endDate],
                    destination: destinationId(destination),
                };
            }),
    };
}
