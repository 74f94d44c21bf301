/**
 * TikTok connector
 *
 * Pulls the integrated report one account and one day at a time, so every
 * row can be stamped with the day it belongs to.
 */

import { z } from 'zod';
import { destinationId } from '@/gcp/bigquery.js';
import { resolveAccessToken, resolveServiceAccount } from '@/gcp/secrets.js';
import { datesInRange } from '@/lib/date-range.js';
import { normalizeRows, type RawRow } from '@/lib/normalize/index.js';
import type { TikTokContext } from '@/tiktok/config.js';
import { getIntegratedReport } from '@/tiktok/get-report.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';
import { baseRequestSchema, idListSchema, nameListSchema, parseRequest, resolveDateRange, resolveDestination, resolveRefresh, resolveSecretIds } from './request.js';
import { runInvocation } from './run.js';
import type { Connector, ConnectorDefaults, ConnectorRuntime, LoadResult } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

export const tiktokRequestSchema = baseRequestSchema.extend({
    account_ids: idListSchema,
    dimensions: nameListSchema,
    metrics: nameListSchema,
    level: z.string().trim().min(1).nullish(),
    report_type: z.string().trim().min(1).nullish(),
    tiktok_secret_id: z.string().trim().min(1).nullish(),
});

export type TikTokRequest = z.infer<typeof tiktokRequestSchema>;

// ============================================================================
// Connector
// ============================================================================

export const TIKTOK_DEFAULTS = {
    level: 'AUCTION_AD',
    reportType: 'BASIC',
    partitionColumn: 'created_time',
    entityColumn: 'account_id',
    timestampColumns: ['created_time', 'ingestion_time', 'stat_time_day', 'stat_time_hour'],
} as const;

export interface TikTokDependencies {
    fetch: FetchLike;
}

export function createTikTokConnector(runtime: ConnectorRuntime, defaults: ConnectorDefaults, deps: TikTokDependencies): Connector {
    return {
        name: 'tiktok',
        load: body =>
            runInvocation<LoadResult>('tiktok', runtime, defaults, async ({ log, now, tracker }) => {
                const request = parseRequest(tiktokRequestSchema, body);
                tracker.setWebhookUrl(request.notification_webhook_url);

                const range = resolveDateRange(request, defaults, now());
                const secretIds = resolveSecretIds(request, request.tiktok_secret_id, 'tiktok_secret_id', defaults);
                const destination = resolveDestination(request, defaults);
                const refresh = resolveRefresh({
                    deleteExisting: request.delete_existing ?? true,
                    partitionColumn: TIKTOK_DEFAULTS.partitionColumn,
                    range,
                    entityIds: request.account_ids,
                    entityColumn: request.entity_column ?? TIKTOK_DEFAULTS.entityColumn,
                });

                tracker.update({
                    dateRange: [range.startDate, range.endDate],
                    destination: destinationId(destination),
                    entityIds: request.account_ids,
                });

                const accessToken = await resolveAccessToken(runtime.secrets, { projectId: secretIds.projectId, secretId: secretIds.vendorSecretId }, 'TikTok');
                const bqCredentials = await resolveServiceAccount(runtime.secrets, { projectId: secretIds.projectId, secretId: secretIds.bqSecretId });

                const ctx: TikTokContext = {
                    fetch: deps.fetch,
                    accessToken,
                    apiVersion: defaults.tiktokApiVersion,
                    logger: log,
                };

                const ingestionTime = now().toISOString();
                const rows: RawRow[] = [];
                for (const accountId of request.account_ids) {
                    const fetchedBefore = rows.length;
                    for (const day of datesInRange(range)) {
                        const report = await getIntegratedReport(ctx, {
                            advertiserId: accountId,
                            startDate: day,
                            endDate: day,
                            dimensions: request.dimensions,
                            metrics: request.metrics,
                            dataLevel: request.level ?? TIKTOK_DEFAULTS.level,
                            reportType: request.report_type ?? TIKTOK_DEFAULTS.reportType,
                        });
                        for (const row of report) {
                            rows.push({ ...row, account_id: accountId, created_time: day, ingestion_time: ingestionTime });
                        }
                    }
                    log.info({ accountId, rows: rows.length - fetchedBefore }, 'Fetched account report');
                }

                const normalized = normalizeRows(rows, { timestampColumns: TIKTOK_DEFAULTS.timestampColumns, dropColumns: request.drop_columns ?? [] });
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
