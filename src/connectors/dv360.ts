/**
 * DV360 connector
 *
 * Submits a one-time report, polls it to completion with capped exponential
 * backoff, downloads the CSV from Cloud Storage and loads it into BigQuery.
 */

import { z } from 'zod';
import { destinationId } from '@/gcp/bigquery.js';
import type { ObjectStorage } from '@/gcp/storage.js';
import { googleCredentialsSchema, type GoogleCredentials, resolveSecretAs, resolveServiceAccount } from '@/gcp/secrets.js';
import { normalizeRows } from '@/lib/normalize/index.js';
import { awaitReport, buildReportSpecification, submitReportJob } from '@/lib/report-job/index.js';
import { retrieveArtifact } from '@/lib/retrieve-artifact/index.js';
import type { ReportApi } from '@/types/reports.js';
import type { SimpleLogger } from '@/utils/logger.js';
import { baseRequestSchema, idListSchema, nameListSchema, parseRequest, resolveDateRange, resolveDestination, resolveRefresh, resolveSecretIds } from './request.js';
import { runInvocation } from './run.js';
import type { Connector, ConnectorDefaults, ConnectorRuntime, LoadResult } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

/** One hour between status checks at most */
const MAX_RETRY_INTERVAL_SECONDS = 3600;

export const dv360RequestSchema = baseRequestSchema.extend({
    advertiser_ids: idListSchema,
    metrics: nameListSchema,
    dimensions: nameListSchema,
    file_name: z.string().trim().min(1).nullish(),
    query_id: z.union([z.string().min(1), z.number()]).transform(String).nullish(),
    dv360_secret_id: z.string().trim().min(1).nullish(),
    /** Seconds */
    min_retry_interval: z.number().min(0).max(MAX_RETRY_INTERVAL_SECONDS).nullish(),
    /** Seconds */
    max_retry_interval: z.number().min(0).max(MAX_RETRY_INTERVAL_SECONDS).nullish(),
    max_retry_count: z.number().int().min(1).nullish(),
});

export type Dv360Request = z.infer<typeof dv360RequestSchema>;

// ============================================================================
// Connector
// ============================================================================

export const DV360_DEFAULTS = {
    fileName: 'dv360_report',
    minRetryIntervalSeconds: 30,
    maxRetryIntervalSeconds: 60,
    maxRetryCount: 10,
    entityColumn: 'advertiser_id',
    timestampColumns: ['date', 'ingestion_time'],
} as const;

export interface Dv360Dependencies {
    createReportApi: (credentials: GoogleCredentials, logger: SimpleLogger) => ReportApi;
    createStorage: (credentials: GoogleCredentials) => ObjectStorage;
    sleep?: (ms: number) => Promise<void>;
}

export function createDv360Connector(runtime: ConnectorRuntime, defaults: ConnectorDefaults, deps: Dv360Dependencies): Connector {
    return {
        name: 'dv360',
        load: body =>
            runInvocation<LoadResult>('dv360', runtime, defaults, async ({ log, now, tracker }) => {
                const request = parseRequest(dv360RequestSchema, body);
                tracker.setWebhookUrl(request.notification_webhook_url);

                const range = resolveDateRange(request, defaults, now());
                const secretIds = resolveSecretIds(request, request.dv360_secret_id, 'dv360_secret_id', defaults);
                const destination = resolveDestination(request, defaults);
                const refresh = resolveRefresh({
                    deleteExisting: request.delete_existing ?? false,
                    partitionColumn: request.partition_column,
                    range,
                    entityIds: request.advertiser_ids,
                    entityColumn: request.entity_column ?? DV360_DEFAULTS.entityColumn,
                });
                const spec = buildReportSpecification({
                    title: request.file_name ?? DV360_DEFAULTS.fileName,
                    advertiserIds: request.advertiser_ids,
                    dimensions: request.dimensions,
                    metrics: request.metrics,
                    startDate: range.startDate,
                    endDate: range.endDate,
                });
                const minIntervalMs = (request.min_retry_interval ?? DV360_DEFAULTS.minRetryIntervalSeconds) * 1000;
                const maxIntervalMs = Math.max((request.max_retry_interval ?? DV360_DEFAULTS.maxRetryIntervalSeconds) * 1000, minIntervalMs);
                const maxAttempts = request.max_retry_count ?? DV360_DEFAULTS.maxRetryCount;

                tracker.update({
                    dateRange: [range.startDate, range.endDate],
                    destination: destinationId(destination),
                    entityIds: request.advertiser_ids,
                });
                log.info({ startDate: range.startDate, endDate: range.endDate, advertiserIds: request.advertiser_ids }, 'Requesting DV360 report');

                const dv360Credentials = await resolveSecretAs(
                    runtime.secrets,
                    { projectId: secretIds.projectId, secretId: secretIds.vendorSecretId },
                    googleCredentialsSchema,
                    'DV360'
                );
                const bqCredentials = await resolveServiceAccount(runtime.secrets, { projectId: secretIds.projectId, secretId: secretIds.bqSecretId });

                const reportApi = deps.createReportApi(dv360Credentials, log);
                const submitted = await submitReportJob(reportApi, spec, { queryId: request.query_id ?? undefined, now, logger: log });
                const completed = await awaitReport(reportApi, submitted, {
                    minIntervalMs,
                    maxIntervalMs,
                    maxAttempts,
                    sleep: deps.sleep,
                    now,
                    logger: log,
                });

                const rows = await retrieveArtifact(deps.createStorage(dv360Credentials), completed.artifactLocator);
                const ingestionTime = now().toISOString();
                const normalized = normalizeRows(
                    rows.map(row => ({ ...row, ingestion_time: ingestionTime })),
                    { timestampColumns: DV360_DEFAULTS.timestampColumns, dropColumns: request.drop_columns ?? [] }
                );

                log.info({ rows: normalized.length, queryId: completed.queryId, reportId: completed.reportId }, 'Report downloaded');

                const loader = runtime.createLoader(bqCredentials, destination.projectId);
                const rowsLoaded = await loader.load(normalized, destination, refresh);

                return {
                    success: true,
                    rows_loaded: rowsLoaded,
                    date_range: [range.startDate, range.endDate],
                    destination: destinationId(destination),
                };
            }),
    };
}
