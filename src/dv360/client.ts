import { toQueryPayload } from '@/lib/report-job/specification.js';
import type { ReportApi } from '@/types/reports.js';
import type { Dv360Context } from './config.js';
import { createQuery } from './create-query.js';
import { getReport } from './get-report.js';
import { runQuery } from './run-query.js';

/**
 * ReportApi over the DV360 REST bridges.
 */
export function createDv360ReportApi(ctx: Dv360Context): ReportApi {
    return {
        async create(spec) {
            const { queryId } = await createQuery(ctx, toQueryPayload(spec));
            return queryId;
        },

        async run(queryId) {
            const { key } = await runQuery(ctx, queryId);
            return key;
        },

        async getStatus(queryId, reportId) {
            const { metadata } = await getReport(ctx, queryId, reportId);
            return {
                state: metadata.status?.state ?? null,
                artifactLocator: metadata.googleCloudStoragePath ?? null,
            };
        },
    };
}
