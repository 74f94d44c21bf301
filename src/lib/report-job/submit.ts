import type { ReportApi, ReportJob, ReportSpecification } from '@/types/reports.js';
import { errorMessage, SubmissionError } from '@/utils/errors.js';
import { logger as rootLogger, type SimpleLogger } from '@/utils/logger.js';

export interface SubmitReportJobOptions {
    /** Reuse an existing report definition instead of creating one */
    queryId?: string;
    now?: () => Date;
    logger?: SimpleLogger;
}

/**
 * Creates the report definition (unless one is reused) and triggers one
 * asynchronous run of it.
 *
 * Not retried: a repeated create would leave duplicate definitions behind.
 */
export async function submitReportJob(api: ReportApi, spec: ReportSpecification, options: SubmitReportJobOptions = {}): Promise<ReportJob> {
    const log = options.logger ?? rootLogger;
    const now = options.now ?? (() => new Date());
    const context = {
        title: spec.title,
        advertiserIds: spec.filters.map(filter => filter.value),
        dateRange: [spec.startDate, spec.endDate],
    };

    let queryId = options.queryId;
    if (!queryId) {
        try {
            queryId = await api.create(spec);
        } catch (error) {
            throw new SubmissionError(`Failed to create report definition: ${errorMessage(error)}`, { cause: error, context });
        }
        log.info({ queryId }, 'Created report definition');
    } else {
        log.info({ queryId }, 'Reusing report definition');
    }

    let key: { queryId: string; reportId: string };
    try {
        key = await api.run(queryId);
    } catch (error) {
        throw new SubmissionError(`Failed to run report definition ${queryId}: ${errorMessage(error)}`, {
            cause: error,
            context: { ...context, queryId },
        });
    }

    if (!key.queryId || !key.reportId) {
        throw new SubmissionError(`Run of report definition ${queryId} returned no report id`, { context: { ...context, queryId } });
    }

    log.info({ queryId: key.queryId, reportId: key.reportId }, 'Triggered report run');

    return {
        queryId: key.queryId,
        reportId: key.reportId,
        state: 'RUNNING',
        rawState: null,
        artifactLocator: null,
        createdAt: now(),
    };
}
