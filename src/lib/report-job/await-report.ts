import { classifyReportState, classifyReportStatus, pollUntilTerminal, type PollOptions } from '@/lib/report-poller/index.js';
import type { CompletedReportJob, ReportApi, ReportJob, ReportStatus } from '@/types/reports.js';
import { InvalidLocatorError, PollExhaustedError, ReportGenerationError, ValidationError } from '@/utils/errors.js';
import { logger as rootLogger, type SimpleLogger } from '@/utils/logger.js';

export interface AwaitReportOptions extends PollOptions {
    logger?: SimpleLogger;
}

/**
 * Polls a submitted run until it is terminal and hands back a job that is
 * safe to retrieve. FAILED becomes ReportGenerationError; DONE without a
 * storage path becomes InvalidLocatorError.
 */
export async function awaitReport(api: ReportApi, job: ReportJob, options: AwaitReportOptions): Promise<CompletedReportJob> {
    const { logger = rootLogger, onAttempt, ...pollOptions } = options;
    const context = { queryId: job.queryId, reportId: job.reportId };
    const log = logger.child(context);

    if (!job.queryId || !job.reportId) {
        throw new ValidationError('Cannot poll a report job without query and report ids', { context });
    }

    let snapshot: ReportStatus;
    try {
        snapshot = await pollUntilTerminal(() => api.getStatus(job.queryId, job.reportId), classifyReportStatus, {
            ...pollOptions,
            onAttempt: attempt => {
                if (!attempt.terminal && attempt.nextDelayMs !== null) {
                    log.info({ attempt: attempt.attempt, nextDelayMs: attempt.nextDelayMs }, 'Report still running');
                }
                onAttempt?.(attempt);
            },
        });
    } catch (error) {
        if (error instanceof PollExhaustedError) {
            throw new PollExhaustedError(`Report ${job.reportId} of query ${job.queryId}: ${error.message}`, {
                cause: error,
                context: { ...error.context, ...context },
            });
        }
        throw error;
    }

    const state = classifyReportState(snapshot.state);

    if (state === 'FAILED') {
        throw new ReportGenerationError(`Report ${job.reportId} finished with state FAILED`, { context: { ...context, rawState: snapshot.state } });
    }

    if (!snapshot.artifactLocator) {
        throw new InvalidLocatorError(`Report ${job.reportId} is DONE but has no storage path`, { context });
    }

    log.info({ artifactLocator: snapshot.artifactLocator }, 'Report ready');

    return {
        ...job,
        state: 'DONE',
        rawState: snapshot.state,
        artifactLocator: snapshot.artifactLocator,
    };
}
