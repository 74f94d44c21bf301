import { randomUUID } from 'node:crypto';
import type { NotificationSummary } from '@/notify/chat.js';
import { errorMessage, isConnectorError } from '@/utils/errors.js';
import type { SimpleLogger } from '@/utils/logger.js';
import type { ConnectorDefaults, ConnectorName, ConnectorResult, ConnectorRuntime } from './types.js';

type SummaryFields = Partial<Omit<NotificationSummary, 'connector' | 'status' | 'execTime'>>;

/**
 * Lets a connector body report what it is doing as it learns it, so the
 * failure notification carries whatever was known at the point of failure.
 */
export interface InvocationTracker {
    setWebhookUrl(url: string | null | undefined): void;
    update(fields: SummaryFields): void;
}

export interface InvocationContext {
    log: SimpleLogger;
    now: () => Date;
    tracker: InvocationTracker;
}

export const EMPTY_RESULT_MESSAGE = 'Execution successful but query returned no results';

function totalRows(result: ConnectorResult): number {
    return typeof result.rows_loaded === 'number' ? result.rows_loaded : Object.values(result.rows_loaded).reduce((sum, rows) => sum + rows, 0);
}

/**
 * Runs one connector invocation: logs it, times it and posts a chat summary
 * (success, warning for an empty load, or error) when a webhook is configured.
 */
export async function runInvocation<T extends ConnectorResult>(
    connector: ConnectorName,
    runtime: ConnectorRuntime,
    defaults: ConnectorDefaults,
    body: (ctx: InvocationContext) => Promise<T>
): Promise<T> {
    const now = runtime.now ?? (() => new Date());
    const invocationId = runtime.createInvocationId?.() ?? randomUUID();
    const log = runtime.logger.child({ connector, invocationId });
    const startedAt = now().getTime();

    let webhookUrl = defaults.notificationWebhookUrl;
    let summary: SummaryFields = {};

    const tracker: InvocationTracker = {
        setWebhookUrl(url) {
            webhookUrl = url ?? defaults.notificationWebhookUrl;
        },
        update(fields) {
            summary = { ...summary, ...fields };
        },
    };

    const notify = async (status: NotificationSummary['status'], extra: SummaryFields = {}) => {
        if (!webhookUrl) {
            return;
        }
        const execTime = Math.round((now().getTime() - startedAt) / 10) / 100;
        await runtime.notifier.notify(webhookUrl, { ...summary, ...extra, connector, status, execTime });
    };

    log.info('Starting load');

    try {
        const result = await body({ log, now, tracker });
        const rows = totalRows(result);

        log.info({ rows, destination: result.destination }, 'Load complete');
        await notify(rows === 0 ? 'warning' : 'success', {
            rows: result.rows_loaded,
            destination: result.destination,
            ...(rows === 0 ? { message: EMPTY_RESULT_MESSAGE } : {}),
        });
        return result;
    } catch (error) {
        const context = isConnectorError(error) ? error.context : {};
        log.error({ err: errorMessage(error), errorType: error instanceof Error ? error.name : typeof error, ...context }, 'Load failed');
        await notify('error', { message: errorMessage(error) });
        throw error;
    }
}
