/**
 * Chat webhook notifications
 * Posts a plain-text run summary to a chat space webhook
 */

import { errorMessage } from '@/utils/errors.js';
import { REQUEST_TIMEOUT_MS } from '@/utils/http.js';
import { logger as rootLogger, type SimpleLogger } from '@/utils/logger.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';

export type NotificationStatus = 'success' | 'warning' | 'error';

export interface NotificationSummary {
    connector: string;
    status: NotificationStatus;
    dateRange?: [string, string];
    destination?: string | Record<string, string>;
    entityIds?: readonly string[];
    rows?: number | Record<string, number>;
    /** Seconds, rounded to two decimals */
    execTime: number;
    message?: string;
}

export interface Notifier {
    notify(webhookUrl: string, summary: NotificationSummary): Promise<void>;
}

const STATUS_LABEL: Record<NotificationStatus, string> = {
    success: 'SUCCESS',
    warning: 'WARNING',
    error: 'ERROR',
};

function formatValue(value: string | number | Record<string, string | number>): string {
    if (typeof value === 'object') {
        return Object.entries(value)
            .map(([key, entry]) => `${key}=${entry}`)
            .join(', ');
    }
    return String(value);
}

export function formatSummary(summary: NotificationSummary): string {
    const lines = [`*[${STATUS_LABEL[summary.status]}] ${summary.connector}*`];

    if (summary.dateRange) {
        lines.push(`Date range: ${summary.dateRange[0]} to ${summary.dateRange[1]}`);
    }
    if (summary.destination !== undefined) {
        lines.push(`Destination: ${formatValue(summary.destination)}`);
    }
    if (summary.entityIds && summary.entityIds.length > 0) {
        lines.push(`Accounts: ${summary.entityIds.join(', ')}`);
    }
    if (summary.rows !== undefined) {
        lines.push(`Rows: ${formatValue(summary.rows)}`);
    }
    lines.push(`Execution time: ${summary.execTime.toFixed(2)}s`);
    if (summary.message) {
        lines.push(`Message: ${summary.message}`);
    }

    return lines.join('\n');
}

/**
 * Notifier that never fails the run: delivery errors are logged and dropped.
 */
export function createChatNotifier(fetchImpl: FetchLike, logger: SimpleLogger = rootLogger): Notifier {
    return {
        async notify(webhookUrl, summary) {
            try {
                const response = await fetchImpl(webhookUrl, {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json; charset=UTF-8' },
                    body: JSON.stringify({ text: formatSummary(summary) }),
                    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
                });
                if (!response.ok) {
                    logger.warn({ status: response.status, connector: summary.connector }, 'Chat notification rejected');
                }
            } catch (error) {
                logger.warn({ err: errorMessage(error), connector: summary.connector }, 'Failed to send chat notification');
            }
        },
    };
}
