import type { ReportState, ReportStatus } from '@/types/reports.js';
import type { PollClassification } from './types.js';

/**
 * Map a vendor state string to the lifecycle state.
 *
 * DONE and FAILED are terminal. Everything else (QUEUED, RUNNING,
 * STATE_UNSPECIFIED, unknown values, missing) is still running.
 */
export function classifyReportState(raw: string | null | undefined): ReportState {
    if (raw === 'DONE' || raw === 'FAILED') {
        return raw;
    }
    return 'RUNNING';
}

export function isTerminalState(state: ReportState): boolean {
    return state !== 'RUNNING';
}

export function classifyReportStatus(status: ReportStatus): PollClassification<ReportStatus> {
    return isTerminalState(classifyReportState(status.state)) ? { kind: 'terminal', snapshot: status } : { kind: 'pending', snapshot: status };
}
