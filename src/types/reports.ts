// ============================================================================
// Report Lifecycle Types
// ============================================================================

export const REPORT_STATES = ['RUNNING', 'DONE', 'FAILED'] as const;
export type ReportState = (typeof REPORT_STATES)[number];

export const TERMINAL_REPORT_STATES = ['DONE', 'FAILED'] as const satisfies readonly ReportState[];
export type TerminalReportState = (typeof TERMINAL_REPORT_STATES)[number];

export const REPORT_FORMATS = ['CSV'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const SCHEDULE_FREQUENCIES = ['ONE_TIME'] as const;
export type ScheduleFrequency = (typeof SCHEDULE_FREQUENCIES)[number];

export interface EntityFilter {
    type: 'FILTER_ADVERTISER';
    value: string;
}

/**
 * What a report run should contain. Frozen once built; a submitted
 * specification is never mutated.
 */
export interface ReportSpecification {
    readonly title: string;
    readonly filters: readonly EntityFilter[];
    /** Grouping fields; order drives output grouping */
    readonly dimensions: readonly string[];
    readonly metrics: readonly string[];
    /** Inclusive, YYYY-MM-DD */
    readonly startDate: string;
    /** Inclusive, YYYY-MM-DD */
    readonly endDate: string;
    readonly format: ReportFormat;
    readonly frequency: ScheduleFrequency;
}

/**
 * One run of a report definition, owned by the invocation that submitted it.
 */
export interface ReportJob {
    queryId: string;
    reportId: string;
    state: ReportState;
    /** State string exactly as the vendor reported it */
    rawState: string | null;
    /** Object storage URI; only meaningful once state is DONE */
    artifactLocator: string | null;
    createdAt: Date;
}

export interface CompletedReportJob extends ReportJob {
    state: 'DONE';
    artifactLocator: string;
}

/**
 * Snapshot returned by a status check.
 */
export interface ReportStatus {
    state: string | null;
    artifactLocator: string | null;
}

/**
 * Vendor report API the submitter and poller depend on.
 */
export interface ReportApi {
    create(spec: ReportSpecification): Promise<string>;
    run(queryId: string): Promise<{ queryId: string; reportId: string }>;
    getStatus(queryId: string, reportId: string): Promise<ReportStatus>;
}
