import { isMatch } from 'date-fns';
import type { ReportSpecification } from '@/types/reports.js';
import { ValidationError } from '@/utils/errors.js';

export interface ReportSpecificationInput {
    title: string;
    advertiserIds: readonly string[];
    dimensions: readonly string[];
    metrics: readonly string[];
    startDate: string;
    endDate: string;
}

export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

/**
 * Payload of a DV360 `queries.create` call.
 */
export interface QueryPayload {
    metadata: {
        title: string;
        dataRange: {
            range: 'CUSTOM_DATES';
            customStartDate: CalendarDate;
            customEndDate: CalendarDate;
        };
        format: 'CSV';
    };
    params: {
        type: 'STANDARD';
        groupBys: string[];
        filters: Array<{ type: 'FILTER_ADVERTISER'; value: string }>;
        metrics: string[];
    };
    schedule: {
        frequency: 'ONE_TIME';
    };
}

const ISO_DATE = 'yyyy-MM-dd';

/**
 * Builds an immutable report specification filtered to the given advertisers.
 */
export function buildReportSpecification(input: ReportSpecificationInput): ReportSpecification {
    if (input.advertiserIds.length === 0) {
        throw new ValidationError('At least one advertiser id is required');
    }
    if (input.metrics.length === 0) {
        throw new ValidationError('At least one metric is required');
    }
    for (const date of [input.startDate, input.endDate]) {
        if (!isMatch(date, ISO_DATE)) {
            throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
        }
    }
    if (input.startDate > input.endDate) {
        throw new ValidationError(`start date ${input.startDate} is after end date ${input.endDate}`);
    }

    return Object.freeze({
        title: input.title,
        filters: Object.freeze(input.advertiserIds.map(value => Object.freeze({ type: 'FILTER_ADVERTISER' as const, value }))),
        dimensions: Object.freeze([...input.dimensions]),
        metrics: Object.freeze([...input.metrics]),
        startDate: input.startDate,
        endDate: input.endDate,
        format: 'CSV',
        frequency: 'ONE_TIME',
    });
}

export function toCalendarDate(isoDate: string): CalendarDate {
    const [year, month, day] = isoDate.split('-').map(part => Number.parseInt(part, 10));
    if (year === undefined || month === undefined || day === undefined) {
        throw new ValidationError(`Invalid date "${isoDate}", expected YYYY-MM-DD`);
    }
    return { year, month, day };
}

export function toQueryPayload(spec: ReportSpecification): QueryPayload {
    return {
        metadata: {
            title: spec.title,
            dataRange: {
                range: 'CUSTOM_DATES',
                customStartDate: toCalendarDate(spec.startDate),
                customEndDate: toCalendarDate(spec.endDate),
            },
            format: spec.format,
        },
        params: {
            type: 'STANDARD',
            groupBys: [...spec.dimensions],
            filters: spec.filters.map(filter => ({ ...filter })),
            metrics: [...spec.metrics],
        },
        schedule: {
            frequency: spec.frequency,
        },
    };
}
