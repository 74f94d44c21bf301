import { enumerateIsoDates, isIsoDate, isoDateInTimezone, isValidTimezone, shiftIsoDate } from '@/utils/date.js';
import { ValidationError } from '@/utils/errors.js';

export interface DateRange {
    /** Inclusive, YYYY-MM-DD */
    startDate: string;
    /** Inclusive, YYYY-MM-DD */
    endDate: string;
}

export interface DateRangeInput {
    timezone: string;
    startDate?: string | null;
    endDate?: string | null;
    /** Window ending yesterday; defaults to 1 when no explicit dates are given */
    reprocessLastXDays?: number | null;
    now?: Date;
}

/**
 * Resolve the reporting window for a run.
 *
 * - explicit start/end and a non-zero reprocess window are mutually exclusive
 * - reprocess N > 0 → [today - N, today - 1] in the requested timezone
 * - explicit dates → used as given (both required, start <= end)
 * - neither → yesterday
 */
export function computeDateRange(input: DateRangeInput): DateRange {
    const { timezone, startDate, endDate } = input;
    const hasExplicitDates = Boolean(startDate || endDate);
    const reprocess = input.reprocessLastXDays ?? (hasExplicitDates ? 0 : 1);

    if (!isValidTimezone(timezone)) {
        throw new ValidationError(`Unknown timezone: ${timezone}`);
    }
    if (!Number.isInteger(reprocess) || reprocess < 0) {
        throw new ValidationError(`reprocess_last_x_days must be a non-negative integer, got ${reprocess}`);
    }
    if (hasExplicitDates && reprocess !== 0) {
        throw new ValidationError('If using start_date/end_date, set reprocess_last_x_days to 0.');
    }

    const today = isoDateInTimezone(input.now ?? new Date(), timezone);

    if (reprocess > 0) {
        return { startDate: shiftIsoDate(today, -reprocess), endDate: shiftIsoDate(today, -1) };
    }

    if (hasExplicitDates) {
        if (!startDate || !endDate) {
            throw new ValidationError('start_date and end_date must be provided together');
        }
        for (const [name, value] of [
            ['start_date', startDate],
            ['end_date', endDate],
        ] as const) {
            if (!isIsoDate(value)) {
                throw new ValidationError(`${name} must be YYYY-MM-DD, got "${value}"`);
            }
        }
        if (startDate > endDate) {
            throw new ValidationError(`start_date ${startDate} is after end_date ${endDate}`);
        }
        return { startDate, endDate };
    }

    const yesterday = shiftIsoDate(today, -1);
    return { startDate: yesterday, endDate: yesterday };
}

export function datesInRange(range: DateRange): string[] {
    return enumerateIsoDates(range.startDate, range.endDate);
}
