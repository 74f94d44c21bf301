/**
 * Date utility functions using date-fns-tz for timezone-aware calendar dates.
 * Calendar dates travel as YYYY-MM-DD strings.
 */

import { addDays, differenceInCalendarDays, format, isMatch, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Check a string is a real YYYY-MM-DD calendar date.
 */
export function isIsoDate(value: string): boolean {
    return /^\d{4}-\d{2}-\d{2}$/.test(value) && isMatch(value, ISO_DATE_FORMAT);
}

/**
 * Calendar date of an instant as seen in a timezone.
 * @throws RangeError for an unknown timezone
 */
export function isoDateInTimezone(instant: Date, timezone: string): string {
    return formatInTimeZone(instant, timezone, ISO_DATE_FORMAT);
}

/**
 * Move a calendar date by whole days.
 */
export function shiftIsoDate(isoDate: string, days: number): string {
    return format(addDays(parseISO(isoDate), days), ISO_DATE_FORMAT);
}

/**
 * Every calendar date from start to end, both inclusive.
 */
export function enumerateIsoDates(start: string, end: string): string[] {
    const span = differenceInCalendarDays(parseISO(end), parseISO(start));
    return Array.from({ length: Math.max(span + 1, 0) }, (_, offset) => shiftIsoDate(start, offset));
}

/**
 * Check an IANA timezone name is known to the runtime.
 */
export function isValidTimezone(timezone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: timezone });
        return true;
    } catch {
        return false;
    }
}
