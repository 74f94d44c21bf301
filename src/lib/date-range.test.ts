import { describe, expect, it } from 'vitest';
import { ValidationError } from '@/utils/errors.js';
import { computeDateRange, datesInRange } from './date-range.js';

// 02:30 UTC on March 10th is still March 9th in Sao Paulo (UTC-3)
const now = new Date('2024-03-10T02:30:00Z');
const timezone = 'America/Sao_Paulo';

describe('computeDateRange', () => {
    it('defaults to yesterday in the requested timezone', () => {
        expect(computeDateRange({ timezone, now })).toEqual({ startDate: '2024-03-08', endDate: '2024-03-08' });
        expect(computeDateRange({ timezone: 'UTC', now })).toEqual({ startDate: '2024-03-09', endDate: '2024-03-09' });
    });

    it('covers the last N days ending yesterday', () => {
        expect(computeDateRange({ timezone, reprocessLastXDays: 7, now })).toEqual({ startDate: '2024-03-02', endDate: '2024-03-08' });
    });

    it('uses explicit dates as given when the window is zero or omitted', () => {
        expect(computeDateRange({ timezone, startDate: '2024-01-01', endDate: '2024-01-31', reprocessLastXDays: 0, now })).toEqual({
            startDate: '2024-01-01',
            endDate: '2024-01-31',
        });
        expect(computeDateRange({ timezone, startDate: '2024-01-01', endDate: '2024-01-01', now })).toEqual({
            startDate: '2024-01-01',
            endDate: '2024-01-01',
        });
    });

    it('treats a zero window without dates as yesterday', () => {
        expect(computeDateRange({ timezone, reprocessLastXDays: 0, now })).toEqual({ startDate: '2024-03-08', endDate: '2024-03-08' });
    });

    it('rejects explicit dates combined with a reprocess window', () => {
        expect(() => computeDateRange({ timezone, startDate: '2024-01-01', reprocessLastXDays: 7, now })).toThrow(ValidationError);
        expect(() => computeDateRange({ timezone, endDate: '2024-01-31', reprocessLastXDays: 1, now })).toThrow(
            'If using start_date/end_date, set reprocess_last_x_days to 0.'
        );
    });

    it('rejects half-open, inverted and malformed ranges', () => {
        expect(() => computeDateRange({ timezone, startDate: '2024-01-01', now })).toThrow('start_date and end_date must be provided together');
        expect(() => computeDateRange({ timezone, startDate: '2024-02-01', endDate: '2024-01-01', now })).toThrow(ValidationError);
        expect(() => computeDateRange({ timezone, startDate: '2024-02-30', endDate: '2024-03-01', now })).toThrow(ValidationError);
    });

    it('rejects unknown timezones and negative windows', () => {
        expect(() => computeDateRange({ timezone: 'Mars/Olympus_Mons', now })).toThrow('Unknown timezone: Mars/Olympus_Mons');
        expect(() => computeDateRange({ timezone, reprocessLastXDays: -2, now })).toThrow(ValidationError);
    });
});

describe('datesInRange', () => {
    it('lists every day inclusively across a month boundary', () => {
        expect(datesInRange({ startDate: '2024-02-28', endDate: '2024-03-01' })).toEqual(['2024-02-28', '2024-02-29', '2024-03-01']);
    });

    it('returns a single day for a one-day range', () => {
        expect(datesInRange({ startDate: '2024-01-05', endDate: '2024-01-05' })).toEqual(['2024-01-05']);
    });
});
