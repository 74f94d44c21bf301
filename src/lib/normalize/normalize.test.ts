import { describe, expect, it } from 'vitest';
import { flattenRecord } from '@/lib/flatten.js';
import { normalizeRows, parseTimestamp, sanitizeColumnName } from './index.js';

describe('sanitizeColumnName', () => {
    it('lowercases and replaces separators with underscores', () => {
        expect(sanitizeColumnName('segments.date')).toBe('segments_date');
        expect(sanitizeColumnName('Advertiser ID')).toBe('advertiser_id');
        expect(sanitizeColumnName('Revenue (Adv Currency)')).toBe('revenue_adv_currency');
        expect(sanitizeColumnName('likeCount')).toBe('likecount');
    });
});

describe('parseTimestamp', () => {
    it('reads report-style slash dates and ISO dates as UTC midnight', () => {
        expect(parseTimestamp('2024/01/05')).toBe('2024-01-05T00:00:00.000Z');
        expect(parseTimestamp('2024-01-05')).toBe('2024-01-05T00:00:00.000Z');
    });

    it('keeps explicit offsets and instants', () => {
        expect(parseTimestamp('2024-01-05T10:15:00.000Z')).toBe('2024-01-05T10:15:00.000Z');
        expect(parseTimestamp(new Date('2024-01-05T10:15:00.000Z'))).toBe('2024-01-05T10:15:00.000Z');
        expect(parseTimestamp(Date.UTC(2024, 0, 5))).toBe('2024-01-05T00:00:00.000Z');
    });

    it('maps empty and unparseable values to null', () => {
        expect(parseTimestamp('')).toBeNull();
        expect(parseTimestamp(null)).toBeNull();
        expect(parseTimestamp('not a date')).toBeNull();
        expect(parseTimestamp({ when: 'today' })).toBeNull();
    });
});

describe('normalizeRows', () => {
    it('casts non-timestamp cells to strings and parses declared timestamp columns', () => {
        const rows = normalizeRows(
            [
                { Date: '2024/01/01', 'Advertiser ID': 1, Impressions: 100, Active: true, ingestion_time: '2024-01-02T03:04:05.000Z' },
                { Date: '', 'Advertiser ID': 1, Impressions: null, Active: false, ingestion_time: '2024-01-02T03:04:05.000Z' },
            ],
            { timestampColumns: ['date', 'ingestion_time'] }
        );

        expect(rows).toEqual([
            { date: '2024-01-01T00:00:00.000Z', advertiser_id: '1', impressions: '100', active: 'true', ingestion_time: '2024-01-02T03:04:05.000Z' },
            { date: null, advertiser_id: '1', impressions: null, active: 'false', ingestion_time: '2024-01-02T03:04:05.000Z' },
        ]);
    });

    it('matches timestamp columns given with their original names and drops decoration columns', () => {
        const rows = normalizeRows([{ 'segments.date': '2024-01-01', 'metrics.clicks': 3, resourceName: 'customers/1/campaigns/2' }], {
            timestampColumns: ['segments.date'],
            dropColumns: ['resourceName'],
        });

        expect(rows).toEqual([{ segments_date: '2024-01-01T00:00:00.000Z', metrics_clicks: '3' }]);
    });

    it('serializes nested values as JSON strings', () => {
        expect(normalizeRows([{ labels: ['a', 'b'] }])).toEqual([{ labels: '["a","b"]' }]);
    });

    it('returns an empty list for no rows', () => {
        expect(normalizeRows([], { timestampColumns: ['date'] })).toEqual([]);
    });
});

describe('flattenRecord', () => {
    it('produces dotted keys for nested objects and keeps arrays whole', () => {
        expect(
            flattenRecord({
                campaign: { resourceName: 'customers/1/campaigns/2', id: '2', labels: ['x'] },
                metrics: { clicks: '3', costMicros: '1500000' },
                segments: { date: '2024-01-01' },
                empty: null,
            })
        ).toEqual({
            'campaign.resourceName': 'customers/1/campaigns/2',
            'campaign.id': '2',
            'campaign.labels': ['x'],
            'metrics.clicks': '3',
            'metrics.costMicros': '1500000',
            'segments.date': '2024-01-01',
            empty: null,
        });
    });
});
