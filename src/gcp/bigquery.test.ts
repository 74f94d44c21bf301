import { describe, expect, it, vi } from 'vitest';
import { ValidationError, WarehouseLoadError } from '@/utils/errors.js';
import { silentLogger } from '@/utils/logger.js';
import { buildDeleteStatement, createWarehouseLoader, toNdjson, type WarehouseClient } from './bigquery.js';

const destination = { projectId: 'analytics-prj', datasetId: 'ads', tableId: 'dv360_daily' };
const rows = [
    { date: '2024-01-01T00:00:00.000Z', advertiser_id: '1', impressions: '100' },
    { date: '2024-01-02T00:00:00.000Z', advertiser_id: '1', impressions: null },
];

function fakeClient() {
    const calls: string[] = [];
    const client = {
        runQuery: vi.fn<WarehouseClient['runQuery']>(async () => {
            calls.push('delete');
        }),
        appendRows: vi.fn<WarehouseClient['appendRows']>(async (_destination, appended) => {
            calls.push('append');
            return appended.length;
        }),
    } satisfies WarehouseClient;
    return { client, calls };
}

describe('buildDeleteStatement', () => {
    it('filters by partition date range and entity ids with bound parameters', () => {
        expect(
            buildDeleteStatement(destination, {
                startDate: '2024-01-01',
                endDate: '2024-01-31',
                entityIds: ['1', '2'],
                partitionColumn: 'date',
                entityColumn: 'advertiser_id',
            })
        ).toEqual({
            query: 'DELETE FROM `analytics-prj.ads.dv360_daily` WHERE DATE(date) BETWEEN @start_date AND @end_date AND advertiser_id IN UNNEST(@entity_ids)',
            params: { start_date: '2024-01-01', end_date: '2024-01-31', entity_ids: ['1', '2'] },
            types: { start_date: 'DATE', end_date: 'DATE', entity_ids: ['STRING'] },
        });
    });

    it('omits the entity filter when there are no ids', () => {
        const statement = buildDeleteStatement(destination, { startDate: '2024-01-01', endDate: '2024-01-01', entityIds: [], partitionColumn: 'created_time' });

        expect(statement.query).toBe('DELETE FROM `analytics-prj.ads.dv360_daily` WHERE DATE(created_time) BETWEEN @start_date AND @end_date');
        expect(statement.params).toEqual({ start_date: '2024-01-01', end_date: '2024-01-01' });
    });

    it('rejects identifiers that could escape the statement', () => {
        const refresh = { startDate: '2024-01-01', endDate: '2024-01-01', entityIds: [], partitionColumn: 'date' };

        expect(() => buildDeleteStatement(destination, { ...refresh, partitionColumn: 'date) OR (1=1' })).toThrow(ValidationError);
        expect(() => buildDeleteStatement({ ...destination, tableId: 'x`; DROP TABLE y; --' }, refresh)).toThrow(ValidationError);
    });
});

describe('createWarehouseLoader', () => {
    it('appends without deleting when no refresh is requested', async () => {
        const { client, calls } = fakeClient();

        await expect(createWarehouseLoader(client, silentLogger).load(rows, destination)).resolves.toBe(2);

        expect(calls).toEqual(['append']);
        expect(client.appendRows).toHaveBeenCalledWith(destination, rows);
    });

    it('deletes the matching range before appending', async () => {
        const { client, calls } = fakeClient();

        await createWarehouseLoader(client, silentLogger).load(rows, destination, {
            startDate: '2024-01-01',
            endDate: '2024-01-02',
            entityIds: ['1'],
            partitionColumn: 'date',
            entityColumn: 'advertiser_id',
        });

        expect(calls).toEqual(['delete', 'append']);
        expect(client.runQuery.mock.calls[0]?.[0].params).toEqual({ start_date: '2024-01-01', end_date: '2024-01-02', entity_ids: ['1'] });
    });

    it('skips both delete and append for an empty batch', async () => {
        const { client, calls } = fakeClient();

        const loaded = await createWarehouseLoader(client, silentLogger).load([], destination, {
            startDate: '2024-01-01',
            endDate: '2024-01-02',
            entityIds: ['1'],
            partitionColumn: 'date',
        });

        expect(loaded).toBe(0);
        expect(calls).toEqual([]);
    });

    it('does not append when the delete fails', async () => {
        const { client, calls } = fakeClient();
        client.runQuery.mockRejectedValueOnce(new Error('Access Denied'));

        await expect(
            createWarehouseLoader(client, silentLogger).load(rows, destination, { startDate: '2024-01-01', endDate: '2024-01-02', entityIds: [], partitionColumn: 'date' })
        ).rejects.toBeInstanceOf(WarehouseLoadError);
        expect(calls).toEqual([]);
        expect(client.appendRows).not.toHaveBeenCalled();
    });

    it('wraps append failures', async () => {
        const { client } = fakeClient();
        client.appendRows.mockRejectedValueOnce(new Error('schema mismatch'));

        await expect(createWarehouseLoader(client, silentLogger).load(rows, destination)).rejects.toThrow(
            'Failed to load rows into analytics-prj.ads.dv360_daily: schema mismatch'
        );
    });
});

describe('toNdjson', () => {
    it('writes one JSON object per line', () => {
        expect(toNdjson(rows)).toBe(
            '{"date":"2024-01-01T00:00:00.000Z","advertiser_id":"1","impressions":"100"}\n{"date":"2024-01-02T00:00:00.000Z","advertiser_id":"1","impressions":null}'
        );
    });
});
