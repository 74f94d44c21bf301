import { describe, expect, it } from 'vitest';
import { ValidationError } from '@/utils/errors.js';
import { TEST_DEFAULTS } from './fakes.js';
import { baseRequestSchema, parseRequest, resolveDestination, resolveRefresh, resolveSecretIds } from './request.js';

const RANGE = { startDate: '2024-03-01', endDate: '2024-03-09' };

describe('parseRequest', () => {
    it('names every offending field', () => {
        expect(() => parseRequest(baseRequestSchema, { reprocess_last_x_days: -1, notification_webhook_url: 'not-a-url' })).toThrow(
            new ValidationError('Invalid request: reprocess_last_x_days: Number must be greater than or equal to 0; notification_webhook_url: Invalid url')
        );
    });

    it('treats a missing body as an empty request', () => {
        expect(parseRequest(baseRequestSchema, undefined)).toEqual({});
    });
});

describe('resolveSecretIds', () => {
    it('prefers request values and falls back to the defaults', () => {
        expect(resolveSecretIds({ bq_secret_id: 'other-bq-key' }, 'vendor-key', 'dv360_secret_id', TEST_DEFAULTS)).toEqual({
            projectId: 'secrets-project',
            bqSecretId: 'other-bq-key',
            vendorSecretId: 'vendor-key',
        });
    });

    it('names the vendor field when nothing provides it', () => {
        expect(() => resolveSecretIds({}, undefined, 'tiktok_secret_id', TEST_DEFAULTS)).toThrow(new ValidationError('Missing required parameter: tiktok_secret_id'));
    });
});

describe('resolveDestination', () => {
    it('builds the destination from request and defaults', () => {
        expect(resolveDestination({ destination_table: 'dv360_daily' }, TEST_DEFAULTS)).toEqual({
            projectId: 'warehouse-project',
            datasetId: 'ads',
            tableId: 'dv360_daily',
        });
    });

    it('requires a dataset', () => {
        expect(() => resolveDestination({}, { ...TEST_DEFAULTS, destinationDataset: undefined })).toThrow(
            new ValidationError('Missing required parameter: destination_dataset')
        );
    });
});

describe('resolveRefresh', () => {
    it('returns nothing for a plain append', () => {
        expect(resolveRefresh({ deleteExisting: false, partitionColumn: 'date', range: RANGE, entityIds: ['1'], entityColumn: 'advertiser_id' })).toBeUndefined();
    });

    it('requires a partition column when deleting', () => {
        expect(() => resolveRefresh({ deleteExisting: true, partitionColumn: null, range: RANGE, entityIds: ['1'], entityColumn: 'advertiser_id' })).toThrow(
            new ValidationError('partition_column is required when delete_existing is true')
        );
    });
});
