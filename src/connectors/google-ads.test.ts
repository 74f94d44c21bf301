import { describe, expect, it, vi } from 'vitest';
import type { GoogleAdsSecret } from '@/google-ads/auth.js';
import { SecretResolutionError } from '@/utils/errors.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';
import { createFakeRuntime, TEST_DEFAULTS, TEST_SERVICE_ACCOUNT } from './fakes.js';
import { createGoogleAdsConnector } from './google-ads.js';

const ADS_SECRET = {
    developer_token: 'test-developer-token',
    client_id: 'test-client-id',
    client_secret: 'test-secret',
    refresh_token: 'test-refresh-token',
    login_customer_id: 1112223333,
};

function setup(secrets: Record<string, string> = { 'ads-key': JSON.stringify(ADS_SECRET), 'bq-key': JSON.stringify(TEST_SERVICE_ACCOUNT) }) {
    const fake = createFakeRuntime(secrets);
    const fetch = vi.fn<FetchLike>(async url => {
        const customerId = /customers\/(\d+)\//.exec(url)?.[1] ?? 'unknown';
        const batches = [{ results: [{ campaign: { id: `${customerId}-1` }, metrics: { clicks: '3' }, segments: { date: '2024-03-09' } }] }];
        return new Response(JSON.stringify(batches), { status: 200 });
    });
    const createTokenProvider = vi.fn((_secret: GoogleAdsSecret) => async () => 'test-token');
    const connector = createGoogleAdsConnector(fake.runtime, TEST_DEFAULTS, { fetch, createTokenProvider });
    return { ...fake, fetch, createTokenProvider, connector };
}

describe('google-ads connector', () => {
    it('queries every customer over the window and loads flattened rows', async () => {
        const { connector, fetch, createTokenProvider, loads } = setup();

        const result = await connector.load({
            customer_ids: ['123-456-7890', 5550001111],
            query: 'SELECT campaign.id, metrics.clicks, segments.date FROM campaign',
            google_ads_secret_id: 'ads-key',
            reprocess_last_x_days: 3,
        });

        expect(result).toEqual({
            success: true,
            rows_loaded: 2,
            date_range: ['2024-03-07', '2024-03-09'],
            destination: 'warehouse-project.ads.report',
        });
        expect(createTokenProvider.mock.calls[0]?.[0]).toMatchObject({ client_id: 'test-client-id', login_customer_id: '1112223333' });
        expect(fetch.mock.calls.map(([url]) => url)).toEqual([
            'https://googleads.googleapis.com/v19/customers/1234567890/googleAds:searchStream',
            'https://googleads.googleapis.com/v19/customers/5550001111/googleAds:searchStream',
        ]);
        expect(JSON.parse(String(fetch.mock.calls[0]?.[1]?.body))).toEqual({
            query: "SELECT campaign.id, metrics.clicks, segments.date FROM campaign WHERE segments.date BETWEEN '2024-03-07' AND '2024-03-09'",
        });
        expect(loads[0]?.rows).toEqual([
            {
                campaign_id: '1234567890-1',
                metrics_clicks: '3',
                segments_date: '2024-03-09T00:00:00.000Z',
                customer_id: '1234567890',
                ingestion_time: '2024-03-10T15:00:00.000Z',
            },
            {
                campaign_id: '5550001111-1',
                metrics_clicks: '3',
                segments_date: '2024-03-09T00:00:00.000Z',
                customer_id: '5550001111',
                ingestion_time: '2024-03-10T15:00:00.000Z',
            },
        ]);
    });

    it('refreshes by customer id when delete_existing is set', async () => {
        const { connector, loads } = setup();

        await connector.load({
            customer_ids: ['1234567890'],
            query: 'SELECT campaign.id FROM campaign',
            google_ads_secret_id: 'ads-key',
            delete_existing: true,
            partition_column: 'segments_date',
        });

        expect(loads[0]?.refresh).toEqual({
            startDate: '2024-03-09',
            endDate: '2024-03-09',
            entityIds: ['1234567890'],
            partitionColumn: 'segments_date',
            entityColumn: 'customer_id',
        });
    });

    it('fails with SecretResolutionError when the stored secret lacks a refresh token', async () => {
        const { refresh_token: _dropped, ...incomplete } = ADS_SECRET;
        const { connector, fetch, loads } = setup({ 'ads-key': JSON.stringify(incomplete), 'bq-key': JSON.stringify(TEST_SERVICE_ACCOUNT) });

        await expect(
            connector.load({ customer_ids: ['1234567890'], query: 'SELECT campaign.id FROM campaign', google_ads_secret_id: 'ads-key' })
        ).rejects.toThrow(new SecretResolutionError('Malformed Google Ads secret payload (refresh_token)'));
        expect(fetch).not.toHaveBeenCalled();
        expect(loads).toHaveLength(0);
    });
});
