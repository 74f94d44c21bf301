import { describe, expect, it, vi } from 'vitest';
import { ValidationError } from '@/utils/errors.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';
import { createFakeRuntime, TEST_DEFAULTS, TEST_SERVICE_ACCOUNT } from './fakes.js';
import { createLinkedInConnector } from './linkedin.js';

function respond(url: string): unknown {
    if (url.includes('/organizationalEntityAcls')) {
        return {
            elements: [
                { organizationalTarget: 'urn:li:organization:2', 'organizationalTarget~': { localizedName: 'Other' } },
                { organizationalTarget: 'urn:li:organization:1', 'organizationalTarget~': { localizedName: 'Acme' } },
            ],
        };
    }
    if (url.includes('/networkSizes/')) {
        return { firstDegreeSize: 1500 };
    }
    if (url.includes('/ugcPosts?')) {
        return {
            elements: [
                {
                    id: 'urn:li:share:10',
                    author: 'urn:li:organization:1',
                    created: { time: Date.parse('2024-03-08T12:00:00Z') },
                    specificContent: { 'com.linkedin.ugc.ShareContent': { shareMediaCategory: 'NONE', shareCommentary: { text: 'Hello' } } },
                },
                { id: 'urn:li:ugcPost:20', author: 'urn:li:organization:1' },
                { author: 'urn:li:organization:1' },
            ],
        };
    }
    if (url.includes('shares=List')) {
        return { elements: [{ totalShareStatistics: { impressionCount: 100, likeCount: 5 } }] };
    }
    return { elements: [] };
}

function setup() {
    const fake = createFakeRuntime({ 'linkedin-token': JSON.stringify({ access_token: 'test-token' }), 'bq-key': JSON.stringify(TEST_SERVICE_ACCOUNT) });
    const fetch = vi.fn<FetchLike>(async url => new Response(JSON.stringify(respond(url)), { status: 200 }));
    const connector = createLinkedInConnector(fake.runtime, TEST_DEFAULTS, { fetch });
    return { ...fake, fetch, connector };
}

const REQUEST = {
    organization_urn: 'urn:li:organization:1',
    client_name: 'Acme',
    posts_count: 3,
    linkedin_secret_id: 'linkedin-token',
    destination_general_table: 'linkedin_general',
    destination_posts_table: 'linkedin_posts',
};

describe('linkedin connector', () => {
    it('loads the organization snapshot and its posts into two tables', async () => {
        const { connector, fetch, loads } = setup();

        const result = await connector.load(REQUEST);

        expect(result).toEqual({
            success: true,
            rows_loaded: { general: 1, posts: 2 },
            date_range: ['2024-03-08', '2024-03-08'],
            destination: { general: 'warehouse-project.ads.linkedin_general', posts: 'warehouse-project.ads.linkedin_posts' },
        });
        expect(fetch.mock.calls[0]?.[1]?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
        expect(loads.map(load => load.destination.tableId)).toEqual(['linkedin_general', 'linkedin_posts']);
        expect(loads[0]?.rows).toEqual([
            { date_insertion: '2024-03-08T00:00:00.000Z', id: 'urn:li:organization:1', client: 'Acme', followers: '1500' },
        ]);
        expect(loads[1]?.rows[0]).toMatchObject({
            date_insertion: '2024-03-08T00:00:00.000Z',
            created: '2024-03-08T00:00:00.000Z',
            post_id: 'urn:li:share:10',
            post_type: 'NONE',
            text: 'Hello',
            impression_count: '100',
            like_count: '5',
            comment_count: null,
        });
        expect(loads[1]?.rows[1]).toMatchObject({ post_id: 'urn:li:ugcPost:20', created: null, impression_count: null });
        expect(loads.every(load => load.refresh === undefined)).toBe(true);
    });

    it('refreshes only the insertion day, without an entity filter', async () => {
        const { connector, loads } = setup();

        await connector.load({ ...REQUEST, delete_existing: true, partition_column: 'date_insertion' });

        expect(loads[1]?.refresh).toEqual({
            startDate: '2024-03-08',
            endDate: '2024-03-08',
            entityIds: [],
            partitionColumn: 'date_insertion',
            entityColumn: 'id',
        });
    });

    it('rejects a client name the token does not administer', async () => {
        const { connector, loads } = setup();

        await expect(connector.load({ ...REQUEST, client_name: 'Unknown' })).rejects.toThrow(
            new ValidationError('Organization not found for client_name: Unknown')
        );
        expect(loads).toHaveLength(0);
    });

    it('requires both destination tables', async () => {
        const { connector, resolve } = setup();
        const { destination_posts_table: _omitted, ...incomplete } = REQUEST;

        await expect(connector.load(incomplete)).rejects.toBeInstanceOf(ValidationError);
        expect(resolve).not.toHaveBeenCalled();
    });
});
