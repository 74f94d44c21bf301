/**
 * LinkedIn connector
 *
 * Snapshots an organization's follower count and its latest posts with their
 * statistics into two tables. Rows are stamped with an insertion date two
 * days back, when LinkedIn's statistics have settled.
 */

import { z } from 'zod';
import { destinationId } from '@/gcp/bigquery.js';
import { resolveAccessToken, resolveServiceAccount } from '@/gcp/secrets.js';
import type { LinkedInContext } from '@/linkedin/config.js';
import { getFollowerCount, listAdministeredOrganizations } from '@/linkedin/organizations.js';
import { getShareStatistics, listPosts } from '@/linkedin/posts.js';
import { buildGeneralRow, buildPostRow } from '@/linkedin/rows.js';
import { normalizeRows, type RawRow } from '@/lib/normalize/index.js';
import { isoDateInTimezone, isValidTimezone, shiftIsoDate } from '@/utils/date.js';
import { ValidationError } from '@/utils/errors.js';
import type { FetchLike } from '@/utils/throttled-fetch.js';
import { baseRequestSchema, parseRequest, resolveDestination, resolveRefresh, resolveSecretIds } from './request.js';
import { runInvocation } from './run.js';
import type { Connector, ConnectorDefaults, ConnectorRuntime, MultiTableLoadResult } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

export const linkedinRequestSchema = baseRequestSchema
    .omit({ start_date: true, end_date: true, reprocess_last_x_days: true, destination_table: true, entity_column: true })
    .extend({
        organization_urn: z.string().trim().min(1),
        client_name: z.string().trim().min(1),
        posts_count: z.number().int().min(1).nullish(),
        linkedin_secret_id: z.string().trim().min(1).nullish(),
        destination_general_table: z.string().trim().min(1),
        destination_posts_table: z.string().trim().min(1),
    });

export type LinkedInRequest = z.infer<typeof linkedinRequestSchema>;

// ============================================================================
// Connector
// ============================================================================

export const LINKEDIN_DEFAULTS = {
    postsCount: 40,
    insertionLagDays: 2,
    generalTimestampColumns: ['date_insertion'],
    postsTimestampColumns: ['created', 'date_insertion'],
} as const;

export interface LinkedInDependencies {
    fetch: FetchLike;
}

export function createLinkedInConnector(runtime: ConnectorRuntime, defaults: ConnectorDefaults, deps: LinkedInDependencies): Connector {
    return {
        name: 'linkedin',
        load: body =>
            runInvocation<MultiTableLoadResult>('linkedin', runtime, defaults, async ({ log, now, tracker }) => {
                const request = parseRequest(linkedinRequestSchema, body);
                tracker.setWebhookUrl(request.notification_webhook_url);

                const timezone = request.timezone ?? defaults.timezone;
                if (!isValidTimezone(timezone)) {
                    throw new ValidationError(`Unknown timezone: ${timezone}`);
                }
                const dateInsertion = shiftIsoDate(isoDateInTimezone(now(), timezone), -LINKEDIN_DEFAULTS.insertionLagDays);
                const range = { startDate: dateInsertion, endDate: dateInsertion };

                const secretIds = resolveSecretIds(request, request.linkedin_secret_id, 'linkedin_secret_id', defaults);
                const general = resolveDestination(request, defaults, {
                    value: request.destination_general_table,
                    fallback: undefined,
                    field: 'destination_general_table',
                });
                const posts = resolveDestination(request, defaults, {
                    value: request.destination_posts_table,
                    fallback: undefined,
                    field: 'destination_posts_table',
                });
                const refresh = resolveRefresh({
                    deleteExisting: request.delete_existing ?? false,
                    partitionColumn: request.partition_column,
                    range,
                    entityIds: [],
                    entityColumn: 'id',
                });

                tracker.update({
                    dateRange: [dateInsertion, dateInsertion],
                    destination: { general: destinationId(general), posts: destinationId(posts) },
                    entityIds: [request.organization_urn],
                });

                const accessToken = await resolveAccessToken(runtime.secrets, { projectId: secretIds.projectId, secretId: secretIds.vendorSecretId }, 'LinkedIn');
                const bqCredentials = await resolveServiceAccount(runtime.secrets, { projectId: secretIds.projectId, secretId: secretIds.bqSecretId });

                const ctx: LinkedInContext = { fetch: deps.fetch, accessToken, logger: log };

                const organizations = await listAdministeredOrganizations(ctx);
                const organization = organizations.find(candidate => candidate.name === request.client_name);
                if (!organization) {
                    throw new ValidationError(`Organization not found for client_name: ${request.client_name}`, {
                        context: { administered: organizations.length },
                    });
                }

                const followers = await getFollowerCount(ctx, request.organization_urn);
                const generalRows = [
                    buildGeneralRow({ dateInsertion, organizationUrn: organization.urn, organizationName: request.client_name, followers }),
                ];

                const postRows: RawRow[] = [];
                for (const post of await listPosts(ctx, request.organization_urn, request.posts_count ?? LINKEDIN_DEFAULTS.postsCount)) {
                    const { id } = post;
                    if (!id) {
                        continue;
                    }
                    const stats = await getShareStatistics(ctx, request.organization_urn, id);
                    postRows.push(buildPostRow({ ...post, id }, stats, dateInsertion, timezone));
                }

                log.info({ followers, posts: postRows.length }, 'Fetched organization snapshot');

                const dropColumns = request.drop_columns ?? [];
                const loader = runtime.createLoader(bqCredentials, general.projectId);
                const generalLoaded = await loader.load(
                    normalizeRows(generalRows, { timestampColumns: LINKEDIN_DEFAULTS.generalTimestampColumns, dropColumns }),
                    general,
                    refresh
                );
                const postsLoaded = await loader.load(normalizeRows(postRows, { timestampColumns: LINKEDIN_DEFAULTS.postsTimestampColumns, dropColumns }), posts, refresh);

                return {
                    success: true,
                    rows_loaded: { general: generalLoaded, posts: postsLoaded },
                    date_range: [dateInsertion, dateInsertion],
                    destination: { general: destinationId(general), posts: destinationId(posts) },
                };
            }),
    };
}
