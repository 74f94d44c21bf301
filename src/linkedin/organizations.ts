/**
 * LinkedIn API - Organization Bridges
 * Administered organizations and follower counts
 */

import { z } from 'zod';
import { withTracking } from '@/utils/api-tracker.js';
import { parseJsonResponse, REQUEST_TIMEOUT_MS } from '@/utils/http.js';
import { buildHeaders, getApiBaseUrl, type LinkedInContext } from './config.js';

// ============================================================================
// Schemas
// ============================================================================

const organizationAclSchema = z.object({
    organizationalTarget: z.string(),
    'organizationalTarget~': z
        .object({
            localizedName: z.string().optional(),
        })
        .optional(),
});

const organizationAclsResponseSchema = z.object({
    elements: z.array(organizationAclSchema).default([]),
});

const networkSizeResponseSchema = z.object({
    firstDegreeSize: z.number().int().default(0),
});

// ============================================================================
// Types
// ============================================================================

export interface AdministeredOrganization {
    urn: string;
    name: string | null;
}

// ============================================================================
// API Bridge Functions
// ============================================================================

/**
 * Organizations the token's member administers (organizationalEntityAcls)
 */
export async function listAdministeredOrganizations(ctx: LinkedInContext): Promise<AdministeredOrganization[]> {
    return withTracking({ apiName: 'organizationalEntityAcls', platform: 'linkedin', logger: ctx.logger }, async () => {
        const url =
            `${getApiBaseUrl(ctx)}/organizationalEntityAcls` +
            '?q=roleAssignee&role=ADMINISTRATOR&state=APPROVED' +
            '&projection=(elements*(organizationalTarget~(localizedName)))';

        const response = await ctx.fetch(url, {
            method: 'GET',
            headers: buildHeaders(ctx),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        const { elements } = await parseJsonResponse(response, organizationAclsResponseSchema, 'list LinkedIn organizations');
        return elements.map(element => ({
            urn: element.organizationalTarget,
            name: element['organizationalTarget~']?.localizedName ?? null,
        }));
    });
}

/**
 * Follower count of an organization (networkSizes)
 */
export async function getFollowerCount(ctx: LinkedInContext, organizationUrn: string): Promise<number> {
    return withTracking({ apiName: 'networkSizes', platform: 'linkedin', logger: ctx.logger }, async () => {
        const url = `${getApiBaseUrl(ctx)}/networkSizes/${encodeURIComponent(organizationUrn)}?edgeType=CompanyFollowedByMember`;

        const response = await ctx.fetch(url, {
            method: 'GET',
            headers: buildHeaders(ctx),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        const { firstDegreeSize } = await parseJsonResponse(response, networkSizeResponseSchema, `get LinkedIn followers for ${organizationUrn}`);
        return firstDegreeSize;
    });
}
