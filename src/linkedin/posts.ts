/**
 * LinkedIn API - Post Bridges
 * Latest organization posts and their share statistics
 */

import { z } from 'zod';
import { withTracking } from '@/utils/api-tracker.js';
import { parseJsonResponse, REQUEST_TIMEOUT_MS } from '@/utils/http.js';
import { buildHeaders, getApiBaseUrl, type LinkedInContext } from './config.js';

// ============================================================================
// Schemas
// ============================================================================

const shareContentSchema = z.object({
    shareMediaCategory: z.string().optional(),
    shareCommentary: z.object({ text: z.string().optional() }).optional(),
    media: z.array(z.object({ originalUrl: z.string().optional() }).passthrough()).optional(),
});

const ugcPostSchema = z.object({
    id: z.string().optional(),
    author: z.string().optional(),
    created: z.object({ time: z.number().optional() }).optional(),
    specificContent: z
        .object({
            'com.linkedin.ugc.ShareContent': shareContentSchema.optional(),
        })
        .optional(),
});

const ugcPostsResponseSchema = z.object({
    elements: z.array(ugcPostSchema).default([]),
});

const shareStatisticsSchema = z.object({
    uniqueImpressionsCount: z.number().optional(),
    shareCount: z.number().optional(),
    engagement: z.number().optional(),
    clickCount: z.number().optional(),
    likeCount: z.number().optional(),
    impressionCount: z.number().optional(),
    commentCount: z.number().optional(),
});

const shareStatisticsResponseSchema = z.object({
    elements: z
        .array(
            z.object({
                totalShareStatistics: shareStatisticsSchema.default({}),
            })
        )
        .default([]),
});

// ============================================================================
// Types
// ============================================================================

export type UgcPost = z.infer<typeof ugcPostSchema>;
export type ShareStatistics = z.infer<typeof shareStatisticsSchema>;

// ============================================================================
// API Bridge Functions
// ============================================================================

/**
 * Latest posts authored by an organization (ugcPosts)
 */
export async function listPosts(ctx: LinkedInContext, organizationUrn: string, count: number): Promise<UgcPost[]> {
    return withTracking({ apiName: 'ugcPosts', platform: 'linkedin', logger: ctx.logger }, async () => {
        const url = `${getApiBaseUrl(ctx)}/ugcPosts?q=authors&authors=List(${encodeURIComponent(organizationUrn)})&sortBy=CREATED&count=${count}`;

        const response = await ctx.fetch(url, {
            method: 'GET',
            headers: buildHeaders(ctx),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        const { elements } = await parseJsonResponse(response, ugcPostsResponseSchema, `list LinkedIn posts for ${organizationUrn}`);
        return elements;
    });
}

/**
 * Lifetime statistics of one post (organizationalEntityShareStatistics).
 * Share URNs and UGC post URNs are looked up under different parameters.
 */
export async function getShareStatistics(ctx: LinkedInContext, organizationUrn: string, postUrn: string): Promise<ShareStatistics> {
    return withTracking({ apiName: 'organizationalEntityShareStatistics', platform: 'linkedin', logger: ctx.logger }, async () => {
        const parameter = postUrn.includes('share') ? 'shares' : 'ugcPosts';
        const url =
            `${getApiBaseUrl(ctx)}/organizationalEntityShareStatistics?q=organizationalEntity` +
            `&organizationalEntity=${encodeURIComponent(organizationUrn)}` +
            `&${parameter}=List(${encodeURIComponent(postUrn)})`;

        const response = await ctx.fetch(url, {
            method: 'GET',
            headers: buildHeaders(ctx),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        const { elements } = await parseJsonResponse(response, shareStatisticsResponseSchema, `get LinkedIn statistics for ${postUrn}`);
        return elements[0]?.totalShareStatistics ?? {};
    });
}
