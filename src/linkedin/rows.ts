import type { RawRow } from '@/lib/normalize/index.js';
import { isoDateInTimezone } from '@/utils/date.js';
import type { ShareStatistics, UgcPost } from './posts.js';

const EMBED_URL = 'https://www.linkedin.com/embed/feed/update/';

export interface GeneralRowInput {
    dateInsertion: string;
    organizationUrn: string;
    organizationName: string;
    followers: number;
}

export function buildGeneralRow(input: GeneralRowInput): RawRow {
    return {
        date_insertion: input.dateInsertion,
        id: input.organizationUrn,
        client: input.organizationName,
        followers: input.followers,
    };
}

function singleLine(text: string): string {
    return text.replace(/[\r\n]/g, ' ');
}

/**
 * One row per post, with its lifetime share statistics. `created` is the
 * post's calendar date in the given timezone.
 */
export function buildPostRow(post: UgcPost & { id: string }, stats: ShareStatistics, dateInsertion: string, timezone: string): RawRow {
    const content = post.specificContent?.['com.linkedin.ugc.ShareContent'];
    const createdAt = post.created?.time;

    return {
        date_insertion: dateInsertion,
        author: post.author ?? null,
        created: createdAt === undefined ? null : isoDateInTimezone(new Date(createdAt), timezone),
        post_id: post.id,
        post_type: content?.shareMediaCategory ?? null,
        text: singleLine(content?.shareCommentary?.text ?? ''),
        thumbnail_url: content?.media?.[0]?.originalUrl ?? '',
        url: `${EMBED_URL}${post.id}`,
        unique_impressions_count: stats.uniqueImpressionsCount ?? null,
        share_count: stats.shareCount ?? null,
        engagement: stats.engagement ?? null,
        click_count: stats.clickCount ?? null,
        like_count: stats.likeCount ?? null,
        impression_count: stats.impressionCount ?? null,
        comment_count: stats.commentCount ?? null,
    };
}
