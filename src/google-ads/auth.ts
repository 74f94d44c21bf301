/**
 * Google Ads API Authentication
 * Refreshes OAuth2 access tokens from the stored refresh token
 */

import { OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import { createAccessTokenProvider } from '@/dv360/auth.js';

export const googleAdsSecretSchema = z.object({
    developer_token: z.string().min(1),
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    refresh_token: z.string().min(1),
    login_customer_id: z.union([z.string(), z.number()]).transform(String).optional(),
});

export type GoogleAdsSecret = z.infer<typeof googleAdsSecretSchema>;

export function createGoogleAdsTokenProvider(secret: Pick<GoogleAdsSecret, 'client_id' | 'client_secret' | 'refresh_token'>): () => Promise<string> {
    const client = new OAuth2Client({ clientId: secret.client_id, clientSecret: secret.client_secret });
    client.setCredentials({ refresh_token: secret.refresh_token });

    return createAccessTokenProvider(
        {
            getAccessToken: async () => (await client.getAccessToken()).token,
        },
        'Google Ads'
    );
}
