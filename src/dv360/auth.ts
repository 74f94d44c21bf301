/**
 * DV360 API Authentication
 * Exchanges a stored Google credential for short-lived access tokens
 */

import { GoogleAuth } from 'google-auth-library';
import type { GoogleCredentials } from '@/gcp/secrets.js';
import { errorMessage, VendorApiError } from '@/utils/errors.js';
import { DV360_SCOPES } from './config.js';

export interface AccessTokenSource {
    getAccessToken(): Promise<string | null | undefined>;
}

/**
 * Token provider for a service-account or authorized-user credential.
 * google-auth-library caches the token and refreshes it before expiry.
 */
export function createAccessTokenProvider(source: AccessTokenSource, label: string): () => Promise<string> {
    return async () => {
        let token: string | null | undefined;
        try {
            token = await source.getAccessToken();
        } catch (error) {
            throw new VendorApiError(`Failed to fetch ${label} access token: ${errorMessage(error)}`, { cause: error });
        }
        if (!token) {
            throw new VendorApiError(`Failed to fetch ${label} access token: empty token`);
        }
        return token;
    };
}

export function createDv360TokenProvider(credentials: GoogleCredentials): () => Promise<string> {
    const auth = new GoogleAuth({ credentials, scopes: DV360_SCOPES });
    return createAccessTokenProvider(auth, 'DV360');
}
