/**
 * Google Secret Manager - Secret Resolver
 * Reads versioned secret payloads and decodes them as JSON or raw text
 */

import { z } from 'zod';
import { errorMessage, SecretResolutionError } from '@/utils/errors.js';

// ============================================================================
// Schemas
// ============================================================================

export const serviceAccountSchema = z.object({
    type: z.string().optional(),
    project_id: z.string().optional(),
    client_email: z.string().min(1),
    private_key: z.string().min(1),
    private_key_id: z.string().optional(),
    client_id: z.string().optional(),
    universe_domain: z.string().optional(),
});

const authorizedUserSchema = z.object({
    type: z.literal('authorized_user').optional(),
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    refresh_token: z.string().min(1),
    quota_project_id: z.string().optional(),
});

/** Service-account key or authorized-user credential accepted by google-auth-library */
export const googleCredentialsSchema = z.union([serviceAccountSchema, authorizedUserSchema]);

const accessTokenPayloadSchema = z.union([z.string().min(1), z.object({ access_token: z.string().min(1) }).passthrough()]);

// ============================================================================
// Types
// ============================================================================

export type ServiceAccountKey = z.infer<typeof serviceAccountSchema>;
export type GoogleCredentials = z.infer<typeof googleCredentialsSchema>;

export interface SecretResolver {
    resolve(projectId: string, secretId: string, version?: string): Promise<string>;
}

export type AccessSecretVersionResult = [{ payload?: { data?: Uint8Array | string | null } | null }, ...unknown[]];

/**
 * The one SecretManagerServiceClient call the resolver makes.
 */
export interface SecretVersionAccessor {
    accessSecretVersion(request: { name: string }): Promise<AccessSecretVersionResult>;
}

export interface SecretReference {
    projectId: string;
    secretId: string;
    version?: string;
}

// ============================================================================
// Resolver
// ============================================================================

export function secretVersionName({ projectId, secretId, version = 'latest' }: SecretReference): string {
    return `projects/${projectId}/secrets/${secretId}/versions/${version}`;
}

/**
 * Resolver backed by Secret Manager. Payloads are decoded as UTF-8.
 */
export function createSecretResolver(client: SecretVersionAccessor): SecretResolver {
    return {
        async resolve(projectId, secretId, version = 'latest') {
            const name = secretVersionName({ projectId, secretId, version });

            let data: Uint8Array | string | null | undefined;
            try {
                const [response] = await client.accessSecretVersion({ name });
                data = response.payload?.data;
            } catch (error) {
                throw new SecretResolutionError(`Failed to access secret ${name}: ${errorMessage(error)}`, { cause: error, context: { projectId, secretId, version } });
            }

            if (data === null || data === undefined) {
                throw new SecretResolutionError(`Secret ${name} has no payload`, { context: { projectId, secretId, version } });
            }

            return typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
        },
    };
}

/**
 * Parsed JSON when the payload is JSON, the raw text otherwise.
 */
export function parseSecretPayload(payload: string): unknown {
    try {
        const parsed: unknown = JSON.parse(payload);
        return parsed;
    } catch {
        return payload;
    }
}

/**
 * Resolve a secret and validate its decoded payload.
 * @throws SecretResolutionError when the payload is missing or malformed
 */
export async function resolveSecretAs<T>(resolver: SecretResolver, ref: SecretReference, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): Promise<T> {
    let raw: string;
    try {
        raw = await resolver.resolve(ref.projectId, ref.secretId, ref.version);
    } catch (error) {
        if (error instanceof SecretResolutionError) {
            throw error;
        }
        throw new SecretResolutionError(`Failed to resolve ${label} secret: ${errorMessage(error)}`, { cause: error, context: { secretId: ref.secretId } });
    }

    const result = schema.safeParse(parseSecretPayload(raw));
    if (!result.success) {
        // issue paths only; never echo secret values
        const fields = result.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
        throw new SecretResolutionError(`Malformed ${label} secret payload (${fields})`, { context: { secretId: ref.secretId } });
    }
    return result.data;
}

export function resolveServiceAccount(resolver: SecretResolver, ref: SecretReference, label = 'BigQuery'): Promise<ServiceAccountKey> {
    return resolveSecretAs(resolver, ref, serviceAccountSchema, label);
}

/**
 * Access token stored either as raw text or as `{ "access_token": "..." }`.
 */
export async function resolveAccessToken(resolver: SecretResolver, ref: SecretReference, label: string): Promise<string> {
    const payload = await resolveSecretAs(resolver, ref, accessTokenPayloadSchema, label);
    return typeof payload === 'string' ? payload.trim() : payload.access_token;
}
