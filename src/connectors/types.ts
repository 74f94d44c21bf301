import type { WarehouseLoader } from '@/gcp/bigquery.js';
import type { SecretResolver, ServiceAccountKey } from '@/gcp/secrets.js';
import type { Notifier } from '@/notify/chat.js';
import type { SimpleLogger } from '@/utils/logger.js';

// ============================================================================
// Connector Types
// ============================================================================

export const CONNECTOR_NAMES = ['dv360', 'google-ads', 'tiktok', 'linkedin'] as const;
export type ConnectorName = (typeof CONNECTOR_NAMES)[number];

/**
 * Fallbacks for request fields, taken from the environment at startup.
 */
export interface ConnectorDefaults {
    timezone: string;
    secretProjectId?: string;
    bqSecretId?: string;
    vendorSecretId?: string;
    destinationProjectId?: string;
    destinationDataset?: string;
    destinationTable?: string;
    notificationWebhookUrl?: string;
    googleAdsApiVersion: string;
    tiktokApiVersion: string;
}

/**
 * Collaborators shared by every connector. Each invocation builds its own
 * clients through these; nothing is cached across invocations.
 */
export interface ConnectorRuntime {
    secrets: SecretResolver;
    createLoader: (credentials: ServiceAccountKey, projectId: string) => WarehouseLoader;
    notifier: Notifier;
    logger: SimpleLogger;
    now?: () => Date;
    createInvocationId?: () => string;
}

export interface LoadResult {
    success: true;
    rows_loaded: number;
    date_range: [string, string];
    destination: string;
}

/** Result of connectors that write several tables in one run */
export interface MultiTableLoadResult {
    success: true;
    rows_loaded: Record<string, number>;
    date_range: [string, string];
    destination: Record<string, string>;
}

export type ConnectorResult = LoadResult | MultiTableLoadResult;

export interface Connector {
    readonly name: ConnectorName;
    load(body: unknown): Promise<ConnectorResult>;
}
