/**
 * In-process collaborators for connector tests
 */

import { type Mock, vi } from 'vitest';
import type { RefreshPolicy, WarehouseDestination, WarehouseLoader } from '@/gcp/bigquery.js';
import type { SecretResolver, ServiceAccountKey } from '@/gcp/secrets.js';
import type { NormalizedRow } from '@/lib/normalize/index.js';
import type { NotificationSummary, Notifier } from '@/notify/chat.js';
import { silentLogger } from '@/utils/logger.js';
import type { ConnectorDefaults, ConnectorRuntime } from './types.js';

export const TEST_SERVICE_ACCOUNT = {
    type: 'service_account',
    project_id: 'warehouse-project',
    client_email: 'loader@warehouse-project.iam.gserviceaccount.com',
    private_key: 'test-private-key',
};

export const TEST_DEFAULTS: ConnectorDefaults = {
    timezone: 'America/Sao_Paulo',
    secretProjectId: 'secrets-project',
    bqSecretId: 'bq-key',
    destinationProjectId: 'warehouse-project',
    destinationDataset: 'ads',
    destinationTable: 'report',
    googleAdsApiVersion: 'v19',
    tiktokApiVersion: 'v1.3',
};

/** 2024-03-10 in Sao Paulo (UTC-3) */
export const TEST_NOW = new Date('2024-03-10T15:00:00Z');

export interface RecordedLoad {
    rows: readonly NormalizedRow[];
    destination: WarehouseDestination;
    refresh?: RefreshPolicy;
}

export interface FakeRuntime {
    runtime: ConnectorRuntime;
    resolve: Mock<SecretResolver['resolve']>;
    loads: RecordedLoad[];
    loaderCredentials: ServiceAccountKey[];
    notifications: Array<{ webhookUrl: string; summary: NotificationSummary }>;
}

/**
 * Runtime whose secrets come from a map keyed by secret id and whose loader
 * records every batch and reports all of its rows as loaded.
 */
export function createFakeRuntime(secrets: Record<string, string>): FakeRuntime {
    const loads: RecordedLoad[] = [];
    const loaderCredentials: ServiceAccountKey[] = [];
    const notifications: FakeRuntime['notifications'] = [];

    const resolve = vi.fn<SecretResolver['resolve']>(async (_projectId, secretId) => {
        const value = secrets[secretId];
        if (value === undefined) {
            throw new Error(`NOT_FOUND: ${secretId}`);
        }
        return value;
    });

    const loader: WarehouseLoader = {
        async load(rows, destination, refresh) {
            loads.push({ rows, destination, refresh });
            return rows.length;
        },
    };

    const notifier: Notifier = {
        async notify(webhookUrl, summary) {
            notifications.push({ webhookUrl, summary });
        },
    };

    return {
        runtime: {
            secrets: { resolve },
            createLoader: credentials => {
                loaderCredentials.push(credentials);
                return loader;
            },
            notifier,
            logger: silentLogger,
            now: () => TEST_NOW,
            createInvocationId: () => 'test-invocation',
        },
        resolve,
        loads,
        loaderCredentials,
        notifications,
    };
}
