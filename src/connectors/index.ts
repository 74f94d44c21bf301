import { BigQuery } from '@google-cloud/bigquery';
import { SecretManagerServiceClient } from '@google-cloud/secret-manager';
import { Storage } from '@google-cloud/storage';
import { createDv360TokenProvider } from '@/dv360/auth.js';
import { createDv360ReportApi } from '@/dv360/client.js';
import { createBigQueryClient, createWarehouseLoader } from '@/gcp/bigquery.js';
import { createSecretResolver } from '@/gcp/secrets.js';
import { createObjectStorage } from '@/gcp/storage.js';
import { createChatNotifier } from '@/notify/chat.js';
import type { SimpleLogger } from '@/utils/logger.js';
import { createThrottledFetch } from '@/utils/throttled-fetch.js';
import { createDv360Connector } from './dv360.js';
import { createGoogleAdsConnector } from './google-ads.js';
import { createLinkedInConnector } from './linkedin.js';
import { createTikTokConnector } from './tiktok.js';
import type { Connector, ConnectorDefaults, ConnectorName, ConnectorRuntime } from './types.js';

export type { Connector, ConnectorDefaults, ConnectorName, ConnectorResult } from './types.js';
export { CONNECTOR_NAMES } from './types.js';

/**
 * Runtime backed by Google Cloud clients. Secret Manager uses the service's
 * ambient credentials; BigQuery uses the key resolved for each invocation.
 */
export function createRuntime(logger: SimpleLogger): ConnectorRuntime {
    const secretClient = new SecretManagerServiceClient();

    return {
        secrets: createSecretResolver({ accessSecretVersion: request => secretClient.accessSecretVersion(request) }),
        createLoader: (credentials, projectId) => {
            const bigquery = new BigQuery({
                projectId,
                credentials: { client_email: credentials.client_email, private_key: credentials.private_key },
            });
            return createWarehouseLoader(createBigQueryClient(bigquery), logger);
        },
        notifier: createChatNotifier((url, init) => fetch(url, init), logger),
        logger,
    };
}

export function createConnector(name: ConnectorName, defaults: ConnectorDefaults, runtime: ConnectorRuntime): Connector {
    const fetch = createThrottledFetch();

    switch (name) {
        case 'dv360':
            return createDv360Connector(runtime, defaults, {
                createReportApi: (credentials, logger) => createDv360ReportApi({ fetch, getAccessToken: createDv360TokenProvider(credentials), logger }),
                createStorage: credentials => createObjectStorage(new Storage({ credentials })),
            });
        case 'google-ads':
            return createGoogleAdsConnector(runtime, defaults, { fetch });
        case 'tiktok':
            return createTikTokConnector(runtime, defaults, { fetch });
        case 'linkedin':
            return createLinkedInConnector(runtime, defaults, { fetch });
    }
}
