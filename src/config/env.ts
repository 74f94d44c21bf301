import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod';
import { CONNECTOR_NAMES, type ConnectorDefaults } from '@/connectors/types.js';

const optional = z.string().min(1).optional();

export const env = createEnv({
  server: {
    PORT: z.coerce.number().default(8080),
    CONNECTOR: z.enum(CONNECTOR_NAMES).default('dv360'),
    DEFAULT_TIMEZONE: z.string().min(1).default('America/Sao_Paulo'),
    SECRET_PROJECT_ID: optional,
    BQ_SECRET_ID: optional,
    VENDOR_SECRET_ID: optional,
    DESTINATION_PROJECT_ID: optional,
    DESTINATION_DATASET: optional,
    DESTINATION_TABLE: optional,
    NOTIFICATION_WEBHOOK_URL: z.string().url().optional(),
    GOOGLE_ADS_API_VERSION: z.string().min(1).default('v19'),
    TIKTOK_API_VERSION: z.string().min(1).default('v1.3'),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export function toConnectorDefaults(): ConnectorDefaults {
  return {
    timezone: env.DEFAULT_TIMEZONE,
    secretProjectId: env.SECRET_PROJECT_ID,
    bqSecretId: env.BQ_SECRET_ID,
    vendorSecretId: env.VENDOR_SECRET_ID,
    destinationProjectId: env.DESTINATION_PROJECT_ID,
    destinationDataset: env.DESTINATION_DATASET,
    destinationTable: env.DESTINATION_TABLE,
    notificationWebhookUrl: env.NOTIFICATION_WEBHOOK_URL,
    googleAdsApiVersion: env.GOOGLE_ADS_API_VERSION,
    tiktokApiVersion: env.TIKTOK_API_VERSION,
  };
}
