import { z } from 'zod';
import { computeDateRange, type DateRange } from '@/lib/date-range.js';
import type { RefreshPolicy, WarehouseDestination } from '@/gcp/bigquery.js';
import { ValidationError } from '@/utils/errors.js';
import type { ConnectorDefaults } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

const optionalText = z.string().trim().min(1).nullish();

export const idListSchema = z.array(z.union([z.string().min(1), z.number()]).transform(String)).min(1);

export const nameListSchema = z.array(z.string().trim().min(1)).min(1);

/**
 * Fields every connector accepts. Identifiers left out fall back to the
 * environment defaults.
 */
export const baseRequestSchema = z.object({
    timezone: optionalText,
    start_date: optionalText,
    end_date: optionalText,
    reprocess_last_x_days: z.number().int().min(0).nullish(),
    secret_project_id: optionalText,
    bq_secret_id: optionalText,
    destination_project_id: optionalText,
    destination_dataset: optionalText,
    destination_table: optionalText,
    delete_existing: z.boolean().nullish(),
    partition_column: optionalText,
    entity_column: optionalText,
    drop_columns: z.array(z.string()).nullish(),
    notification_webhook_url: z.string().url().nullish(),
});

export type BaseRequest = z.infer<typeof baseRequestSchema>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Validate a request body.
 * @throws ValidationError naming every offending field
 */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
    const result = schema.safeParse(body ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
        throw new ValidationError(`Invalid request: ${issues}`);
    }
    return result.data;
}

export function requireParameter(value: string | null | undefined, fallback: string | undefined, name: string): string {
    const resolved = value ?? fallback;
    if (!resolved) {
        throw new ValidationError(`Missing required parameter: ${name}`);
    }
    return resolved;
}

export function resolveDateRange(request: BaseRequest, defaults: ConnectorDefaults, now: Date): DateRange {
    return computeDateRange({
        timezone: request.timezone ?? defaults.timezone,
        startDate: request.start_date,
        endDate: request.end_date,
        reprocessLastXDays: request.reprocess_last_x_days,
        now,
    });
}

export interface SecretIds {
    projectId: string;
    bqSecretId: string;
    vendorSecretId: string;
}

export function resolveSecretIds(request: BaseRequest, vendorSecretId: string | null | undefined, vendorField: string, defaults: ConnectorDefaults): SecretIds {
    return {
        projectId: requireParameter(request.secret_project_id, defaults.secretProjectId, 'secret_project_id'),
        bqSecretId: requireParameter(request.bq_secret_id, defaults.bqSecretId, 'bq_secret_id'),
        vendorSecretId: requireParameter(vendorSecretId, defaults.vendorSecretId, vendorField),
    };
}

export interface TableParameter {
    value: string | null | undefined;
    fallback: string | undefined;
    field: string;
}

export function resolveDestination(
    request: BaseRequest,
    defaults: ConnectorDefaults,
    table: TableParameter = { value: request.destination_table, fallback: defaults.destinationTable, field: 'destination_table' }
): WarehouseDestination {
    return {
        projectId: requireParameter(request.destination_project_id, defaults.destinationProjectId, 'destination_project_id'),
        datasetId: requireParameter(request.destination_dataset, defaults.destinationDataset, 'destination_dataset'),
        tableId: requireParameter(table.value, table.fallback, table.field),
    };
}

/**
 * Refresh policy for a delete-then-append load, or undefined for a plain append.
 */
export function resolveRefresh(options: {
    deleteExisting: boolean;
    partitionColumn: string | null | undefined;
    range: DateRange;
    entityIds: readonly string[];
    entityColumn: string;
}): RefreshPolicy | undefined {
    if (!options.deleteExisting) {
        return undefined;
    }
    if (!options.partitionColumn) {
        throw new ValidationError('partition_column is required when delete_existing is true');
    }
    return {
        startDate: options.range.startDate,
        endDate: options.range.endDate,
        entityIds: options.entityIds,
        partitionColumn: options.partitionColumn,
        entityColumn: options.entityColumn,
    };
}
