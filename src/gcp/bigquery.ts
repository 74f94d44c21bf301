/**
 * BigQuery Warehouse Loader
 * Optional delete-range refresh followed by an append-only load job
 */

import type { BigQuery } from '@google-cloud/bigquery';
import { z } from 'zod';
import type { NormalizedRow } from '@/lib/normalize/index.js';
import { errorMessage, ValidationError, WarehouseLoadError } from '@/utils/errors.js';
import { logger as rootLogger, type SimpleLogger } from '@/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface WarehouseDestination {
    projectId: string;
    datasetId: string;
    tableId: string;
}

/**
 * Delete rows whose DATE(partitionColumn) falls in [startDate, endDate]
 * (and whose entity column matches, when ids are given) before appending.
 */
export interface RefreshPolicy {
    startDate: string;
    endDate: string;
    entityIds: readonly string[];
    partitionColumn: string;
    /** Column holding the entity ids; defaults to account_id */
    entityColumn?: string;
}

export interface WarehouseLoader {
    load(rows: readonly NormalizedRow[], destination: WarehouseDestination, refresh?: RefreshPolicy): Promise<number>;
}

export interface QueryRequest {
    query: string;
    params: Record<string, string | string[]>;
    types: Record<string, string | string[]>;
}

/**
 * The two BigQuery operations the loader needs.
 */
export interface WarehouseClient {
    runQuery(request: QueryRequest): Promise<void>;
    appendRows(destination: WarehouseDestination, rows: readonly NormalizedRow[]): Promise<number>;
}

// ============================================================================
// SQL
// ============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TABLE_PART = /^[A-Za-z0-9_-]+$/;

export function destinationId({ projectId, datasetId, tableId }: WarehouseDestination): string {
    return `${projectId}.${datasetId}.${tableId}`;
}

function assertIdentifier(kind: string, value: string, pattern: RegExp) {
    if (!pattern.test(value)) {
        throw new ValidationError(`Invalid ${kind}: ${value}`);
    }
}

/**
 * Parameterized DELETE for a refresh. Identifiers cannot be bound as
 * parameters, so they are validated instead.
 */
export function buildDeleteStatement(destination: WarehouseDestination, refresh: RefreshPolicy): QueryRequest {
    const entityColumn = refresh.entityColumn ?? 'account_id';
    assertIdentifier('project id', destination.projectId, TABLE_PART);
    assertIdentifier('dataset id', destination.datasetId, TABLE_PART);
    assertIdentifier('table id', destination.tableId, TABLE_PART);
    assertIdentifier('partition column', refresh.partitionColumn, IDENTIFIER);
    assertIdentifier('entity column', entityColumn, IDENTIFIER);

    const conditions = [`DATE(${refresh.partitionColumn}) BETWEEN @start_date AND @end_date`];
    const params: QueryRequest['params'] = { start_date: refresh.startDate, end_date: refresh.endDate };
    const types: QueryRequest['types'] = { start_date: 'DATE', end_date: 'DATE' };

    if (refresh.entityIds.length > 0) {
        conditions.push(`${entityColumn} IN UNNEST(@entity_ids)`);
        params.entity_ids = [...refresh.entityIds];
        types.entity_ids = ['STRING'];
    }

    return {
        query: `DELETE FROM \`${destinationId(destination)}\` WHERE ${conditions.join(' AND ')}`,
        params,
        types,
    };
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Loader that runs the refresh DELETE (when asked) and then the append. An
 * empty batch skips both and loads nothing.
 */
export function createWarehouseLoader(client: WarehouseClient, logger: SimpleLogger = rootLogger): WarehouseLoader {
    return {
        async load(rows, destination, refresh) {
            const table = destinationId(destination);
            const log = logger.child({ destination: table });

            if (rows.length === 0) {
                log.info('No rows to load');
                return 0;
            }

            if (refresh) {
                const statement = buildDeleteStatement(destination, refresh);
                try {
                    await client.runQuery(statement);
                } catch (error) {
                    throw new WarehouseLoadError(`Failed to delete existing rows from ${table}: ${errorMessage(error)}`, {
                        cause: error,
                        context: { destination: table, startDate: refresh.startDate, endDate: refresh.endDate, entityIds: refresh.entityIds },
                    });
                }
                log.info({ startDate: refresh.startDate, endDate: refresh.endDate, entityIds: refresh.entityIds }, 'Removed existing rows for date range');
            }

            let loaded: number;
            try {
                loaded = await client.appendRows(destination, rows);
            } catch (error) {
                throw new WarehouseLoadError(`Failed to load rows into ${table}: ${errorMessage(error)}`, { cause: error, context: { destination: table, rows: rows.length } });
            }

            log.info({ rows: loaded }, 'Loaded rows');
            return loaded;
        },
    };
}

// ============================================================================
// BigQuery client
// ============================================================================

const loadJobSchema = z.object({
    metadata: z.object({
        status: z
            .object({
                errorResult: z.object({ message: z.string() }).nullish(),
            })
            .optional(),
        statistics: z
            .object({
                load: z.object({ outputRows: z.coerce.number() }).optional(),
            })
            .optional(),
    }),
});

export function toNdjson(rows: readonly NormalizedRow[]): string {
    return rows.map(row => JSON.stringify(row)).join('\n');
}

/**
 * WarehouseClient on top of a BigQuery instance. Appends run as
 * NEWLINE_DELIMITED_JSON load jobs rather than streaming inserts, so freshly
 * loaded rows stay deletable by the next refresh.
 */
export function createBigQueryClient(bigquery: BigQuery): WarehouseClient {
    return {
        async runQuery({ query, params, types }) {
            await bigquery.query({ query, params, types });
        },

        appendRows(destination, rows) {
            const table = bigquery.dataset(destination.datasetId, { projectId: destination.projectId }).table(destination.tableId);

            return new Promise<number>((resolve, reject) => {
                const stream = table.createWriteStream({
                    sourceFormat: 'NEWLINE_DELIMITED_JSON',
                    writeDisposition: 'WRITE_APPEND',
                    createDisposition: 'CREATE_IF_NEEDED',
                    autodetect: true,
                });

                stream.on('error', reject);
                stream.on('complete', (job: unknown) => {
                    const parsed = loadJobSchema.safeParse(job);
                    if (!parsed.success) {
                        reject(new Error('Load job finished without metadata'));
                        return;
                    }
                    const { status, statistics } = parsed.data.metadata;
                    if (status?.errorResult) {
                        reject(new Error(status.errorResult.message));
                        return;
                    }
                    resolve(statistics?.load?.outputRows ?? rows.length);
                });

                stream.end(toNdjson(rows));
            });
        },
    };
}
