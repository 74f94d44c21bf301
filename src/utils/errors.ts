/**
 * Connector error taxonomy
 *
 * Every failure a connector surfaces carries the HTTP status it maps to and a
 * context record (job ids, entity ids, date range) for log correlation.
 */

export type ErrorContext = Record<string, unknown>;

interface ConnectorErrorOptions {
    cause?: unknown;
    context?: ErrorContext;
}

export abstract class ConnectorError extends Error {
    abstract readonly statusCode: number;
    readonly context: ErrorContext;

    constructor(message: string, options: ConnectorErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.context = options.context ?? {};
    }
}

/** Bad, missing or contradictory request parameters. */
export class ValidationError extends ConnectorError {
    readonly statusCode = 400;
}

export class SecretResolutionError extends ConnectorError {
    readonly statusCode = 500;
}

/** Report definition creation or run trigger was rejected. Never retried. */
export class SubmissionError extends ConnectorError {
    readonly statusCode = 500;
}

export class InvalidLocatorError extends ConnectorError {
    readonly statusCode = 500;
}

export class RetrievalError extends ConnectorError {
    readonly statusCode = 500;
}

/** The client gave up polling; the server never reported a terminal state. */
export class PollExhaustedError extends ConnectorError {
    readonly statusCode = 500;
}

/** The server reported the report run as FAILED. */
export class ReportGenerationError extends ConnectorError {
    readonly statusCode = 500;
}

/** Non-2xx or unexpected response from a vendor API. */
export class VendorApiError extends ConnectorError {
    readonly statusCode = 500;
    /** HTTP status the vendor answered with, when there was a response */
    readonly upstreamStatus?: number;

    constructor(message: string, options: ConnectorErrorOptions & { upstreamStatus?: number } = {}) {
        super(message, options);
        this.upstreamStatus = options.upstreamStatus;
    }
}

export class WarehouseLoadError extends ConnectorError {
    readonly statusCode = 500;
}

export function isConnectorError(error: unknown): error is ConnectorError {
    return error instanceof ConnectorError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Reads an HTTP status attached to an arbitrary thrown value, as vendor
 * bridges and Fastify both do.
 */
export function statusCodeOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
        return undefined;
    }
    const { statusCode } = error;
    return typeof statusCode === 'number' ? statusCode : undefined;
}
