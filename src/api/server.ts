import helmet from '@fastify/helmet';
import Fastify, { type FastifyInstance } from 'fastify';
import type { Connector } from '@/connectors/index.js';
import { errorMessage, isConnectorError, statusCodeOf } from '@/utils/errors.js';
import { logger as rootLogger, type SimpleLogger } from '@/utils/logger.js';

export interface ServerOptions {
    connector: Connector;
    logger?: SimpleLogger;
}

// ============================================================================
// Server
// ============================================================================

export async function buildServer({ connector, logger = rootLogger }: ServerOptions): Promise<FastifyInstance> {
    const fastify = Fastify({ logger: false });

    await fastify.register(helmet);
    registerRoutes(fastify, connector);
    registerErrorHandlers(fastify, logger);

    return fastify;
}

// ============================================================================
// Helpers
// ============================================================================

function registerRoutes(fastify: FastifyInstance, connector: Connector) {
    fastify.get('/health', async () => ({ status: 'ok' }));

    fastify.post('/load', async request => connector.load(request.body));
}

/**
 * Connector errors map to their own status. Fastify's own client errors
 * (malformed JSON, unsupported media type) become 400; everything else is 500.
 */
export function resolveStatusCode(error: unknown): number {
    if (isConnectorError(error)) {
        return error.statusCode;
    }
    const statusCode = statusCodeOf(error);
    return statusCode !== undefined && statusCode >= 400 && statusCode < 500 ? 400 : 500;
}

function registerErrorHandlers(fastify: FastifyInstance, logger: SimpleLogger) {
    fastify.setNotFoundHandler(async (request, reply) => {
        reply.status(404);
        return { detail: `Route ${request.method} ${request.url} not found` };
    });

    fastify.setErrorHandler(async (error: unknown, request, reply) => {
        const statusCode = resolveStatusCode(error);
        const context = isConnectorError(error) ? error.context : {};

        if (statusCode >= 500) {
            logger.error({ err: errorMessage(error), url: request.url, ...context }, 'Request failed');
        } else {
            logger.warn({ err: errorMessage(error), url: request.url, ...context }, 'Request rejected');
        }

        reply.status(statusCode);
        return { detail: errorMessage(error) };
    });
}
