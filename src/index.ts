import type { FastifyInstance } from 'fastify';
import { buildServer } from '@/api/server.js';
import { env, toConnectorDefaults } from '@/config/env.js';
import { createConnector, createRuntime } from '@/connectors/index.js';
import { logger } from '@/utils/logger.js';

// ============================================================================
// Connector Service Startup
// ============================================================================

async function main() {
    logger.info({ connector: env.CONNECTOR }, 'Starting connector service');

    const connector = createConnector(env.CONNECTOR, toConnectorDefaults(), createRuntime(logger));
    const fastify = await buildServer({ connector, logger });

    registerShutdownHandlers(fastify);

    await fastify.listen({ port: env.PORT, host: '0.0.0.0' });

    logger.info(
        {
            port: env.PORT,
            connector: connector.name,
        },
        'Connector service ready'
    );
}

main().catch(err => {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
});

// ============================================================================
// Helpers
// ============================================================================

function registerShutdownHandlers(fastify: FastifyInstance) {
    const shutdown = async (signal: string) => {
        logger.info({ signal }, 'Received shutdown signal, shutting down gracefully');

        try {
            await fastify.close();
            logger.info('Shutdown complete');
            process.exit(0);
        } catch (error) {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
}
