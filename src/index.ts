import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { createRagService } from './services/RagServiceFactory.js';
import { buildServer } from './api/server.js';

logger.info('Initializing services...');

const rag = createRagService(config);

const fastify = await buildServer(rag, {
  maxUploadSizeMB: config.storage.maxUploadSizeMB,
  environment: config.server.nodeEnv,
});

logger.info('Services initialized');

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  logger.info('Shutdown complete');
  process.exit(0);
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

try {
  await fastify.listen({
    port: config.server.port,
    host: '0.0.0.0',
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error(err);
  process.exit(1);
}
