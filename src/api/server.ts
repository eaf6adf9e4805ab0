import Fastify, { type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import { logger } from '../utils/logger.js';
import type { RagService } from '../services/RagService.js';
import { registerRoutes } from './routes.js';
import { sendError } from './handlers/errors.js';

export interface ServerOptions {
  maxUploadSizeMB: number;
  environment: string;
}

export async function buildServer(rag: RagService, options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  await fastify.register(multipart, {
    limits: {
      fileSize: options.maxUploadSizeMB * 1024 * 1024,
      files: 1,
    },
  });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.info({ method: request.method, url: request.url, statusCode: reply.statusCode }, 'Request completed');
  });

  fastify.get('/health', async () => {
    const generatorOk = await rag.testConnection();
    return {
      status: generatorOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: options.environment,
      indexes: rag.listIndexes().length,
      services: {
        generator: generatorOk,
      },
    };
  });

  await registerRoutes(fastify, rag);

  fastify.setErrorHandler((error, request, reply) => {
    logger.error({ error, url: request.url }, 'Request error');
    if (error.validation) {
      return reply.code(400).send({ error: 'INVALID_REQUEST', message: error.message });
    }
    return sendError(reply, error);
  });

  return fastify;
}
