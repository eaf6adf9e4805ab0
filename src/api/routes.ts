import type { FastifyInstance } from 'fastify';
import type { RagService } from '../services/RagService.js';
import { createIngestHandler, createListIndexesHandler } from './handlers/index.handler.js';
import { createAnswerHandler, createQueryHandler, type QuestionRoute } from './handlers/query.handler.js';
import { indexParamsSchema } from './schemas/common.schema.js';
import { questionRequestSchema } from './schemas/query.schema.js';

export async function registerRoutes(fastify: FastifyInstance, rag: RagService) {
  fastify.post('/indexes', {
    handler: createIngestHandler(rag),
  });

  fastify.get('/indexes', {
    handler: createListIndexesHandler(rag),
  });

  fastify.post<QuestionRoute>('/indexes/:id/query', {
    schema: {
      params: indexParamsSchema,
      body: questionRequestSchema,
    },
    handler: createQueryHandler(rag),
  });

  fastify.post<QuestionRoute>('/indexes/:id/answer', {
    schema: {
      params: indexParamsSchema,
      body: questionRequestSchema,
    },
    handler: createAnswerHandler(rag),
  });
}
