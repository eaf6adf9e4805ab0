import type { FastifyReply, FastifyRequest } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { RagService } from '../../services/RagService.js';
import type { MetadataFilter } from '../../services/query/filters.js';
import type { ScoredFragment } from '../../services/vector/VectorIndex.interface.js';
import { sendError } from './errors.js';

export interface QuestionRoute {
  Params: { id: string };
  Body: { question: string; k?: number; filter?: MetadataFilter };
}

const toResultItem = ({ fragment, distance }: ScoredFragment) => ({
  id: fragment.id,
  text: fragment.text,
  sourceMetadata: fragment.sourceMetadata,
  distance,
});

export function createQueryHandler(rag: RagService) {
  return async (request: FastifyRequest<QuestionRoute>, reply: FastifyReply) => {
    try {
      const { id } = request.params;
      const { question, k, filter } = request.body;
      logger.debug({ id, k, filter }, 'Query request');

      const results = await rag.query(id, question, k, filter);

      return reply.code(200).send({ results: results.map(toResultItem) });
    } catch (error) {
      logger.error({ error }, 'Query handler error');
      return sendError(reply, error);
    }
  };
}

export function createAnswerHandler(rag: RagService) {
  return async (request: FastifyRequest<QuestionRoute>, reply: FastifyReply) => {
    try {
      const { id } = request.params;
      const { question, k, filter } = request.body;
      logger.debug({ id, k, filter }, 'Answer request');

      const result = await rag.answer(id, question, { k, filter });

      return reply.code(200).send({
        answer: result.answer,
        sources: result.fragments.map(toResultItem),
      });
    } catch (error) {
      logger.error({ error }, 'Answer handler error');
      return sendError(reply, error);
    }
  };
}
