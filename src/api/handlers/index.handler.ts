import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Multipart } from '@fastify/multipart';
import { logger } from '../../utils/logger.js';
import type { IndexHandle, IngestOverrides, RagService } from '../../services/RagService.js';
import { sendError } from './errors.js';

const numericField = (field: Multipart | Multipart[] | undefined): number | undefined => {
  if (field === undefined || Array.isArray(field) || field.type !== 'field') {
    return undefined;
  }
  return typeof field.value === 'string' && field.value.trim() !== '' ? Number(field.value) : undefined;
};

export const toIndexResponse = ({ index, ...handle }: IndexHandle) => ({
  ...handle,
  size: index.size,
  dimension: index.dimension,
  metric: index.metric,
});

export function createIngestHandler(rag: RagService) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const data = await request.file();

      if (!data) {
        return reply.code(400).send({
          error: 'INVALID_REQUEST',
          message: 'No file uploaded',
        });
      }

      const overrides: IngestOverrides = {
        chunkSize: numericField(data.fields.chunkSize),
        chunkOverlap: numericField(data.fields.chunkOverlap),
      };
      const buffer = await data.toBuffer();

      logger.info({ fileName: data.filename, size: buffer.length, overrides }, 'Received file upload');

      const handle = await rag.ingest({ buffer, fileName: data.filename }, overrides);

      return reply.code(201).send(toIndexResponse(handle));
    } catch (error) {
      logger.error({ error }, 'Ingest handler error');
      return sendError(reply, error);
    }
  };
}

export function createListIndexesHandler(rag: RagService) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ indexes: rag.listIndexes() });
  };
}
