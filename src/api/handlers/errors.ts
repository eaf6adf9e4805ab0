import type { FastifyReply } from 'fastify';
import {
  DimensionMismatchError,
  DocumentUnreadableError,
  DuplicateFragmentError,
  EmbeddingUnavailableError,
  EmptyIndexError,
  GenerationUnavailableError,
  IncompatibleIndexError,
  IndexNotFoundError,
  IngestionError,
  InvalidConfigurationError,
} from '../../utils/errors.js';

export interface ErrorBody {
  error: string;
  message: string;
  details?: unknown;
}

const clientStatus = (error: Error): number | undefined => {
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return error.statusCode;
  }
  return undefined;
};

export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (
    error instanceof InvalidConfigurationError ||
    error instanceof DocumentUnreadableError ||
    error instanceof DimensionMismatchError
  ) {
    return { status: 400, body: { error: error.code, message: error.message } };
  }
  if (error instanceof IndexNotFoundError) {
    return { status: 404, body: { error: error.code, message: error.message } };
  }
  if (
    error instanceof EmptyIndexError ||
    error instanceof IncompatibleIndexError ||
    error instanceof DuplicateFragmentError
  ) {
    return { status: 409, body: { error: error.code, message: error.message } };
  }
  if (error instanceof EmbeddingUnavailableError || error instanceof GenerationUnavailableError) {
    return {
      status: 502,
      body: { error: error.code, message: error.message, details: { retryable: error.retryable } },
    };
  }
  if (error instanceof IngestionError) {
    return {
      status: 502,
      body: {
        error: error.code,
        message: error.message,
        details: { stage: error.stage, completed: error.completed, requested: error.requested },
      },
    };
  }
  if (error instanceof Error) {
    const status = clientStatus(error);
    if (status !== undefined) {
      return { status, body: { error: 'INVALID_REQUEST', message: error.message } };
    }
  }
  return {
    status: 500,
    body: { error: 'INTERNAL_ERROR', message: error instanceof Error ? error.message : 'Unknown error' },
  };
}

export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  const { status, body } = toErrorResponse(error);
  return reply.code(status).send(body);
}
