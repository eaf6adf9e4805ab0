import { logger } from '../../utils/logger.js';
import { EmbeddingUnavailableError } from '../../utils/errors.js';
import { isTransientStatus, withRetry } from '../../utils/retry.js';
import type { Embedder, EmbeddingProvider } from './Embedder.interface.js';

export const DIMENSION_PROBE_TEXT = 'dimension probe';

export interface EmbeddingAdapterOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

const statusOf = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
};

/**
 * Wraps an {@link EmbeddingProvider} with retries and response validation.
 *
 * Every failure leaves as {@link EmbeddingUnavailableError}. A response is
 * rejected unless it has one finite vector per input and every vector has the
 * dimension this adapter has already seen.
 */
export class EmbeddingAdapter implements Embedder {
  private knownDimension: number | null = null;
  private maxRetries: number;
  private baseDelayMs: number;
  private maxDelayMs: number;

  constructor(private provider: EmbeddingProvider, options: EmbeddingAdapterOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 250;
    this.maxDelayMs = options.maxDelayMs ?? 8_000;
  }

  async dimension(signal?: AbortSignal): Promise<number> {
    if (this.knownDimension !== null) {
      return this.knownDimension;
    }
    const probe = await this.embedOne(DIMENSION_PROBE_TEXT, signal);
    logger.info({ provider: this.provider.name, dimension: probe.length }, 'Probed embedding dimension');
    return probe.length;
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedBatch([text], signal);
    return vector;
  }

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    logger.debug({ provider: this.provider.name, count: texts.length }, 'Generating embeddings');

    const vectors = await withRetry(
      async () => {
        try {
          return await this.provider.embed([...texts], signal);
        } catch (error) {
          throw this.wrap(error, signal);
        }
      },
      {
        maxRetries: this.maxRetries,
        baseDelayMs: this.baseDelayMs,
        maxDelayMs: this.maxDelayMs,
        signal,
        isRetryable: error => error instanceof EmbeddingUnavailableError && error.retryable,
        onRetry: (error, attempt, delayMs) =>
          logger.warn({ provider: this.provider.name, attempt, delayMs, error }, 'Retrying embedding request'),
      }
    ).catch((error: unknown) => {
      logger.error({ provider: this.provider.name, count: texts.length, error }, 'Failed to generate embeddings');
      throw this.wrap(error, signal);
    });

    this.validate(texts.length, vectors);
    return vectors;
  }

  private wrap(error: unknown, signal?: AbortSignal): EmbeddingUnavailableError {
    if (error instanceof EmbeddingUnavailableError) {
      return error;
    }
    if (signal?.aborted) {
      return new EmbeddingUnavailableError('Embedding request aborted', false, error);
    }
    const status = statusOf(error);
    return new EmbeddingUnavailableError(
      `Embedding provider ${this.provider.name} failed`,
      status === undefined || isTransientStatus(status),
      error
    );
  }

  private validate(expectedCount: number, vectors: unknown): asserts vectors is number[][] {
    const malformed = (reason: string, details?: Record<string, unknown>) => {
      logger.error({ provider: this.provider.name, reason, ...details }, 'Malformed embedding response');
      return new EmbeddingUnavailableError(`Malformed embedding response: ${reason}`, false, details);
    };

    if (!Array.isArray(vectors) || vectors.length !== expectedCount) {
      throw malformed('vector count does not match input count', {
        expected: expectedCount,
        actual: Array.isArray(vectors) ? vectors.length : null,
      });
    }

    const dimension = this.knownDimension ?? (Array.isArray(vectors[0]) ? vectors[0].length : 0);
    if (dimension === 0) {
      throw malformed('empty vector');
    }

    vectors.forEach((vector: unknown, position) => {
      if (!Array.isArray(vector) || vector.length !== dimension) {
        throw malformed('dimension drift', {
          position,
          expected: dimension,
          actual: Array.isArray(vector) ? vector.length : null,
        });
      }
      if (!vector.every(value => typeof value === 'number' && Number.isFinite(value))) {
        throw malformed('non-finite component', { position });
      }
    });

    this.knownDimension = dimension;
  }
}
