import OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import { EmbeddingUnavailableError } from '../../utils/errors.js';
import { isTransientStatus } from '../../utils/retry.js';
import type { EmbeddingProvider } from './Embedder.interface.js';

const MAX_INPUTS_PER_REQUEST = 2048;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;

  constructor(private client: OpenAI, private model: string, name = 'openai') {
    this.name = name;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length > MAX_INPUTS_PER_REQUEST) {
      throw new EmbeddingUnavailableError(
        `Batch of ${texts.length} exceeds ${MAX_INPUTS_PER_REQUEST} inputs per request`,
        false
      );
    }

    try {
      const response = await this.client.embeddings.create(
        { model: this.model, input: texts },
        { signal }
      );

      const embeddings = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map(item => item.embedding);

      logger.debug(
        { count: embeddings.length, dimension: embeddings[0]?.length, model: this.model },
        'Generated embeddings'
      );

      return embeddings;
    } catch (error) {
      if (error instanceof OpenAI.APIUserAbortError) {
        throw new EmbeddingUnavailableError('Embedding request aborted', false, error);
      }
      if (error instanceof OpenAI.APIError) {
        const retryable = error.status === undefined || isTransientStatus(error.status);
        throw new EmbeddingUnavailableError(`${this.name} embeddings API error: ${error.message}`, retryable, {
          status: error.status,
        });
      }
      throw error;
    }
  }
}
