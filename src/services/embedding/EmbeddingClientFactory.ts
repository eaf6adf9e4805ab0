import OpenAI from 'openai';
import { InvalidConfigurationError } from '../../utils/errors.js';
import type { EmbeddingConfig } from '../../config/validation.js';
import { EmbeddingAdapter } from './EmbeddingAdapter.js';
import { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
import type { EmbeddingProvider } from './Embedder.interface.js';

export class EmbeddingClientFactory {
  static createClient(embedding: EmbeddingConfig): OpenAI {
    const { apiKey, timeoutMs } = embedding;
    if (!apiKey) {
      throw new InvalidConfigurationError(`API key required for ${embedding.provider} embeddings`);
    }

    if (embedding.provider === 'azure') {
      const { endpoint, apiVersion, deployment } = embedding;
      if (!endpoint || !apiVersion || !deployment) {
        throw new InvalidConfigurationError(
          'Azure OpenAI configuration required: AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_VERSION, AZURE_OPENAI_EMBEDDING_DEPLOYMENT'
        );
      }
      return new OpenAI({
        apiKey,
        baseURL: `${endpoint.replace(/\/+$/, '')}/openai/deployments/${deployment}`,
        defaultQuery: { 'api-version': apiVersion },
        defaultHeaders: { 'api-key': apiKey },
        timeout: timeoutMs,
        maxRetries: 0,
      });
    }

    return new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  }

  static createProvider(embedding: EmbeddingConfig): EmbeddingProvider {
    const client = this.createClient(embedding);
    const model = embedding.provider === 'azure' && embedding.deployment ? embedding.deployment : embedding.model;
    return new OpenAIEmbeddingProvider(client, model, embedding.provider);
  }

  static createEmbedder(embedding: EmbeddingConfig): EmbeddingAdapter {
    return new EmbeddingAdapter(this.createProvider(embedding), { maxRetries: embedding.maxRetries });
  }
}
