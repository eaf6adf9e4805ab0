import type { Config } from '../config/validation.js';
import { Fragmenter } from './chunking/Fragmenter.js';
import { createTextMeasure } from './chunking/TextMeasure.js';
import { EmbeddingClientFactory } from './embedding/EmbeddingClientFactory.js';
import { GeneratorFactory } from './llm/GeneratorFactory.js';
import { DocumentLoader } from './ingestion/DocumentLoader.js';
import { RagService, type RagSettings } from './RagService.js';

export const ragSettings = (config: Config): RagSettings => ({
  chunkSize: config.chunking.size,
  chunkOverlap: config.chunking.overlap,
  batchSize: config.ingestion.batchSize,
  concurrency: config.ingestion.concurrency,
  metric: config.index.metric,
  k: config.retrieval.k,
  maxContextLength: config.retrieval.maxContextLength,
});

export function createRagService(config: Config): RagService {
  const measure = createTextMeasure(config.chunking.unit);
  return new RagService(
    new Fragmenter(measure),
    EmbeddingClientFactory.createEmbedder(config.embedding),
    GeneratorFactory.createGenerator(config.llm),
    ragSettings(config),
    new DocumentLoader(),
    measure
  );
}
