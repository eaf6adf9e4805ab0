import { logger } from '../utils/logger.js';
import { generateId } from '../utils/uuid.js';
import { IndexNotFoundError, IngestionError } from '../utils/errors.js';
import type { Fragmenter } from './chunking/Fragmenter.js';
import type { TextMeasure } from './chunking/TextMeasure.js';
import type { Embedder } from './embedding/Embedder.interface.js';
import type { Generator } from './llm/Generator.interface.js';
import { DocumentLoader, type DocumentSource } from './ingestion/DocumentLoader.js';
import { IngestionPipeline } from './ingestion/IngestionPipeline.js';
import { Retriever } from './query/Retriever.js';
import { AnsweringPipeline, type AnswerResult } from './query/AnsweringPipeline.js';
import type { MetadataFilter } from './query/filters.js';
import { loadIndex, saveIndex } from './vector/IndexSnapshot.js';
import type { DistanceMetric, RetrievalResult, VectorIndex } from './vector/VectorIndex.interface.js';

export interface RagSettings {
  chunkSize: number;
  chunkOverlap: number;
  batchSize: number;
  concurrency: number;
  metric: DistanceMetric;
  k: number;
  maxContextLength: number;
}

export interface IngestOverrides {
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface IndexHandle {
  id: string;
  source: string;
  status: 'complete' | 'partial';
  requested: number;
  completed: number;
  createdAt: string;
  index: VectorIndex;
  error?: { code: string; stage: string; message: string };
}

export type IndexSummary = Omit<IndexHandle, 'index'> & { size: number; dimension: number; metric: DistanceMetric };

const sourceName = (document: DocumentSource): string =>
  'buffer' in document ? document.fileName : document.fileName ?? document.filePath;

/**
 * Query interface over in-memory indexes: ingest a document into a new index,
 * then query or answer against it by handle.
 */
export class RagService {
  private handles = new Map<string, IndexHandle>();
  private pipeline: IngestionPipeline;

  constructor(
    fragmenter: Fragmenter,
    private embedder: Embedder,
    private generator: Generator,
    private settings: RagSettings,
    private loader: DocumentLoader = new DocumentLoader(),
    private measure?: TextMeasure
  ) {
    this.pipeline = new IngestionPipeline(fragmenter, embedder);
  }

  /**
   * Loads and indexes a document. A failure after at least one batch was
   * committed still registers the partial index, with `status: 'partial'`.
   */
  async ingest(document: DocumentSource, overrides: IngestOverrides = {}, signal?: AbortSignal): Promise<IndexHandle> {
    const source = sourceName(document);
    const segments = await this.loader.load(document);

    try {
      const result = await this.pipeline.ingest(segments, {
        chunkSize: overrides.chunkSize ?? this.settings.chunkSize,
        chunkOverlap: overrides.chunkOverlap ?? this.settings.chunkOverlap,
        batchSize: this.settings.batchSize,
        concurrency: this.settings.concurrency,
        metric: this.settings.metric,
        signal,
      });

      return this.register({
        source,
        status: 'complete',
        requested: result.requested,
        completed: result.completed,
        index: result.index,
      });
    } catch (error) {
      if (!(error instanceof IngestionError) || error.index === null || error.completed === 0) {
        throw error;
      }

      logger.warn(
        { source, completed: error.completed, requested: error.requested, stage: error.stage },
        'Registering partially ingested index'
      );

      return this.register({
        source,
        status: 'partial',
        requested: error.requested,
        completed: error.completed,
        index: error.index,
        error: { code: error.code, stage: error.stage, message: error.message },
      });
    }
  }

  async query(indexId: string, question: string, k?: number, filter?: MetadataFilter): Promise<RetrievalResult> {
    return this.retrieverFor(this.getHandle(indexId)).retrieve(question, k, { filter });
  }

  async answer(
    indexId: string,
    question: string,
    options: { k?: number; filter?: MetadataFilter; signal?: AbortSignal } = {}
  ): Promise<AnswerResult> {
    const handle = this.getHandle(indexId);
    const answering = new AnsweringPipeline(this.retrieverFor(handle), this.generator, {
      maxContextLength: this.settings.maxContextLength,
      measure: this.measure,
    });
    return answering.answer(question, options);
  }

  getHandle(indexId: string): IndexHandle {
    const handle = this.handles.get(indexId);
    if (!handle) {
      throw new IndexNotFoundError(indexId);
    }
    return handle;
  }

  listIndexes(): IndexSummary[] {
    return [...this.handles.values()].map(({ index, ...rest }) => ({
      ...rest,
      size: index.size,
      dimension: index.dimension,
      metric: index.metric,
    }));
  }

  async save(indexId: string, path: string): Promise<void> {
    await saveIndex(this.getHandle(indexId).index, path);
  }

  /** Restores a snapshot; it must match the embedder's dimension and the configured metric. */
  async load(path: string): Promise<IndexHandle> {
    const dimension = await this.embedder.dimension();
    const index = await loadIndex(path, { dimension, metric: this.settings.metric });
    return this.register({
      source: path,
      status: 'complete',
      requested: index.size,
      completed: index.size,
      index,
    });
  }

  async testConnection(): Promise<boolean> {
    return this.generator.testConnection();
  }

  private retrieverFor(handle: IndexHandle): Retriever {
    return new Retriever(this.embedder, handle.index, this.settings.k);
  }

  private register(handle: Omit<IndexHandle, 'id' | 'createdAt'>): IndexHandle {
    const registered: IndexHandle = { id: generateId('idx'), createdAt: new Date().toISOString(), ...handle };
    this.handles.set(registered.id, registered);
    logger.info(
      { indexId: registered.id, source: registered.source, status: registered.status, size: handle.index.size },
      'Index registered'
    );
    return registered;
  }
}
