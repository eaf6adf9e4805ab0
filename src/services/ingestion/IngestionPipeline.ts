import { logger } from '../../utils/logger.js';
import { IngestionError, InvalidConfigurationError, type IngestionStage } from '../../utils/errors.js';
import type { Fragmenter } from '../chunking/Fragmenter.js';
import type { Fragment, FragmenterOptions, RawSegment } from '../chunking/types.js';
import type { Embedder } from '../embedding/Embedder.interface.js';
import { BruteForceVectorIndex } from '../vector/BruteForceVectorIndex.js';
import type { DistanceMetric, VectorIndex } from '../vector/VectorIndex.interface.js';

export const DEFAULT_BATCH_SIZE = 64;

export interface IngestionOptions extends FragmenterOptions {
  batchSize?: number;
  /** Batches embedded at the same time; commits still happen in batch order. */
  concurrency?: number;
  metric?: DistanceMetric;
  /** Existing index to append to; otherwise one is built from the probed dimension. */
  index?: VectorIndex;
  signal?: AbortSignal;
}

export interface IngestionResult {
  index: VectorIndex;
  requested: number;
  completed: number;
  batches: number;
  processingTime: string;
}

interface BatchFailure {
  batch: number;
  stage: IngestionStage;
  error: unknown;
}

interface RunState {
  next: number;
  committedBatches: number;
  completed: number;
  embedded: Array<number[][] | undefined>;
  failure: BatchFailure | null;
}

const toBatches = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

const elapsed = (startTime: number): string => `${((Date.now() - startTime) / 1000).toFixed(1)}s`;

/**
 * Fragmenter → embedder → index, committed one batch at a time.
 *
 * A batch is inserted only after every earlier batch has been inserted. When a
 * batch fails, earlier batches stay committed and nothing after it is; the
 * thrown {@link IngestionError} reports how many fragments made it in.
 */
export class IngestionPipeline {
  constructor(private fragmenter: Fragmenter, private embedder: Embedder) {}

  async ingest(segments: readonly RawSegment[], options: IngestionOptions): Promise<IngestionResult> {
    const startTime = Date.now();
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const concurrency = options.concurrency ?? 1;

    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new InvalidConfigurationError('batchSize must be a positive integer', { batchSize });
    }
    if (!Number.isInteger(concurrency) || concurrency <= 0) {
      throw new InvalidConfigurationError('concurrency must be a positive integer', { concurrency });
    }

    const fragments = this.fragmenter.split(segments, options);
    const requested = fragments.length;
    const index = options.index ?? (await this.createIndex(requested, options));
    const batches = toBatches(fragments, batchSize);

    logger.info(
      { segments: segments.length, fragments: requested, batches: batches.length, batchSize, concurrency },
      'Starting ingestion'
    );

    const state: RunState = {
      next: 0,
      committedBatches: 0,
      completed: 0,
      embedded: new Array<number[][] | undefined>(batches.length),
      failure: null,
    };

    const workers = Array.from({ length: Math.min(concurrency, batches.length) }, () =>
      this.runWorker(batches, index, state, options.signal)
    );
    await Promise.all(workers);

    if (state.failure) {
      const { batch, stage, error } = state.failure;
      logger.error(
        { batch: batch + 1, batches: batches.length, stage, completed: state.completed, requested, error },
        'Ingestion failed'
      );
      throw new IngestionError(
        `Ingestion failed at batch ${batch + 1} of ${batches.length} (${stage}): ${state.completed}/${requested} fragments indexed`,
        stage,
        state.completed,
        requested,
        index,
        { cause: error }
      );
    }

    const processingTime = elapsed(startTime);
    logger.info({ requested, completed: state.completed, size: index.size, processingTime }, 'Ingestion complete');

    return { index, requested, completed: state.completed, batches: batches.length, processingTime };
  }

  private async createIndex(requested: number, options: IngestionOptions): Promise<VectorIndex> {
    try {
      const dimension = await this.embedder.dimension(options.signal);
      return new BruteForceVectorIndex(dimension, options.metric);
    } catch (error) {
      logger.error({ error }, 'Failed to determine embedding dimension');
      const stage: IngestionStage = options.signal?.aborted ? 'cancelled' : 'embedding';
      throw new IngestionError('Failed to determine embedding dimension', stage, 0, requested, null, {
        cause: error,
      });
    }
  }

  private async runWorker(
    batches: Fragment[][],
    index: VectorIndex,
    state: RunState,
    signal?: AbortSignal
  ): Promise<void> {
    while (state.failure === null && state.next < batches.length) {
      const batch = state.next++;

      if (signal?.aborted) {
        this.fail(state, { batch, stage: 'cancelled', error: signal.reason });
        return;
      }

      try {
        state.embedded[batch] = await this.embedder.embedBatch(
          batches[batch].map(fragment => fragment.text),
          signal
        );
      } catch (error) {
        this.fail(state, { batch, stage: signal?.aborted ? 'cancelled' : 'embedding', error });
        return;
      }

      if (signal?.aborted) {
        this.fail(state, { batch, stage: 'cancelled', error: signal.reason });
        return;
      }

      logger.debug({ batch: batch + 1, batches: batches.length }, 'Embedded batch');
      this.commitReady(batches, index, state, signal);
    }
  }

  /** Inserts every contiguous embedded batch that precedes the first failure. */
  private commitReady(batches: Fragment[][], index: VectorIndex, state: RunState, signal?: AbortSignal): void {
    while (!signal?.aborted && state.committedBatches < batches.length) {
      const batch = state.committedBatches;
      const vectors = state.embedded[batch];
      if (vectors === undefined || (state.failure !== null && batch >= state.failure.batch)) {
        return;
      }

      try {
        index.insert(
          batches[batch].map((fragment, i) => ({ id: fragment.id, embedding: vectors[i], payload: fragment }))
        );
      } catch (error) {
        this.fail(state, { batch, stage: 'indexing', error });
        return;
      }

      state.embedded[batch] = undefined;
      state.committedBatches++;
      state.completed += batches[batch].length;
      logger.debug(
        { batch: batch + 1, completed: state.completed, size: index.size },
        'Committed batch'
      );
    }
  }

  private fail(state: RunState, failure: BatchFailure): void {
    if (state.failure === null || failure.batch < state.failure.batch || failure.stage === 'cancelled') {
      state.failure = failure;
    }
  }
}
