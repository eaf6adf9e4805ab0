import { logger } from '../../utils/logger.js';
import { generateId } from '../../utils/uuid.js';
import {
  DimensionMismatchError,
  DuplicateFragmentError,
  EmptyIndexError,
  InvalidConfigurationError,
} from '../../utils/errors.js';
import type { Fragment } from '../chunking/types.js';
import { cosineDistance, negatedDot, norm, squaredL2 } from './distance.js';
import type {
  DistanceMetric,
  NewVectorIndexEntry,
  RetrievalResult,
  VectorIndex,
  VectorIndexEntry,
} from './VectorIndex.interface.js';

const METRICS: readonly DistanceMetric[] = ['l2', 'cosine', 'dot'];

interface StoredEntry {
  entry: VectorIndexEntry;
  norm: number;
}

interface Candidate {
  position: number;
  distance: number;
}

/**
 * Keeps the k smallest candidates sorted by distance. Candidates arrive in
 * insertion order, so a tie is placed after the entries already kept.
 */
class TopK {
  private kept: Candidate[] = [];

  constructor(private k: number) {}

  offer(candidate: Candidate): void {
    const last = this.kept[this.kept.length - 1];
    if (this.kept.length === this.k && last !== undefined && candidate.distance >= last.distance) {
      return;
    }

    let low = 0;
    let high = this.kept.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.kept[mid].distance <= candidate.distance) low = mid + 1;
      else high = mid;
    }

    this.kept.splice(low, 0, candidate);
    if (this.kept.length > this.k) this.kept.pop();
  }

  sorted(): Candidate[] {
    return this.kept;
  }
}

/**
 * Exact nearest-neighbour index: every query scans every stored vector,
 * O(N·D) per query and O(1) amortized per insert. Suited to document-sized
 * corpora; an approximate index can replace it behind {@link VectorIndex}.
 */
export class BruteForceVectorIndex implements VectorIndex {
  private stored: StoredEntry[] = [];
  private byId = new Map<string, StoredEntry>();

  constructor(readonly dimension: number, readonly metric: DistanceMetric = 'cosine') {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new InvalidConfigurationError('Index dimension must be a positive integer', { dimension });
    }
    if (!METRICS.includes(metric)) {
      throw new InvalidConfigurationError(`Unknown distance metric: ${metric}`, { metric });
    }
  }

  get size(): number {
    return this.stored.length;
  }

  insert(entries: readonly NewVectorIndexEntry[]): string[] {
    const prepared: StoredEntry[] = [];
    const batchIds = new Set<string>();

    for (const candidate of entries) {
      this.assertVector(candidate.embedding, 'inserted embedding');

      const id = candidate.id ?? generateId('frag');
      if (this.byId.has(id) || batchIds.has(id)) {
        throw new DuplicateFragmentError(`Fragment id already indexed: ${id}`, { id });
      }
      batchIds.add(id);

      const embedding = Object.freeze([...candidate.embedding]);
      const payload: Fragment = Object.freeze({
        id,
        text: candidate.payload.text,
        sourceMetadata: Object.freeze({ ...candidate.payload.sourceMetadata }),
        embedding,
      });

      prepared.push({
        entry: Object.freeze({ id, embedding, payload }),
        norm: norm(embedding),
      });
    }

    for (const item of prepared) {
      this.stored.push(item);
      this.byId.set(item.entry.id, item);
    }

    logger.debug({ inserted: prepared.length, size: this.stored.length }, 'Inserted vectors');

    return prepared.map(item => item.entry.id);
  }

  query(vector: readonly number[], k: number): RetrievalResult {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidConfigurationError('k must be a positive integer', { k });
    }
    this.assertVector(vector, 'query vector');
    if (this.stored.length === 0) {
      throw new EmptyIndexError();
    }

    const queryNorm = norm(vector);
    const topK = new TopK(k);

    this.stored.forEach((item, position) => {
      topK.offer({ position, distance: this.distanceTo(vector, queryNorm, item) });
    });

    return topK.sorted().map(({ position, distance }) => ({
      fragment: this.stored[position].entry.payload,
      distance,
    }));
  }

  get(id: string): VectorIndexEntry | undefined {
    return this.byId.get(id)?.entry;
  }

  entries(): VectorIndexEntry[] {
    return this.stored.map(item => item.entry);
  }

  private distanceTo(vector: readonly number[], queryNorm: number, item: StoredEntry): number {
    switch (this.metric) {
      case 'l2':
        return squaredL2(vector, item.entry.embedding);
      case 'cosine':
        return cosineDistance(vector, item.entry.embedding, queryNorm, item.norm);
      case 'dot':
        return negatedDot(vector, item.entry.embedding);
    }
  }

  private assertVector(vector: readonly number[], context: string): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length, context);
    }
    if (!vector.every(Number.isFinite)) {
      throw new InvalidConfigurationError(`${context} has non-finite components`);
    }
  }
}
