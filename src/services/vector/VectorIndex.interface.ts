import type { Fragment } from '../chunking/types.js';

export type DistanceMetric = 'l2' | 'cosine' | 'dot';

export interface VectorIndexEntry {
  readonly id: string;
  readonly embedding: readonly number[];
  readonly payload: Fragment;
}

export interface NewVectorIndexEntry {
  id?: string;
  embedding: readonly number[];
  payload: Fragment;
}

export interface ScoredFragment {
  readonly fragment: Fragment;
  /** Lower is closer, whatever the metric. */
  readonly distance: number;
}

/** Ascending by distance, at most k long. */
export type RetrievalResult = ScoredFragment[];

/**
 * Append-only nearest-neighbour store. Calls are synchronous, so an insert is
 * either fully visible to later queries or not at all.
 */
export interface VectorIndex {
  readonly dimension: number;
  readonly metric: DistanceMetric;
  readonly size: number;

  insert(entries: readonly NewVectorIndexEntry[]): string[];
  query(vector: readonly number[], k: number): RetrievalResult;
  get(id: string): VectorIndexEntry | undefined;
  entries(): VectorIndexEntry[];
}
