import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { IncompatibleIndexError } from '../../utils/errors.js';
import { distanceMetricSchema } from '../../config/validation.js';
import { BruteForceVectorIndex } from './BruteForceVectorIndex.js';
import type { DistanceMetric, VectorIndex } from './VectorIndex.interface.js';

export const SNAPSHOT_VERSION = 1;

const fragmentSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  sourceMetadata: z.record(z.string()),
  embedding: z.array(z.number()).optional(),
});

export const indexSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  dimension: z.number().int().positive(),
  metric: distanceMetricSchema,
  entries: z.array(
    z.object({
      id: z.string().min(1),
      embedding: z.array(z.number()),
      payload: fragmentSchema,
    })
  ),
});

export type IndexSnapshot = z.infer<typeof indexSnapshotSchema>;

export interface ExpectedIndexConfig {
  dimension?: number;
  metric?: DistanceMetric;
}

export function serializeIndex(index: VectorIndex): IndexSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    dimension: index.dimension,
    metric: index.metric,
    entries: index.entries().map(({ id, embedding, payload }) => ({
      id,
      embedding: [...embedding],
      payload: {
        id: payload.id,
        text: payload.text,
        sourceMetadata: { ...payload.sourceMetadata },
      },
    })),
  };
}

function assertCompatible(snapshot: IndexSnapshot, expected: ExpectedIndexConfig): void {
  if (expected.dimension !== undefined && expected.dimension !== snapshot.dimension) {
    throw new IncompatibleIndexError(
      `Snapshot dimension ${snapshot.dimension} does not match expected ${expected.dimension}`,
      { expected: expected.dimension, actual: snapshot.dimension }
    );
  }
  if (expected.metric !== undefined && expected.metric !== snapshot.metric) {
    throw new IncompatibleIndexError(
      `Snapshot metric ${snapshot.metric} does not match expected ${expected.metric}`,
      { expected: expected.metric, actual: snapshot.metric }
    );
  }
}

/** Appends the snapshot's entries to an existing index of the same configuration. */
export function restoreInto(target: VectorIndex, snapshot: IndexSnapshot): VectorIndex {
  assertCompatible(snapshot, { dimension: target.dimension, metric: target.metric });
  try {
    target.insert(snapshot.entries);
  } catch (error) {
    throw new IncompatibleIndexError('Snapshot entries could not be restored', error);
  }
  return target;
}

export function restoreIndex(snapshot: IndexSnapshot, expected: ExpectedIndexConfig = {}): VectorIndex {
  assertCompatible(snapshot, expected);
  return restoreInto(new BruteForceVectorIndex(snapshot.dimension, snapshot.metric), snapshot);
}

export function parseSnapshot(raw: unknown): IndexSnapshot {
  const result = indexSnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new IncompatibleIndexError('Malformed index snapshot', result.error.issues);
  }
  return result.data;
}

export async function saveIndex(index: VectorIndex, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(serializeIndex(index)), 'utf-8');
  logger.info({ path, size: index.size, dimension: index.dimension, metric: index.metric }, 'Index saved');
}

export async function loadIndex(path: string, expected: ExpectedIndexConfig = {}): Promise<VectorIndex> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    logger.error({ error, path }, 'Failed to read index snapshot');
    throw new IncompatibleIndexError(`Index snapshot could not be read: ${path}`, error);
  }

  const index = restoreIndex(parseSnapshot(raw), expected);
  logger.info({ path, size: index.size, dimension: index.dimension, metric: index.metric }, 'Index loaded');
  return index;
}
