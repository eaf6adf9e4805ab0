import type { SourceMetadata } from '../chunking/types.js';

export interface MetadataRange {
  gt?: number;
  gte?: number;
  lt?: number;
  lte?: number;
}

/**
 * A string matches exactly; a range matches values that parse as numbers inside it.
 * Only keys the metadata owns can match.
 */
export type MetadataCondition = string | MetadataRange;

export type MetadataFilter = Record<string, MetadataCondition>;

const inRange = (raw: string, range: MetadataRange): boolean => {
  if (raw.trim() === '') return false;
  const value = Number(raw);
  if (!Number.isFinite(value)) return false;
  if (range.gt !== undefined && !(value > range.gt)) return false;
  if (range.gte !== undefined && !(value >= range.gte)) return false;
  if (range.lt !== undefined && !(value < range.lt)) return false;
  if (range.lte !== undefined && !(value <= range.lte)) return false;
  return true;
};

export function matchesFilter(metadata: SourceMetadata, filter: MetadataFilter): boolean {
  return Object.entries(filter).every(([key, condition]) => {
    if (!Object.hasOwn(metadata, key)) return false;
    const value = metadata[key];
    return typeof condition === 'string' ? value === condition : inRange(value, condition);
  });
}
