import { logger } from '../../utils/logger.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import type { Embedder } from '../embedding/Embedder.interface.js';
import type { RetrievalResult, VectorIndex } from '../vector/VectorIndex.interface.js';
import { matchesFilter, type MetadataFilter } from './filters.js';

export interface RetrieveOptions {
  /** Applied after ranking, so fewer than k fragments may come back. */
  filter?: MetadataFilter;
  signal?: AbortSignal;
}

export class Retriever {
  constructor(
    private embedder: Embedder,
    private index: VectorIndex,
    private defaultK = 4
  ) {
    if (!Number.isInteger(defaultK) || defaultK <= 0) {
      throw new InvalidConfigurationError('Default k must be a positive integer', { defaultK });
    }
  }

  async retrieve(queryText: string, k = this.defaultK, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidConfigurationError('k must be a positive integer', { k });
    }

    const vector = await this.embedder.embedOne(queryText, options.signal);
    const ranked = this.index.query(vector, k);

    const { filter } = options;
    const results = filter ? ranked.filter(r => matchesFilter(r.fragment.sourceMetadata, filter)) : ranked;

    logger.debug(
      { k, ranked: ranked.length, returned: results.length, filtered: filter !== undefined },
      'Retrieved fragments'
    );

    return results;
  }
}
