import type { VectorIndex } from '../services/vector/VectorIndex.interface.js';

export class InvalidConfigurationError extends Error {
  code = 'INVALID_CONFIGURATION';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

export class DocumentUnreadableError extends Error {
  code = 'DOCUMENT_UNREADABLE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DocumentUnreadableError';
  }
}

export class EmbeddingUnavailableError extends Error {
  code = 'EMBEDDING_UNAVAILABLE';
  constructor(message: string, public retryable: boolean, public details?: unknown) {
    super(message);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class DimensionMismatchError extends Error {
  code = 'DIMENSION_MISMATCH';
  constructor(public expected: number, public actual: number, context = 'vector') {
    super(`Dimension mismatch for ${context}: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

export class EmptyIndexError extends Error {
  code = 'EMPTY_INDEX';
  constructor(message = 'Vector index has no entries') {
    super(message);
    this.name = 'EmptyIndexError';
  }
}

export class GenerationUnavailableError extends Error {
  code = 'GENERATION_UNAVAILABLE';
  constructor(message: string, public retryable: boolean, public details?: unknown) {
    super(message);
    this.name = 'GenerationUnavailableError';
  }
}

export class IncompatibleIndexError extends Error {
  code = 'INCOMPATIBLE_INDEX';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'IncompatibleIndexError';
  }
}

export class DuplicateFragmentError extends Error {
  code = 'DUPLICATE_FRAGMENT';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DuplicateFragmentError';
  }
}

export class IndexNotFoundError extends Error {
  code = 'INDEX_NOT_FOUND';
  constructor(public indexId: string) {
    super(`Index not found: ${indexId}`);
    this.name = 'IndexNotFoundError';
  }
}

export type IngestionStage = 'fragmenting' | 'embedding' | 'indexing' | 'cancelled';

export class IngestionError extends Error {
  code = 'INGESTION_FAILED';
  constructor(
    message: string,
    public stage: IngestionStage,
    public completed: number,
    public requested: number,
    public index: VectorIndex | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IngestionError';
  }
}
