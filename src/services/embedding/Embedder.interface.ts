/** Raw embedding capability: one vector per input text, in order. */
export interface EmbeddingProvider {
  readonly name: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface Embedder {
  /** Output dimension D, probed once and cached. */
  dimension(signal?: AbortSignal): Promise<number>;
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
  embedOne(text: string, signal?: AbortSignal): Promise<number[]>;
}
