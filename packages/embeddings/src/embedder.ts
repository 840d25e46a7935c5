import { EmbeddingError, type EmbeddingVector } from "@docqa/core";

/**
 * Maps text to a fixed-dimension vector. Implementations raise
 * `EmbeddingError` instead of returning a placeholder vector.
 */
export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<EmbeddingVector>;
  /** Same vectors as calling `embed` per text, in input order. */
  embedBatch(texts: readonly string[]): Promise<EmbeddingVector[]>;
}

export function assertSameDimension(vectors: readonly EmbeddingVector[], expected?: number): void {
  const dim = expected ?? vectors[0]?.length ?? 0;
  for (const v of vectors) {
    if (v.length !== dim) {
      throw new EmbeddingError(`Inconsistent embedding dimension: expected ${dim}, got ${v.length}`);
    }
  }
}
