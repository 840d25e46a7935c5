import type { Chunk, CollectionId, DocumentId, EmbeddedChunk, EmbeddingVector } from "@docqa/core";

export type ChunkHit = {
  chunk: Chunk;
  /** Native score of the search that produced the hit; higher is better. */
  score: number;
};

export type IndexStats = {
  collection: CollectionId;
  chunks: number;
  documents: number;
  dimension: number | null;
};

/**
 * Storage and search over embedded chunks. Both searches return hits best
 * first, at most `topK` of them.
 */
export interface ChunkIndex {
  init(): Promise<void>;

  upsertChunks(params: { collection: CollectionId; items: readonly EmbeddedChunk[] }): Promise<void>;

  /** Drops every chunk of a document; returns how many were removed. */
  deleteDocument(params: { collection: CollectionId; documentId: DocumentId }): Promise<number>;

  /**
   * Swaps a document's chunks for `items` in one step: if writing fails, the
   * previous chunks stay. Returns how many chunks were removed.
   */
  replaceDocument(params: {
    collection: CollectionId;
    documentId: DocumentId;
    items: readonly EmbeddedChunk[];
  }): Promise<number>;

  keywordSearch(params: { collection: CollectionId; query: string; topK: number }): Promise<ChunkHit[]>;

  vectorSearch(params: { collection: CollectionId; vector: EmbeddingVector; topK: number }): Promise<ChunkHit[]>;

  stats(collection: CollectionId): Promise<IndexStats>;

  close(): Promise<void>;
}
