import {
  DEFAULT_RRF_K,
  NullLogger,
  RetrievalError,
  describeError,
  type CollectionId,
  type DegradedMode,
  type EmbeddingVector,
  type Logger,
  type QueryContext,
  type RetrievalResult,
} from "@docqa/core";
import type { Embedder } from "@docqa/embeddings";
import type { ChunkHit, ChunkIndex } from "@docqa/vectorstore";
import { assertFusionK, reciprocalRankFusion } from "./rrf.js";

export type RetrievalQuery = Pick<QueryContext, "question" | "mode" | "size"> & { k?: number };

export type RetrievalOutcome = {
  results: RetrievalResult[];
  /** Search modes that failed while the other one answered. */
  degraded: DegradedMode[];
};

export interface RetrieverOptions {
  index: ChunkIndex;
  embedder: Embedder;
  collection: CollectionId;
  /** Hybrid mode fetches `size × candidateMultiplier` hits from each search. */
  candidateMultiplier?: number;
  logger?: Logger;
}

function singleModeResults(hits: ChunkHit[], mode: "keyword" | "vector", size: number): RetrievalResult[] {
  return hits.slice(0, size).map((hit, i) => ({
    chunk: hit.chunk,
    score: hit.score,
    filename: hit.chunk.filename,
    matchType: mode,
    ranks: mode === "keyword" ? { keyword: i + 1 } : { vector: i + 1 },
  }));
}

export class Retriever {
  private readonly index: ChunkIndex;
  private readonly embedder: Embedder;
  private readonly collection: CollectionId;
  private readonly candidateMultiplier: number;
  private readonly logger: Logger;

  constructor(options: RetrieverOptions) {
    this.index = options.index;
    this.embedder = options.embedder;
    this.collection = options.collection;
    this.candidateMultiplier = Math.max(1, options.candidateMultiplier ?? 2);
    this.logger = options.logger ?? new NullLogger();
  }

  async retrieve(query: RetrievalQuery): Promise<RetrievalOutcome> {
    const k = assertFusionK(query.k ?? DEFAULT_RRF_K);
    const size = Math.floor(query.size);
    if (size <= 0) return { results: [], degraded: [] };

    switch (query.mode) {
      case "keyword": {
        const hits = await this.search("keyword", () => this.keyword(query.question, size));
        return { results: singleModeResults(hits, "keyword", size), degraded: [] };
      }
      case "vector": {
        const vector = await this.embedder.embed(query.question);
        const hits = await this.search("vector", () => this.vector(vector, size));
        return { results: singleModeResults(hits, "vector", size), degraded: [] };
      }
      case "hybrid":
        return this.hybrid(query.question, size, k);
    }
  }

  private async hybrid(question: string, size: number, k: number): Promise<RetrievalOutcome> {
    // an embedding failure is not a search failure: it propagates
    const vector = await this.embedder.embed(question);
    const window = Math.max(size, size * this.candidateMultiplier);

    const [keyword, semantic] = await Promise.allSettled([this.keyword(question, window), this.vector(vector, window)]);

    const degraded: DegradedMode[] = [];
    if (keyword.status === "rejected") {
      if (semantic.status === "rejected") {
        throw new RetrievalError(
          `Both searches failed: keyword: ${describeError(keyword.reason)}; vector: ${describeError(semantic.reason)}`,
          { cause: keyword.reason }
        );
      }
      degraded.push({ mode: "keyword", error: describeError(keyword.reason) });
      this.logger.warn("keyword search failed, using vector results only", { error: describeError(keyword.reason) });
      return { results: singleModeResults(semantic.value, "vector", size), degraded };
    }
    if (semantic.status === "rejected") {
      degraded.push({ mode: "vector", error: describeError(semantic.reason) });
      this.logger.warn("vector search failed, using keyword results only", { error: describeError(semantic.reason) });
      return { results: singleModeResults(keyword.value, "keyword", size), degraded };
    }

    const byId = new Map<string, ChunkHit>();
    for (const hit of [...keyword.value, ...semantic.value]) {
      if (!byId.has(hit.chunk.id)) byId.set(hit.chunk.id, hit);
    }

    const fused = reciprocalRankFusion(
      [
        keyword.value.map((hit, i) => ({ id: hit.chunk.id, rank: i + 1 })),
        semantic.value.map((hit, i) => ({ id: hit.chunk.id, rank: i + 1 })),
      ],
      { k, size }
    );

    const results: RetrievalResult[] = [];
    for (const entry of fused) {
      const hit = byId.get(entry.id);
      if (!hit) continue;
      const [keywordRank, vectorRank] = entry.ranks;
      results.push({
        chunk: hit.chunk,
        score: entry.score,
        filename: hit.chunk.filename,
        matchType: entry.lists > 1 ? "hybrid" : keywordRank != null ? "keyword" : "vector",
        ranks: {
          ...(keywordRank != null && { keyword: keywordRank }),
          ...(vectorRank != null && { vector: vectorRank }),
        },
      });
    }

    this.logger.debug("fused", {
      keywordHits: keyword.value.length,
      vectorHits: semantic.value.length,
      results: results.length,
    });
    return { results, degraded };
  }

  private keyword(question: string, topK: number): Promise<ChunkHit[]> {
    return this.index.keywordSearch({ collection: this.collection, query: question, topK });
  }

  private vector(vector: EmbeddingVector, topK: number): Promise<ChunkHit[]> {
    return this.index.vectorSearch({ collection: this.collection, vector, topK });
  }

  private async search(mode: "keyword" | "vector", run: () => Promise<ChunkHit[]>): Promise<ChunkHit[]> {
    try {
      return await run();
    } catch (error) {
      throw new RetrievalError(`${mode} search failed: ${describeError(error)}`, { cause: error });
    }
  }
}
