import Database from "better-sqlite3";
import {
  IndexError,
  describeError,
  type Chunk,
  type CollectionId,
  type DocumentId,
  type EmbeddedChunk,
  type EmbeddingVector,
} from "@docqa/core";
import type { ChunkHit, ChunkIndex, IndexStats } from "./store.js";

type ChunkRow = {
  chunk_id: string;
  document_id: string;
  filename: string;
  ordinal: number;
  text: string;
  token_count: number;
  pages_json: string;
  char_start: number;
  char_end: number;
  content_hash: string;
  vector_json: string;
};

type ScoredRow = ChunkRow & { score: number };

const CHUNK_COLUMNS = `
  c.chunk_id, c.document_id, c.filename, c.ordinal, c.text, c.token_count,
  c.pages_json, c.char_start, c.char_end, c.content_hash, c.vector_json
`;

function parseNumbers(json: string, what: string): number[] {
  const value: unknown = JSON.parse(json);
  if (!Array.isArray(value) || !value.every((v): v is number => typeof v === "number")) {
    throw new IndexError(`Stored ${what} is not a number array.`);
  }
  return value;
}

function rowToChunk(row: ChunkRow): Chunk {
  return {
    id: row.chunk_id,
    documentId: row.document_id,
    filename: row.filename,
    ordinal: row.ordinal,
    text: row.text,
    tokenCount: row.token_count,
    pages: parseNumbers(row.pages_json, "page list"),
    charStart: row.char_start,
    charEnd: row.char_end,
    contentHash: row.content_hash,
  };
}

/**
 * Turns free text into an FTS5 query: every letter/digit run becomes a quoted
 * term and the terms are OR-ed, so operators and punctuation typed by a user
 * are never parsed as query syntax.
 */
export function toFtsQuery(query: string): string | null {
  const terms = [...new Set(query.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [])];
  if (terms.length === 0) return null;
  return terms.map((t) => `"${t}"`).join(" OR ");
}

export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  let dot = 0;
  let na = 0;
  let nb = 0;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    na += av * av;
    nb += bv * bv;
  }

  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

function byScoreThenPosition(a: { score: number; chunk: Chunk }, b: { score: number; chunk: Chunk }): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.chunk.ordinal !== b.chunk.ordinal) return a.chunk.ordinal - b.chunk.ordinal;
  return a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0;
}

/**
 * better-sqlite3 index: a `chunks` table holding text, provenance and the
 * vector as JSON, mirrored into an FTS5 table for BM25 keyword search.
 * Vector search scans the collection and ranks by cosine similarity.
 */
export class SqliteChunkIndex implements ChunkIndex {
  private db: Database.Database;

  constructor(private readonly dbPath: string) {
    this.db = new Database(dbPath);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof IndexError) throw error;
      throw new IndexError(`Index ${operation} failed: ${describeError(error)}`, { cause: error });
    }
  }

  async init(): Promise<void> {
    this.guard("init", () => {
      this.db.pragma("journal_mode = WAL");

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS chunks (
          collection TEXT NOT NULL,
          chunk_id TEXT NOT NULL,
          document_id TEXT NOT NULL,
          filename TEXT NOT NULL,
          ordinal INTEGER NOT NULL,
          text TEXT NOT NULL,
          token_count INTEGER NOT NULL,
          pages_json TEXT NOT NULL,
          char_start INTEGER NOT NULL,
          char_end INTEGER NOT NULL,
          content_hash TEXT NOT NULL,
          vector_json TEXT NOT NULL,
          PRIMARY KEY (collection, chunk_id)
        );
      `);

      this.db.exec(`
        CREATE INDEX IF NOT EXISTS idx_chunks_document
        ON chunks(collection, document_id);
      `);

      this.db.exec(`
        CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
          text,
          collection UNINDEXED,
          chunk_id UNINDEXED,
          tokenize = 'porter unicode61'
        );
      `);
    });
  }

  private writeRows(collection: CollectionId, items: readonly EmbeddedChunk[]): void {
    const upsert = this.db.prepare(`
      INSERT INTO chunks (
        collection, chunk_id, document_id, filename, ordinal, text, token_count,
        pages_json, char_start, char_end, content_hash, vector_json
      )
      VALUES (
        @collection, @chunk_id, @document_id, @filename, @ordinal, @text, @token_count,
        @pages_json, @char_start, @char_end, @content_hash, @vector_json
      )
      ON CONFLICT(collection, chunk_id) DO UPDATE SET
        document_id = excluded.document_id,
        filename = excluded.filename,
        ordinal = excluded.ordinal,
        text = excluded.text,
        token_count = excluded.token_count,
        pages_json = excluded.pages_json,
        char_start = excluded.char_start,
        char_end = excluded.char_end,
        content_hash = excluded.content_hash,
        vector_json = excluded.vector_json;
    `);
    const dropFts = this.db.prepare(`DELETE FROM chunks_fts WHERE collection = ? AND chunk_id = ?`);
    const insertFts = this.db.prepare(`INSERT INTO chunks_fts (text, collection, chunk_id) VALUES (?, ?, ?)`);

    for (const it of items) {
      if (it.vector.length === 0) {
        throw new IndexError(`Chunk ${it.chunk.id} has an empty vector.`);
      }
      upsert.run({
        collection,
        chunk_id: it.chunk.id,
        document_id: it.chunk.documentId,
        filename: it.chunk.filename,
        ordinal: it.chunk.ordinal,
        text: it.chunk.text,
        token_count: it.chunk.tokenCount,
        pages_json: JSON.stringify(it.chunk.pages),
        char_start: it.chunk.charStart,
        char_end: it.chunk.charEnd,
        content_hash: it.chunk.contentHash,
        vector_json: JSON.stringify(it.vector),
      });
      dropFts.run(collection, it.chunk.id);
      insertFts.run(it.chunk.text, collection, it.chunk.id);
    }
  }

  private deleteRows(collection: CollectionId, documentId: DocumentId): number {
    this.db
      .prepare(
        `DELETE FROM chunks_fts WHERE collection = ? AND chunk_id IN (
           SELECT chunk_id FROM chunks WHERE collection = ? AND document_id = ?
         )`
      )
      .run(collection, collection, documentId);
    return this.db.prepare(`DELETE FROM chunks WHERE collection = ? AND document_id = ?`).run(collection, documentId)
      .changes;
  }

  async upsertChunks(params: { collection: CollectionId; items: readonly EmbeddedChunk[] }): Promise<void> {
    this.guard("upsert", () => {
      this.db.transaction(() => this.writeRows(params.collection, params.items))();
    });
  }

  async deleteDocument(params: { collection: CollectionId; documentId: DocumentId }): Promise<number> {
    return this.guard("delete", () => this.db.transaction(() => this.deleteRows(params.collection, params.documentId))());
  }

  async replaceDocument(params: {
    collection: CollectionId;
    documentId: DocumentId;
    items: readonly EmbeddedChunk[];
  }): Promise<number> {
    return this.guard("replace", () =>
      this.db.transaction(() => {
        const removed = this.deleteRows(params.collection, params.documentId);
        this.writeRows(params.collection, params.items);
        return removed;
      })()
    );
  }

  async keywordSearch(params: { collection: CollectionId; query: string; topK: number }): Promise<ChunkHit[]> {
    if (params.topK <= 0) return [];
    const match = toFtsQuery(params.query);
    if (!match) return [];

    return this.guard("keyword search", () => {
      const rows = this.db
        .prepare<[string, string, number], ScoredRow>(
          `
          SELECT ${CHUNK_COLUMNS}, -bm25(chunks_fts) AS score
          FROM chunks_fts
          JOIN chunks c ON c.collection = chunks_fts.collection AND c.chunk_id = chunks_fts.chunk_id
          WHERE chunks_fts MATCH ? AND chunks_fts.collection = ?
          ORDER BY score DESC, c.ordinal ASC, c.chunk_id ASC
          LIMIT ?
        `
        )
        .all(match, params.collection, Math.floor(params.topK));

      return rows.map((row) => ({ chunk: rowToChunk(row), score: row.score }));
    });
  }

  async vectorSearch(params: { collection: CollectionId; vector: EmbeddingVector; topK: number }): Promise<ChunkHit[]> {
    if (params.topK <= 0) return [];

    return this.guard("vector search", () => {
      const rows = this.db
        .prepare<[string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks c WHERE c.collection = ?`)
        .all(params.collection);

      const scored: ChunkHit[] = [];
      for (const row of rows) {
        const vector = parseNumbers(row.vector_json, "vector");
        if (vector.length !== params.vector.length) {
          throw new IndexError(
            `Query vector has dimension ${params.vector.length}, chunk ${row.chunk_id} has ${vector.length}.`
          );
        }
        scored.push({ chunk: rowToChunk(row), score: cosineSimilarity(params.vector, vector) });
      }

      scored.sort(byScoreThenPosition);
      return scored.slice(0, Math.floor(params.topK));
    });
  }

  async stats(collection: CollectionId): Promise<IndexStats> {
    return this.guard("stats", () => {
      const counts = this.db
        .prepare<[string], { chunks: number; documents: number }>(
          `SELECT COUNT(*) AS chunks, COUNT(DISTINCT document_id) AS documents FROM chunks WHERE collection = ?`
        )
        .get(collection);
      const sample = this.db
        .prepare<[string], { vector_json: string }>(`SELECT vector_json FROM chunks WHERE collection = ? LIMIT 1`)
        .get(collection);

      return {
        collection,
        chunks: counts?.chunks ?? 0,
        documents: counts?.documents ?? 0,
        dimension: sample ? parseNumbers(sample.vector_json, "vector").length : null,
      };
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
