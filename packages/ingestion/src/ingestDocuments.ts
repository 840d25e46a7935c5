import {
  EmbeddingError,
  ExtractionError,
  NullLogger,
  type ChunkingConfig,
  type CollectionId,
  type ExtractedDocument,
  type Logger,
  type SourceDocument,
  type Tokenizer,
} from "@docqa/core";
import type { Embedder } from "@docqa/embeddings";
import type { Extractor } from "@docqa/extraction";
import type { ChunkIndex } from "@docqa/vectorstore";
import { chunkDocument } from "./textChunker.js";

export type IngestedFile = {
  documentId: string;
  filename: string;
  link: string | null;
  success: boolean;
  error: string | null;
  pageCount: number;
  ocrPageCount: number;
  charCount: number;
  wordCount: number;
  chunkCount: number;
};

export type IngestionReport = {
  files: IngestedFile[];
  totals: {
    files: number;
    succeeded: number;
    failed: number;
    pages: number;
    ocrPages: number;
    chunks: number;
  };
};

export interface IngestOptions {
  sources: readonly SourceDocument[];
  extractor: Pick<Extractor, "extractBatch">;
  embedder: Embedder;
  index: ChunkIndex;
  collection: CollectionId;
  chunking?: Partial<ChunkingConfig>;
  tokenizer?: Tokenizer;
  /** Documents extracted at once. */
  concurrency?: number;
  logger?: Logger;
}

function fileEntry(source: SourceDocument, doc: ExtractedDocument, chunkCount: number): IngestedFile {
  return {
    documentId: doc.documentId,
    filename: doc.filename,
    link: source.link ?? null,
    success: doc.success,
    error: doc.error,
    pageCount: doc.pageCount,
    ocrPageCount: doc.ocrPageCount,
    charCount: doc.charCount,
    wordCount: doc.wordCount,
    chunkCount,
  };
}

/**
 * Extracts every source (in parallel, bounded by `concurrency`), then chunks,
 * embeds and replaces each document in the index one at a time. A document
 * that cannot be extracted is reported and skipped; an embedding or index
 * failure aborts the run before any later document is written.
 */
export async function ingestDocuments(opts: IngestOptions): Promise<IngestionReport> {
  const logger = opts.logger ?? new NullLogger();
  const docs = await opts.extractor.extractBatch(opts.sources, {
    ...(opts.concurrency !== undefined && { concurrency: opts.concurrency }),
  });

  const store = async (source: SourceDocument, doc: ExtractedDocument): Promise<IngestedFile> => {
    if (!doc.success) {
      logger.warn("extraction failed", { filename: doc.filename, error: doc.error });
      return fileEntry(source, doc, 0);
    }

    const chunks = chunkDocument(doc, {
      ...opts.chunking,
      ...(opts.tokenizer !== undefined && { tokenizer: opts.tokenizer }),
    });

    const vectors = chunks.length > 0 ? await opts.embedder.embedBatch(chunks.map((c) => c.text)) : [];
    if (vectors.length !== chunks.length) {
      throw new EmbeddingError(`Embedding count mismatch: got ${vectors.length}, expected ${chunks.length}`);
    }

    const items = chunks.map((chunk, i) => {
      const vector = vectors[i];
      if (!vector) {
        throw new EmbeddingError(`Missing embedding for chunk index ${i} (chunkId=${chunk.id})`);
      }
      return { chunk, vector };
    });

    await opts.index.replaceDocument({ collection: opts.collection, documentId: doc.documentId, items });

    logger.info("ingested", {
      filename: doc.filename,
      pages: doc.pageCount,
      ocrPages: doc.ocrPageCount,
      chunks: chunks.length,
    });
    return fileEntry(source, doc, chunks.length);
  };

  const files: IngestedFile[] = [];
  for (const [i, source] of opts.sources.entries()) {
    const doc = docs[i];
    if (!doc) throw new ExtractionError(`No extraction result for ${source.name}`);
    files.push(await store(source, doc));
  }

  return {
    files,
    totals: {
      files: files.length,
      succeeded: files.filter((f) => f.success).length,
      failed: files.filter((f) => !f.success).length,
      pages: files.reduce((n, f) => n + f.pageCount, 0),
      ocrPages: files.reduce((n, f) => n + f.ocrPageCount, 0),
      chunks: files.reduce((n, f) => n + f.chunkCount, 0),
    },
  };
}
