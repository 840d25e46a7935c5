export type ChunkId = string;
export type DocumentId = string;
export type CollectionId = string;

export type EmbeddingVector = readonly number[];

export interface SourceDocument {
  id: DocumentId;
  name: string;
  bytes: Uint8Array;
  link?: string;
}

export interface Page {
  readonly index: number; // 0-based
  readonly text: string;
  readonly charCount: number;
  readonly ocrUsed: boolean;
  readonly originalCharCount: number;
  readonly ocrError?: string;
  readonly error?: string;
}

export interface DocumentMetadata {
  title?: string;
  author?: string;
}

export interface ExtractedDocument {
  documentId: DocumentId;
  filename: string;
  success: boolean;
  text: string;
  pageCount: number;
  charCount: number;
  wordCount: number;
  ocrPageCount: number;
  pages: Page[];
  metadata: DocumentMetadata;
  error: string | null;
}

export interface Chunk {
  id: ChunkId;
  documentId: DocumentId;
  filename: string;
  ordinal: number;
  text: string;
  tokenCount: number;
  pages: number[];
  charStart: number;
  charEnd: number;
  contentHash: string;
}

export interface EmbeddedChunk {
  chunk: Chunk;
  vector: EmbeddingVector;
}

export type SearchMode = "keyword" | "vector" | "hybrid";

export interface QueryContext {
  question: string;
  mode: SearchMode;
  size: number;
  k: number;
  useLlm: boolean;
}

export type MatchType = "keyword" | "vector" | "hybrid";

export interface RetrievalResult {
  chunk: Chunk;
  score: number;
  filename: string;
  matchType: MatchType;
  ranks: { keyword?: number; vector?: number };
}

export type GenerationMethod = "llm_generated" | "fallback";

export type FallbackReason = "disabled" | "no_context" | "error" | "timeout" | "empty";

export interface QueryResult {
  answer: string;
  citations: string[];
  sourcesUsed: number;
  generationMethod: GenerationMethod;
  fallbackReason?: FallbackReason;
  results: RetrievalResult[];
  degraded: DegradedMode[];
}

export interface DegradedMode {
  mode: "keyword" | "vector";
  error: string;
}

/** The subset of `fetch` the HTTP clients use; tests pass an in-process fake. */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
