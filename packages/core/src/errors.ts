export const ERROR_CODES = {
  configuration: "E-DOCQA-CONFIG",
  extraction: "E-DOCQA-EXTRACTION",
  embedding: "E-DOCQA-EMBEDDING",
  index: "E-DOCQA-INDEX",
  retrieval: "E-DOCQA-RETRIEVAL",
  generation: "E-DOCQA-GENERATION",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base error for the pipeline. The `code` is machine readable so callers can
 * branch without matching on messages.
 */
export class DocqaError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DocqaError";
    this.code = code;
  }
}

export class ConfigurationError extends DocqaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.configuration, options);
    this.name = "ConfigurationError";
  }
}

export class ExtractionError extends DocqaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.extraction, options);
    this.name = "ExtractionError";
  }
}

/** Raised when no vector can be produced; never masked by a zero vector. */
export class EmbeddingError extends DocqaError {
  public readonly status: number | null;

  constructor(message: string, options?: { cause?: unknown; status?: number | null }) {
    super(message, ERROR_CODES.embedding, options);
    this.name = "EmbeddingError";
    this.status = options?.status ?? null;
  }
}

export class IndexError extends DocqaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.index, options);
    this.name = "IndexError";
  }
}

export class RetrievalError extends DocqaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERROR_CODES.retrieval, options);
    this.name = "RetrievalError";
  }
}

export class GenerationError extends DocqaError {
  public readonly status: number | null;

  constructor(message: string, options?: { cause?: unknown; status?: number | null }) {
    super(message, ERROR_CODES.generation, options);
    this.name = "GenerationError";
    this.status = options?.status ?? null;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
