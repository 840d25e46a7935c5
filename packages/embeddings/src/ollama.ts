import { z } from "zod";
import {
  EmbeddingError,
  NullLogger,
  describeError,
  type EmbeddingVector,
  type FetchLike,
  type Logger,
} from "@docqa/core";
import { assertSameDimension, type Embedder } from "./embedder.js";

const embeddingResponseSchema = z.object({
  embedding: z.array(z.number().finite()),
});

const DEFAULT_BASE_URL = "http://localhost:11434";

function getOllamaBaseUrl(): string {
  return process.env.OLLAMA_BASE_URL ?? DEFAULT_BASE_URL;
}

function normalizeModelName(model: string): string {
  return model.trim();
}

export async function ollamaEmbedOne(args: {
  model: string;
  text: string;
  baseUrl?: string;
  fetch?: FetchLike;
  signal?: AbortSignal;
}): Promise<number[]> {
  const baseUrl = (args.baseUrl ?? getOllamaBaseUrl()).replace(/\/+$/, "");
  const doFetch = args.fetch ?? fetch;

  let res: Response;
  try {
    res = await doFetch(`${baseUrl}/api/embeddings`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model: normalizeModelName(args.model),
        prompt: args.text,
      }),
      ...(args.signal && { signal: args.signal }),
    });
  } catch (error) {
    throw new EmbeddingError(`Ollama embeddings request failed: ${describeError(error)}`, { cause: error });
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new EmbeddingError(`Ollama embeddings request failed: ${res.status} ${res.statusText}\n${body}`, {
      status: res.status,
    });
  }

  let payload: unknown;
  try {
    payload = await res.json();
  } catch (error) {
    throw new EmbeddingError("Ollama embeddings response is not JSON.", { cause: error });
  }

  const parsed = embeddingResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new EmbeddingError("Ollama embeddings response missing `embedding` array.", { cause: parsed.error });
  }
  if (parsed.data.embedding.length === 0) {
    throw new EmbeddingError("Ollama returned an empty embedding.");
  }

  return parsed.data.embedding;
}

export interface OllamaEmbedderOptions {
  model: string;
  baseUrl?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Embedder backed by Ollama's `/api/embeddings`. The first vector fixes the
 * dimension; any later vector of another length is rejected.
 */
export class OllamaEmbedder implements Embedder {
  readonly model: string;
  private readonly baseUrl: string | undefined;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly logger: Logger;
  private dimension: number | null = null;

  constructor(options: OllamaEmbedderOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl;
    this.fetchImpl = options.fetch;
    this.logger = options.logger ?? new NullLogger();
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const vector = await ollamaEmbedOne({
      model: this.model,
      text,
      ...(this.baseUrl !== undefined && { baseUrl: this.baseUrl }),
      ...(this.fetchImpl !== undefined && { fetch: this.fetchImpl }),
    });

    if (this.dimension === null) {
      this.dimension = vector.length;
      this.logger.debug("embedding dimension", { model: this.model, dimension: vector.length });
    }
    assertSameDimension([vector], this.dimension);
    return vector;
  }

  async embedBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
    const vectors: EmbeddingVector[] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }
    return vectors;
  }
}
