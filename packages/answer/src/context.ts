import { defaultTokenizer, type RetrievalResult, type Tokenizer } from "@docqa/core";

export const DEFAULT_CONTEXT_MAX_TOKENS = 3000;
export const DEFAULT_CONTEXT_MAX_CHUNKS = 5;

export type GroundingContext = {
  text: string;
  /** Results whose text made it into `text`, in rank order. */
  included: RetrievalResult[];
  /** Distinct filenames of `included`, in first-inclusion order. */
  citations: string[];
  tokenCount: number;
};

export function formatSourceBlock(result: RetrievalResult): string {
  return `[Source: ${result.filename}]\n${result.chunk.text.trim()}`;
}

/**
 * Concatenates result texts in rank order, each under a `[Source: …]` line,
 * until the next block would overrun the token budget.
 */
export function buildGroundingContext(
  results: readonly RetrievalResult[],
  opts: { maxTokens?: number; maxChunks?: number; tokenizer?: Tokenizer } = {}
): GroundingContext {
  const maxTokens = opts.maxTokens ?? DEFAULT_CONTEXT_MAX_TOKENS;
  const maxChunks = opts.maxChunks ?? DEFAULT_CONTEXT_MAX_CHUNKS;
  const tokenizer = opts.tokenizer ?? defaultTokenizer;

  const blocks: string[] = [];
  const included: RetrievalResult[] = [];
  let tokenCount = 0;

  for (const result of results) {
    if (included.length >= maxChunks) break;
    if (!result.chunk.text.trim()) continue;

    const block = formatSourceBlock(result);
    const cost = tokenizer.count(block);
    if (tokenCount + cost > maxTokens) break;

    blocks.push(block);
    included.push(result);
    tokenCount += cost;
  }

  return {
    text: blocks.join("\n\n"),
    included,
    citations: [...new Set(included.map((r) => r.filename))],
    tokenCount,
  };
}
