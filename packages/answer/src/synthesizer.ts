import {
  NullLogger,
  type DegradedMode,
  type FallbackReason,
  type Logger,
  type QueryContext,
  type QueryResult,
  type RetrievalResult,
  type Tokenizer,
} from "@docqa/core";
import { buildGroundingContext } from "./context.js";
import { attemptGeneration } from "./generation.js";
import type { LanguageModel } from "./languageModel.js";
import { buildAnswerPrompt } from "./prompt.js";

export const NO_RESULTS_ANSWER = "No relevant documents found for your question.";
export const NO_TEXT_ANSWER = "The retrieved documents don't contain readable text.";

export interface AnswerSynthesizerOptions {
  /** Null leaves every query on the deterministic answer. */
  model: LanguageModel | null;
  timeoutMs?: number;
  /** Retries after a transient model failure, within the same timeout. */
  retries?: number;
  maxGeneratedTokens?: number;
  contextMaxTokens?: number;
  contextMaxChunks?: number;
  tokenizer?: Tokenizer;
  logger?: Logger;
}

/** Deterministic answer naming where the retrieved passages came from. */
export function fallbackAnswer(citations: readonly string[], passages: number): string {
  if (citations.length === 0) return NO_RESULTS_ANSWER;
  const noun = passages === 1 ? "passage" : "passages";
  return `Found ${passages} relevant ${noun} in: ${citations.join(", ")}.`;
}

export class AnswerSynthesizer {
  private readonly logger: Logger;

  constructor(private readonly options: AnswerSynthesizerOptions) {
    this.logger = options.logger ?? new NullLogger();
  }

  async synthesize(
    context: Pick<QueryContext, "question" | "useLlm">,
    retrieval: { results: RetrievalResult[]; degraded?: DegradedMode[] },
    opts: { signal?: AbortSignal } = {}
  ): Promise<QueryResult> {
    const { results } = retrieval;
    const degraded = retrieval.degraded ?? [];

    if (results.length === 0) {
      return this.fallback(NO_RESULTS_ANSWER, [], "no_context", results, degraded);
    }

    const grounding = buildGroundingContext(results, {
      ...(this.options.contextMaxTokens !== undefined && { maxTokens: this.options.contextMaxTokens }),
      ...(this.options.contextMaxChunks !== undefined && { maxChunks: this.options.contextMaxChunks }),
      ...(this.options.tokenizer !== undefined && { tokenizer: this.options.tokenizer }),
    });

    if (grounding.included.length === 0) {
      return this.fallback(NO_TEXT_ANSWER, [], "no_context", results, degraded);
    }

    const summary = fallbackAnswer(grounding.citations, grounding.included.length);
    const model = this.options.model;
    if (!context.useLlm || !model) {
      return this.fallback(summary, grounding.citations, "disabled", results, degraded);
    }

    const outcome = await attemptGeneration(
      model,
      {
        prompt: buildAnswerPrompt(context.question, grounding.text),
        ...(this.options.maxGeneratedTokens !== undefined && { maxTokens: this.options.maxGeneratedTokens }),
      },
      {
        ...(this.options.timeoutMs !== undefined && { timeoutMs: this.options.timeoutMs }),
        ...(this.options.retries !== undefined && { retries: this.options.retries }),
        ...(opts.signal && { signal: opts.signal }),
      }
    );

    if (outcome.kind === "fallback") {
      this.logger.warn("generation fell back", { model: model.model, reason: outcome.reason, detail: outcome.detail });
      return this.fallback(summary, grounding.citations, outcome.reason, results, degraded);
    }

    this.logger.debug("generated", { model: model.model, sources: grounding.citations.length });
    return {
      answer: outcome.text,
      citations: grounding.citations,
      sourcesUsed: grounding.citations.length,
      generationMethod: "llm_generated",
      results,
      degraded,
    };
  }

  private fallback(
    answer: string,
    citations: string[],
    reason: FallbackReason,
    results: RetrievalResult[],
    degraded: DegradedMode[]
  ): QueryResult {
    return {
      answer,
      citations,
      sourcesUsed: citations.length,
      generationMethod: "fallback",
      fallbackReason: reason,
      results,
      degraded,
    };
  }
}
