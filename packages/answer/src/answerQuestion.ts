import { z } from "zod";
import { ConfigurationError, DEFAULT_RRF_K, type QueryContext, type QueryResult } from "@docqa/core";
import type { Retriever } from "@docqa/retrieval";
import type { AnswerSynthesizer } from "./synthesizer.js";

export const queryContextSchema = z.object({
  question: z.string().trim().min(1, "question must not be empty"),
  mode: z.enum(["keyword", "vector", "hybrid"]).default("hybrid"),
  size: z.number().int().min(1).max(100).default(5),
  k: z.number().finite().positive().default(DEFAULT_RRF_K),
  useLlm: z.boolean().default(true),
});

export type QueryInput = z.input<typeof queryContextSchema>;

export function parseQueryContext(input: QueryInput): QueryContext {
  const parsed = queryContextSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "query"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid query: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}

/** Query path for one request: validate, retrieve, synthesise. */
export async function answerQuestion(
  deps: { retriever: Pick<Retriever, "retrieve">; synthesizer: Pick<AnswerSynthesizer, "synthesize"> },
  input: QueryInput,
  opts: { signal?: AbortSignal } = {}
): Promise<QueryResult> {
  const context = parseQueryContext(input);
  const retrieval = await deps.retriever.retrieve(context);
  return deps.synthesizer.synthesize(context, retrieval, opts);
}
