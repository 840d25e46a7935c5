import { GenerationError, describeError, type FallbackReason } from "@docqa/core";
import type { GenerationRequest, LanguageModel } from "./languageModel.js";
import { cleanGeneratedText } from "./prompt.js";

export const DEFAULT_GENERATION_TIMEOUT_MS = 60_000;

export type GenerationOutcome =
  | { kind: "generated"; text: string }
  | { kind: "fallback"; reason: Extract<FallbackReason, "error" | "timeout" | "empty">; detail: string };

/** Extra attempts after a transient failure; three tries in all. */
export const DEFAULT_GENERATION_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 500;

export interface GenerationAttemptOptions {
  timeoutMs?: number;
  retries?: number;
  /** Wait before retry n is n times this. */
  retryDelayMs?: number;
  signal?: AbortSignal;
}

/** Network failures, rate limiting and server-side errors are worth another try. */
export function isTransientGenerationError(error: unknown): boolean {
  if (!(error instanceof GenerationError)) return false;
  return error.status === null || error.status === 429 || error.status >= 500;
}

const delay = (ms: number) => new Promise<"retry">((resolve) => setTimeout(() => resolve("retry"), ms));

/**
 * Bounded generation. Transient failures are retried, and all attempts share
 * one deadline. Expected failures (service errors, the deadline, blank
 * output) come back as a `fallback` outcome, never as a rejection. The model
 * sees an abort signal that fires on the deadline or when the caller's own
 * signal aborts.
 */
export async function attemptGeneration(
  model: LanguageModel,
  request: Omit<GenerationRequest, "signal">,
  opts: GenerationAttemptOptions = {}
): Promise<GenerationOutcome> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
  const retries = Math.max(0, Math.floor(opts.retries ?? DEFAULT_GENERATION_RETRIES));
  const retryDelayMs = Math.max(0, opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  opts.signal?.addEventListener("abort", onAbort, { once: true });
  if (opts.signal?.aborted) controller.abort();

  let timer: ReturnType<typeof setTimeout> | undefined;
  let expired = false;
  const deadline = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => {
      expired = true;
      controller.abort();
      resolve("timeout");
    }, timeoutMs);
  });
  const timedOut: GenerationOutcome = { kind: "fallback", reason: "timeout", detail: `no response within ${timeoutMs} ms` };

  try {
    for (let attempt = 0; ; attempt++) {
      try {
        const raced = await Promise.race([
          model.generate({ ...request, signal: controller.signal }).then((text) => ({ text })),
          deadline,
        ]);
        if (raced === "timeout") return timedOut;

        const text = cleanGeneratedText(raced.text);
        if (!text) return { kind: "fallback", reason: "empty", detail: "model returned no usable text" };
        return { kind: "generated", text };
      } catch (error) {
        if (expired) return timedOut;
        if (attempt >= retries || controller.signal.aborted || !isTransientGenerationError(error)) {
          return { kind: "fallback", reason: "error", detail: describeError(error) };
        }
      }

      if ((await Promise.race([delay(retryDelayMs * (attempt + 1)), deadline])) === "timeout") return timedOut;
    }
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onAbort);
  }
}
