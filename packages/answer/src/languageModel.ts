import { z } from "zod";
import { GenerationError, describeError, type FetchLike } from "@docqa/core";

export type GenerationRequest = {
  prompt: string;
  maxTokens?: number;
  signal?: AbortSignal;
};

export interface LanguageModel {
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}

const generateResponseSchema = z.object({
  response: z.string(),
});

export interface OllamaLanguageModelOptions {
  model: string;
  baseUrl?: string;
  temperature?: number;
  fetch?: FetchLike;
}

/** Non-streaming `/api/generate` client. */
export class OllamaLanguageModel implements LanguageModel {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OllamaLanguageModelOptions) {
    this.model = options.model.trim();
    this.baseUrl = (options.baseUrl ?? process.env.OLLAMA_BASE_URL ?? "http://localhost:11434").replace(/\/+$/, "");
    this.temperature = options.temperature ?? 0.2;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(request: GenerationRequest): Promise<string> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          prompt: request.prompt,
          stream: false,
          options: {
            temperature: this.temperature,
            ...(request.maxTokens !== undefined && { num_predict: request.maxTokens }),
          },
        }),
        ...(request.signal && { signal: request.signal }),
      });
    } catch (error) {
      throw new GenerationError(`Ollama generate request failed: ${describeError(error)}`, { cause: error });
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new GenerationError(`Ollama error: ${res.status} ${res.statusText}\n${text}`, { status: res.status });
    }

    const parsed = generateResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new GenerationError("Ollama generate response missing `response` text.", {
        cause: parsed.error,
        status: res.status,
      });
    }
    return parsed.data.response;
  }
}
