import { ConfigurationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export type Env = Readonly<Record<string, string | undefined>>;

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

interface NumberOptions {
  readonly min?: number;
  readonly max?: number;
}

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) return false;
  if (options?.min !== undefined && value < options.min) return false;
  if (options?.max !== undefined && value > options.max) return false;
  return true;
}

export function readString(env: Env, name: string, defaultValue: string): string {
  return normaliseEnvValue(env[name]) ?? defaultValue;
}

export function readOptionalString(env: Env, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readBool(env: Env, name: string, defaultValue: boolean): boolean {
  const normalised = normaliseEnvValue(env[name])?.toLowerCase();
  if (!normalised) return defaultValue;
  if (TRUE_LITERALS.has(normalised)) return true;
  if (FALSE_LITERALS.has(normalised)) return false;
  return defaultValue;
}

/** Base-10 integer; malformed or out-of-range literals yield the default. */
export function readInt(env: Env, name: string, defaultValue: number, options?: NumberOptions): number {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) return defaultValue;

  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) return defaultValue;
  return withinBounds(value, options) ? value : defaultValue;
}

export function readNumber(env: Env, name: string, defaultValue: number, options?: NumberOptions): number {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) return defaultValue;

  const value = Number(normalised);
  return withinBounds(value, options) ? value : defaultValue;
}

export interface OllamaConfig {
  readonly baseUrl: string;
  readonly embedModel: string;
  readonly llmModel: string;
  readonly llmTimeoutMs: number;
  readonly llmMaxTokens: number;
}

export interface ExtractionConfig {
  readonly ocrThreshold: number;
  readonly ocrScale: number;
  readonly ocrLanguage: string;
  readonly ocrLangPath: string | null;
  readonly cacheDir: string | null;
}

export interface ChunkingConfig {
  readonly targetTokens: number;
  readonly maxTokens: number;
  readonly overlapTokens: number;
  readonly boundaryTolerance: number;
}

export interface RetrievalConfig {
  readonly rrfK: number;
  readonly candidateMultiplier: number;
}

export interface AnswerConfig {
  readonly contextMaxTokens: number;
  readonly contextMaxChunks: number;
}

export interface DocqaConfig {
  readonly ollama: OllamaConfig;
  readonly extraction: ExtractionConfig;
  readonly chunking: ChunkingConfig;
  readonly retrieval: RetrievalConfig;
  readonly answer: AnswerConfig;
  readonly dbPath: string;
  readonly collection: string;
  readonly ingestConcurrency: number;
  readonly logLevel: LogLevel;
}

export const DEFAULT_OCR_THRESHOLD = 50;
export const DEFAULT_OCR_SCALE = 2;
export const DEFAULT_TARGET_TOKENS = 500;
export const DEFAULT_MAX_TOKENS = 600;
export const DEFAULT_OVERLAP_TOKENS = 50;
export const DEFAULT_BOUNDARY_TOLERANCE = 100;
export const DEFAULT_RRF_K = 60;

/**
 * Rejects combinations that every individual reader accepts but that make the
 * chunker or the fusion step meaningless.
 */
export function validateChunkingConfig(config: ChunkingConfig): ChunkingConfig {
  if (config.targetTokens > config.maxTokens) {
    throw new ConfigurationError(
      `Chunk target (${config.targetTokens}) must not exceed the ceiling (${config.maxTokens}).`
    );
  }
  if (config.overlapTokens >= config.targetTokens) {
    throw new ConfigurationError(
      `Chunk overlap (${config.overlapTokens}) must be smaller than the target (${config.targetTokens}).`
    );
  }
  return config;
}

export function loadConfig(env: Env = process.env): DocqaConfig {
  const logLevelRaw = readString(env, "DOCQA_LOG_LEVEL", "info").toLowerCase();

  const chunking = validateChunkingConfig({
    targetTokens: readInt(env, "DOCQA_CHUNK_TARGET_TOKENS", DEFAULT_TARGET_TOKENS, { min: 16, max: 8192 }),
    maxTokens: readInt(env, "DOCQA_CHUNK_MAX_TOKENS", DEFAULT_MAX_TOKENS, { min: 16, max: 8192 }),
    overlapTokens: readInt(env, "DOCQA_CHUNK_OVERLAP_TOKENS", DEFAULT_OVERLAP_TOKENS, { min: 0, max: 4096 }),
    boundaryTolerance: readInt(env, "DOCQA_CHUNK_BOUNDARY_TOLERANCE", DEFAULT_BOUNDARY_TOLERANCE, {
      min: 0,
      max: 4096,
    }),
  });

  const rrfK = readNumber(env, "DOCQA_RRF_K", DEFAULT_RRF_K);
  if (rrfK <= 0) {
    throw new ConfigurationError(`DOCQA_RRF_K must be positive, got ${rrfK}.`);
  }

  return {
    ollama: {
      baseUrl: readString(env, "OLLAMA_BASE_URL", "http://localhost:11434").replace(/\/+$/, ""),
      embedModel: readString(env, "DOCQA_EMBED_MODEL", "nomic-embed-text:latest"),
      llmModel: readString(env, "DOCQA_LLM_MODEL", "gemma3:4b"),
      llmTimeoutMs: readInt(env, "DOCQA_LLM_TIMEOUT_MS", 60_000, { min: 1 }),
      llmMaxTokens: readInt(env, "DOCQA_LLM_MAX_TOKENS", 512, { min: 1, max: 32_768 }),
    },
    extraction: {
      ocrThreshold: readInt(env, "DOCQA_OCR_THRESHOLD", DEFAULT_OCR_THRESHOLD, { min: 0 }),
      ocrScale: readNumber(env, "DOCQA_OCR_SCALE", DEFAULT_OCR_SCALE, { min: 0.5, max: 8 }),
      ocrLanguage: readString(env, "DOCQA_OCR_LANG", "eng"),
      ocrLangPath: readOptionalString(env, "DOCQA_OCR_LANG_PATH") ?? null,
      cacheDir: readOptionalString(env, "DOCQA_CACHE_DIR") ?? null,
    },
    chunking,
    retrieval: {
      rrfK,
      candidateMultiplier: readInt(env, "DOCQA_CANDIDATE_MULTIPLIER", 2, { min: 1, max: 20 }),
    },
    answer: {
      contextMaxTokens: readInt(env, "DOCQA_CONTEXT_MAX_TOKENS", 3000, { min: 1 }),
      contextMaxChunks: readInt(env, "DOCQA_CONTEXT_MAX_CHUNKS", 5, { min: 1, max: 100 }),
    },
    dbPath: readString(env, "DOCQA_DB_PATH", ".data/docqa.sqlite"),
    collection: readString(env, "DOCQA_COLLECTION", "documents"),
    ingestConcurrency: readInt(env, "DOCQA_INGEST_CONCURRENCY", 4, { min: 1, max: 32 }),
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : "info",
  };
}
