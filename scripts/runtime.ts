import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { AnswerSynthesizer, OllamaLanguageModel } from "@docqa/answer";
import { ConsoleLogger, type DocqaConfig } from "@docqa/core";
import { OllamaEmbedder } from "@docqa/embeddings";
import { Extractor, FileExtractionCache, PdfjsReader, TesseractOcrEngine } from "@docqa/extraction";
import { Retriever } from "@docqa/retrieval";
import { SqliteChunkIndex } from "@docqa/vectorstore";

function ensureDir(path: string) {
  mkdirSync(dirname(path), { recursive: true });
}

export function createLogger(config: DocqaConfig, scope: string): ConsoleLogger {
  return new ConsoleLogger({ level: config.logLevel, scope });
}

export async function openIndex(dbPath: string): Promise<SqliteChunkIndex> {
  if (dbPath !== ":memory:") ensureDir(dbPath);
  const index = new SqliteChunkIndex(dbPath);
  await index.init();
  return index;
}

export function createEmbedder(config: DocqaConfig, logger: ConsoleLogger): OllamaEmbedder {
  return new OllamaEmbedder({
    model: config.ollama.embedModel,
    baseUrl: config.ollama.baseUrl,
    logger: logger.child("embeddings"),
  });
}

export function createExtractor(config: DocqaConfig, logger: ConsoleLogger): { extractor: Extractor; ocr: TesseractOcrEngine } {
  const ocr = new TesseractOcrEngine({
    language: config.extraction.ocrLanguage,
    langPath: config.extraction.ocrLangPath,
    logger: logger.child("ocr"),
  });
  const extractor = new Extractor({
    reader: new PdfjsReader(),
    ocr,
    ocrThreshold: config.extraction.ocrThreshold,
    ocrScale: config.extraction.ocrScale,
    cache: config.extraction.cacheDir ? new FileExtractionCache(config.extraction.cacheDir) : null,
    logger: logger.child("extract"),
  });
  return { extractor, ocr };
}

export function createQueryPipeline(
  config: DocqaConfig,
  index: SqliteChunkIndex,
  collection: string,
  logger: ConsoleLogger
): { retriever: Retriever; synthesizer: AnswerSynthesizer } {
  const retriever = new Retriever({
    index,
    embedder: createEmbedder(config, logger),
    collection,
    candidateMultiplier: config.retrieval.candidateMultiplier,
    logger: logger.child("retrieve"),
  });
  const synthesizer = new AnswerSynthesizer({
    model: new OllamaLanguageModel({ model: config.ollama.llmModel, baseUrl: config.ollama.baseUrl }),
    timeoutMs: config.ollama.llmTimeoutMs,
    maxGeneratedTokens: config.ollama.llmMaxTokens,
    contextMaxTokens: config.answer.contextMaxTokens,
    contextMaxChunks: config.answer.contextMaxChunks,
    logger: logger.child("answer"),
  });
  return { retriever, synthesizer };
}
