import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, DocqaError, describeError } from "./errors.js";
import { loadConfig, readBool, readInt, validateChunkingConfig } from "./config.js";
import { ConsoleLogger } from "./logger.js";
import { TiktokenTokenizer } from "./tokenizer.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.extraction).toEqual({
      ocrThreshold: 50,
      ocrScale: 2,
      ocrLanguage: "eng",
      ocrLangPath: null,
      cacheDir: null,
    });
    expect(config.chunking).toEqual({ targetTokens: 500, maxTokens: 600, overlapTokens: 50, boundaryTolerance: 100 });
    expect(config.retrieval).toEqual({ rrfK: 60, candidateMultiplier: 2 });
    expect(config.ollama.baseUrl).toBe("http://localhost:11434");
    expect(config.ollama.llmModel).toBe("gemma3:4b");
    expect(config.logLevel).toBe("info");
  });

  it("reads overrides and trims trailing slashes from the base URL", () => {
    const config = loadConfig({
      OLLAMA_BASE_URL: "http://ollama:11434///",
      DOCQA_OCR_THRESHOLD: "80",
      DOCQA_CHUNK_TARGET_TOKENS: "300",
      DOCQA_CHUNK_OVERLAP_TOKENS: "30",
      DOCQA_LOG_LEVEL: "DEBUG",
      DOCQA_COLLECTION: " manuals ",
    });

    expect(config.ollama.baseUrl).toBe("http://ollama:11434");
    expect(config.extraction.ocrThreshold).toBe(80);
    expect(config.chunking.targetTokens).toBe(300);
    expect(config.chunking.overlapTokens).toBe(30);
    expect(config.logLevel).toBe("debug");
    expect(config.collection).toBe("manuals");
  });

  it("ignores malformed numbers", () => {
    const config = loadConfig({ DOCQA_OCR_THRESHOLD: "fifty", DOCQA_INGEST_CONCURRENCY: "500" });
    expect(config.extraction.ocrThreshold).toBe(50);
    expect(config.ingestConcurrency).toBe(4);
  });

  it("rejects a non-positive fusion constant", () => {
    expect(() => loadConfig({ DOCQA_RRF_K: "0" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ DOCQA_RRF_K: "-1" })).toThrow("DOCQA_RRF_K must be positive, got -1.");
  });

  it("rejects an overlap that swallows the chunk", () => {
    expect(() => loadConfig({ DOCQA_CHUNK_OVERLAP_TOKENS: "500" })).toThrow(ConfigurationError);
    expect(() =>
      validateChunkingConfig({ targetTokens: 700, maxTokens: 600, overlapTokens: 10, boundaryTolerance: 0 })
    ).toThrow("Chunk target (700) must not exceed the ceiling (600).");
  });
});

describe("env readers", () => {
  it("parses boolean and integer literals", () => {
    expect(readBool({ FLAG: "yes" }, "FLAG", false)).toBe(true);
    expect(readBool({ FLAG: "off" }, "FLAG", true)).toBe(false);
    expect(readBool({ FLAG: "maybe" }, "FLAG", true)).toBe(true);
    expect(readInt({ N: " 42 " }, "N", 1)).toBe(42);
    expect(readInt({ N: "4.5" }, "N", 1)).toBe(1);
    expect(readInt({ N: "3" }, "N", 10, { min: 5 })).toBe(10);
  });
});

describe("errors", () => {
  it("carries a machine-readable code", () => {
    const error = new ConfigurationError("bad", { cause: new Error("root") });

    expect(error).toBeInstanceOf(DocqaError);
    expect(error.code).toBe("E-DOCQA-CONFIG");
    expect(error.name).toBe("ConfigurationError");
    expect(describeError(error)).toBe("bad");
    expect(describeError({ reason: "x" })).toBe('{"reason":"x"}');
  });
});

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes the scope and drops lines below the level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: "info", scope: "ingest" });

    logger.info("done", { files: 2 });
    logger.child("ocr").info("worker ready");
    logger.debug("hidden");

    expect(info.mock.calls).toEqual([["[ingest] done", { files: 2 }], ["[ocr] worker ready"]]);
    expect(debug).not.toHaveBeenCalled();
  });
});

describe("TiktokenTokenizer", () => {
  it("counts cl100k tokens", () => {
    const tokenizer = new TiktokenTokenizer();
    expect(tokenizer.count("")).toBe(0);
    expect(tokenizer.count("hello world")).toBe(2);
  });
});
