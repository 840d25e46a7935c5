import pLimit from "p-limit";
import {
  DEFAULT_OCR_SCALE,
  DEFAULT_OCR_THRESHOLD,
  NullLogger,
  describeError,
  type DocumentMetadata,
  type ExtractedDocument,
  type Logger,
  type Page,
  type SourceDocument,
} from "@docqa/core";
import type { OcrEngine, PdfHandle, PdfReader } from "./capabilities.js";
import { extractionCacheKey, type ExtractionCache } from "./cache.js";
import { needsOcr } from "./ocrPolicy.js";

export interface ExtractorOptions {
  reader: PdfReader;
  /** Without an engine, thin pages keep their native text. */
  ocr?: OcrEngine | null;
  ocrThreshold?: number;
  ocrScale?: number;
  cache?: ExtractionCache | null;
  logger?: Logger;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

function nativePage(index: number, text: string): Page {
  return { index, text, charCount: text.length, ocrUsed: false, originalCharCount: text.length };
}

function failedDocument(source: SourceDocument, error: string): ExtractedDocument {
  return {
    documentId: source.id,
    filename: source.name,
    success: false,
    text: "",
    pageCount: 0,
    charCount: 0,
    wordCount: 0,
    ocrPageCount: 0,
    pages: [],
    metadata: {},
    error,
  };
}

export function assembleDocument(
  source: Pick<SourceDocument, "id" | "name">,
  pages: Page[],
  metadata: DocumentMetadata
): ExtractedDocument {
  const text = pages.map((p) => p.text).join("\n").trim();
  return {
    documentId: source.id,
    filename: source.name,
    success: true,
    text,
    pageCount: pages.length,
    charCount: text.length,
    wordCount: countWords(text),
    ocrPageCount: pages.filter((p) => p.ocrUsed).length,
    pages,
    metadata,
    error: null,
  };
}

/**
 * Turns PDF bytes into page-level text. Pages whose text layer is below the
 * OCR threshold are rasterised and recognised instead. Failures never escape
 * `extract`: a broken page carries an `error`/`ocrError` note and a broken
 * document comes back with `success: false`.
 */
export class Extractor {
  private readonly reader: PdfReader;
  private readonly ocr: OcrEngine | null;
  private readonly ocrThreshold: number;
  private readonly ocrScale: number;
  private readonly cache: ExtractionCache | null;
  private readonly logger: Logger;

  constructor(options: ExtractorOptions) {
    this.reader = options.reader;
    this.ocr = options.ocr ?? null;
    this.ocrThreshold = options.ocrThreshold ?? DEFAULT_OCR_THRESHOLD;
    this.ocrScale = options.ocrScale ?? DEFAULT_OCR_SCALE;
    this.cache = options.cache ?? null;
    this.logger = options.logger ?? new NullLogger();
  }

  /** Settings that change the output; part of the cache key. */
  get fingerprint(): string {
    return `threshold=${this.ocrThreshold};scale=${this.ocrScale};ocr=${this.ocr?.id ?? "none"}`;
  }

  async extract(source: SourceDocument): Promise<ExtractedDocument> {
    const cacheKey = this.cache ? extractionCacheKey(source.bytes, this.fingerprint) : null;

    if (this.cache && cacheKey) {
      const cached = await this.readCache(cacheKey, source.name);
      if (cached) {
        this.logger.debug("extraction cache hit", { filename: source.name });
        return { ...cached, documentId: source.id, filename: source.name };
      }
    }

    let handle: PdfHandle;
    try {
      handle = await this.reader.open(source.bytes);
    } catch (error) {
      const message = describeError(error);
      this.logger.warn("failed to open document", { filename: source.name, error: message });
      return failedDocument(source, message);
    }

    const pages: Page[] = [];
    try {
      for (let index = 0; index < handle.pageCount; index++) {
        pages.push(await this.extractPage(handle, index, source.name));
      }
    } finally {
      await handle.close().catch((error: unknown) => {
        this.logger.warn("failed to release document", { filename: source.name, error: describeError(error) });
      });
    }

    const document = assembleDocument(source, pages, handle.metadata);
    this.logger.info("extracted", {
      filename: source.name,
      pages: document.pageCount,
      chars: document.charCount,
      ocrPages: document.ocrPageCount,
    });

    if (this.cache && cacheKey) {
      await this.cache.set(cacheKey, document).catch((error: unknown) => {
        this.logger.warn("failed to write extraction cache", { filename: source.name, error: describeError(error) });
      });
    }

    return document;
  }

  /** Extracts every source with at most `concurrency` documents in flight; output keeps input order. */
  async extractBatch(
    sources: readonly SourceDocument[],
    opts?: { concurrency?: number }
  ): Promise<ExtractedDocument[]> {
    const limit = pLimit(Math.max(1, Math.floor(opts?.concurrency ?? 1)));
    return Promise.all(
      sources.map((source) =>
        limit(() =>
          this.extract(source).catch((error: unknown) => failedDocument(source, describeError(error)))
        )
      )
    );
  }

  private async readCache(key: string, filename: string): Promise<ExtractedDocument | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(key);
    } catch (error) {
      this.logger.warn("failed to read extraction cache", { filename, error: describeError(error) });
      return null;
    }
  }

  private async extractPage(handle: PdfHandle, index: number, filename: string): Promise<Page> {
    let native: string;
    try {
      native = (await handle.pageText(index)).trim();
    } catch (error) {
      const message = describeError(error);
      this.logger.warn("page text extraction failed", { filename, page: index, error: message });
      return { ...nativePage(index, ""), error: message };
    }

    if (!this.ocr || !needsOcr(native.length, this.ocrThreshold)) {
      return nativePage(index, native);
    }

    try {
      const image = await handle.renderPage(index, this.ocrScale);
      const recognised = (await this.ocr.recognize(image)).trim();
      const text = (native ? `${native}\n${recognised}` : recognised).trim();
      this.logger.debug("ocr applied", { filename, page: index, nativeChars: native.length, chars: text.length });
      return { index, text, charCount: text.length, ocrUsed: true, originalCharCount: native.length };
    } catch (error) {
      const message = describeError(error);
      this.logger.warn("ocr failed, keeping native text", { filename, page: index, error: message });
      return { ...nativePage(index, native), ocrError: message };
    }
  }
}
