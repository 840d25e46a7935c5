import type { DocumentMetadata } from "@docqa/core";

/** An opened PDF. Page indexes are 0-based. */
export interface PdfHandle {
  readonly pageCount: number;
  readonly metadata: DocumentMetadata;
  pageText(index: number): Promise<string>;
  /** Rasterises the page at `scale` times its natural size, as PNG bytes. */
  renderPage(index: number, scale: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface PdfReader {
  open(bytes: Uint8Array): Promise<PdfHandle>;
}

export interface OcrEngine {
  /** Stable identifier, part of the extraction cache key. */
  readonly id: string;
  recognize(image: Uint8Array): Promise<string>;
}
