import { createCanvas } from "@napi-rs/canvas";
import { ExtractionError, describeError, type DocumentMetadata } from "@docqa/core";
import type { PdfHandle, PdfReader } from "./capabilities.js";

type PdfjsModule = typeof import("pdfjs-dist/legacy/build/pdf.mjs");
type PdfDocumentProxy = Awaited<ReturnType<PdfjsModule["getDocument"]>["promise"]>;
type PdfPageProxy = Awaited<ReturnType<PdfDocumentProxy["getPage"]>>;
type RenderParameters = Parameters<PdfPageProxy["render"]>[0];

let pdfjsPromise: Promise<PdfjsModule> | null = null;

// The legacy build carries the polyfills pdfjs needs outside a browser.
function loadPdfjs(): Promise<PdfjsModule> {
  pdfjsPromise ??= import("pdfjs-dist/legacy/build/pdf.mjs").then((pdfjs) => {
    pdfjs.GlobalWorkerOptions.workerSrc = "pdfjs-dist/legacy/build/pdf.worker.mjs";
    return pdfjs;
  });
  return pdfjsPromise;
}

function readInfoField(info: unknown, key: string): string | undefined {
  if (typeof info !== "object" || info === null) return undefined;
  const value: unknown = Reflect.get(info, key);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

class PdfjsHandle implements PdfHandle {
  constructor(
    private readonly doc: PdfDocumentProxy,
    readonly metadata: DocumentMetadata
  ) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async pageText(index: number): Promise<string> {
    const page = await this.doc.getPage(index + 1);
    try {
      const content = await page.getTextContent();
      let text = "";
      for (const item of content.items) {
        if (!("str" in item)) continue;
        text += item.str;
        if (item.hasEOL) text += "\n";
      }
      return text;
    } finally {
      page.cleanup();
    }
  }

  async renderPage(index: number, scale: number): Promise<Uint8Array> {
    const page = await this.doc.getPage(index + 1);
    try {
      const viewport = page.getViewport({ scale });
      const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
      // @napi-rs/canvas implements the 2D context pdfjs draws on, but its
      // declared type is not the DOM one pdfjs names.
      const params = { canvasContext: canvas.getContext("2d"), viewport } as unknown as RenderParameters;
      await page.render(params).promise;
      return canvas.toBuffer("image/png");
    } finally {
      page.cleanup();
    }
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

/** Reads PDFs with pdfjs-dist; rasterisation uses @napi-rs/canvas. */
export class PdfjsReader implements PdfReader {
  async open(bytes: Uint8Array): Promise<PdfHandle> {
    const pdfjs = await loadPdfjs();
    let doc: PdfDocumentProxy;
    try {
      // pdfjs detaches the buffer it is given; hand it a copy.
      doc = await pdfjs.getDocument({
        data: new Uint8Array(bytes),
        isEvalSupported: false,
        useSystemFonts: true,
        verbosity: 0,
      }).promise;
    } catch (error) {
      throw new ExtractionError(`Cannot open PDF: ${describeError(error)}`, { cause: error });
    }

    const { info } = await doc.getMetadata();
    const metadata: DocumentMetadata = {};
    const title = readInfoField(info, "Title");
    const author = readInfoField(info, "Author");
    if (title) metadata.title = title;
    if (author) metadata.author = author;

    return new PdfjsHandle(doc, metadata);
  }
}
