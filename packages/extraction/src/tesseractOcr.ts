import { createRequire } from "node:module";
import path from "node:path";
import { createWorker, PSM, type Worker, type WorkerOptions } from "tesseract.js";
import { ConfigurationError, NullLogger, describeError, type Logger } from "@docqa/core";
import type { OcrEngine } from "./capabilities.js";

const requireFromHere = createRequire(import.meta.url);

// Layout of the @tesseract.js-data/<lang> packages; the LSTM model the
// default engine mode loads.
const MODEL_DIR = "4.0.0_best_int";

/**
 * Directory of the installed `@tesseract.js-data/<language>` package holding
 * `<language>.traineddata.gz`, so recognition never downloads its model.
 */
export function bundledLangPath(language: string, resolve: (id: string) => string = requireFromHere.resolve): string {
  if (!/^[a-z_]+$/i.test(language)) {
    throw new ConfigurationError(
      `No bundled language data for "${language}"; set DOCQA_OCR_LANG_PATH to a directory holding its traineddata.`
    );
  }
  let manifest: string;
  try {
    manifest = resolve(`@tesseract.js-data/${language}/package.json`);
  } catch (error) {
    throw new ConfigurationError(
      `Language data for "${language}" is not installed (npm install @tesseract.js-data/${language}): ${describeError(error)}`,
      { cause: error }
    );
  }
  return path.join(path.dirname(manifest), MODEL_DIR);
}

export interface TesseractOcrOptions {
  language?: string;
  /** Directory or URL holding `<lang>.traineddata`; defaults to the installed `@tesseract.js-data` package. */
  langPath?: string | null;
  logger?: Logger;
}

/**
 * OCR through tesseract.js. Recognition runs in the library's worker thread,
 * so the calling event loop stays free while a page is being read.
 */
export class TesseractOcrEngine implements OcrEngine {
  readonly id: string;
  private readonly language: string;
  private readonly langPath: string | null;
  private readonly logger: Logger;
  private worker: Promise<Worker> | null = null;

  constructor(options: TesseractOcrOptions = {}) {
    this.language = options.language ?? "eng";
    this.langPath = options.langPath ?? null;
    this.logger = options.logger ?? new NullLogger();
    this.id = `tesseract:${this.language}`;
  }

  private getWorker(): Promise<Worker> {
    this.worker ??= this.startWorker().catch((error: unknown) => {
      this.worker = null;
      throw error;
    });
    return this.worker;
  }

  private async startWorker(): Promise<Worker> {
    const langPath = this.langPath ?? bundledLangPath(this.language);
    // the model is read from langPath each time; nothing is cached to the working directory
    const options: Partial<WorkerOptions> = { langPath, cacheMethod: "none" };
    this.logger.debug("starting tesseract worker", { language: this.language, langPath });
    const worker = await createWorker(this.language, undefined, options);
    // one uniform block of text per page
    await worker.setParameters({ tessedit_pageseg_mode: PSM.SINGLE_BLOCK });
    return worker;
  }

  async recognize(image: Uint8Array): Promise<string> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(Buffer.from(image));
    return data.text;
  }

  async terminate(): Promise<void> {
    if (!this.worker) return;
    const worker = await this.worker;
    this.worker = null;
    await worker.terminate();
  }
}
