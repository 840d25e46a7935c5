import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { sha256, type ExtractedDocument } from "@docqa/core";

/**
 * Content-addressed store for extraction results. Keys come from
 * {@link extractionCacheKey}, so identical bytes extracted with identical
 * settings share an entry.
 */
export interface ExtractionCache {
  get(key: string): Promise<ExtractedDocument | null>;
  set(key: string, document: ExtractedDocument): Promise<void>;
}

export function extractionCacheKey(bytes: Uint8Array, fingerprint: string): string {
  return sha256(`${sha256(bytes)}:${fingerprint}`);
}

export class MemoryExtractionCache implements ExtractionCache {
  private readonly entries = new Map<string, ExtractedDocument>();

  async get(key: string): Promise<ExtractedDocument | null> {
    const hit = this.entries.get(key);
    return hit ? structuredClone(hit) : null;
  }

  async set(key: string, document: ExtractedDocument): Promise<void> {
    this.entries.set(key, structuredClone(document));
  }

  get size(): number {
    return this.entries.size;
  }
}

const pageSchema = z.object({
  index: z.number().int().nonnegative(),
  text: z.string(),
  charCount: z.number().int().nonnegative(),
  ocrUsed: z.boolean(),
  originalCharCount: z.number().int().nonnegative(),
  ocrError: z.string().optional(),
  error: z.string().optional(),
});

const extractedDocumentSchema = z.object({
  documentId: z.string(),
  filename: z.string(),
  success: z.boolean(),
  text: z.string(),
  pageCount: z.number().int().nonnegative(),
  charCount: z.number().int().nonnegative(),
  wordCount: z.number().int().nonnegative(),
  ocrPageCount: z.number().int().nonnegative(),
  pages: z.array(pageSchema),
  metadata: z.object({ title: z.string().optional(), author: z.string().optional() }),
  error: z.string().nullable(),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** One JSON file per key under `dir`. Writes go through a rename. */
export class FileExtractionCache implements ExtractionCache {
  constructor(private readonly dir: string) {}

  private fileFor(key: string): string {
    if (!/^[a-f0-9]{64}$/.test(key)) {
      throw new Error(`Invalid extraction cache key: ${key}`);
    }
    return path.join(this.dir, `${key}.json`);
  }

  async get(key: string): Promise<ExtractedDocument | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.fileFor(key), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    const parsed = extractedDocumentSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) return null;

    const { metadata, pages, ...rest } = parsed.data;
    return {
      ...rest,
      metadata: {
        ...(metadata.title !== undefined && { title: metadata.title }),
        ...(metadata.author !== undefined && { author: metadata.author }),
      },
      pages: pages.map(({ ocrError, error, ...page }) => ({
        ...page,
        ...(ocrError !== undefined && { ocrError }),
        ...(error !== undefined && { error }),
      })),
    };
  }

  async set(key: string, document: ExtractedDocument): Promise<void> {
    const target = this.fileFor(key);
    await fs.mkdir(this.dir, { recursive: true });
    const tmp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(document, null, 2), "utf8");
    await fs.rename(tmp, target);
  }
}
