import type { ExtractedDocument } from "@docqa/core";
import { countWords } from "./extractor.js";

export interface PageSummary {
  index: number;
  charCount: number;
  wordCount: number;
  hasText: boolean;
  ocrUsed: boolean;
}

export interface DocumentSummary {
  filename: string;
  pageCount: number;
  totalChars: number;
  totalWords: number;
  avgWordsPerPage: number;
  ocrPageCount: number;
  pages: PageSummary[];
}

export function summarizeDocument(doc: ExtractedDocument): DocumentSummary {
  const pages = doc.pages.map((p) => ({
    index: p.index,
    charCount: p.charCount,
    wordCount: countWords(p.text),
    hasText: p.text.trim().length > 0,
    ocrUsed: p.ocrUsed,
  }));

  const totalChars = pages.reduce((sum, p) => sum + p.charCount, 0);
  const totalWords = pages.reduce((sum, p) => sum + p.wordCount, 0);

  return {
    filename: doc.filename,
    pageCount: doc.pageCount,
    totalChars,
    totalWords,
    avgWordsPerPage: doc.pageCount > 0 ? totalWords / doc.pageCount : 0,
    ocrPageCount: doc.ocrPageCount,
    pages,
  };
}
