import {
  DEFAULT_BOUNDARY_TOLERANCE,
  DEFAULT_MAX_TOKENS,
  DEFAULT_OVERLAP_TOKENS,
  DEFAULT_TARGET_TOKENS,
  defaultTokenizer,
  sha256,
  validateChunkingConfig,
  type Chunk,
  type DocumentId,
  type Page,
  type Tokenizer,
} from "@docqa/core";

export interface ChunkableDocument {
  documentId: DocumentId;
  filename: string;
  pages: readonly Pick<Page, "index" | "text">[];
}

export interface ChunkOptions {
  targetTokens?: number;
  /** Hard ceiling; no chunk is ever larger. */
  maxTokens?: number;
  overlapTokens?: number;
  /** How far below the target a paragraph or sentence break may be taken. */
  boundaryTolerance?: number;
  tokenizer?: Tokenizer;
}

type Break = "none" | "sentence" | "paragraph";

type Unit = {
  start: number;
  end: number; // exclusive, before trailing whitespace
  tokens: number;
  breakAfter: Break;
};

type PageSpan = { index: number; start: number; end: number };

const SENTENCE_END = /[.!?…]["'”’)\]]*$/;
const PARAGRAPH_GAP = /\n[^\S\n]*\n/;

/** Page texts joined with "\n"; chunk offsets refer to this string. */
export function documentText(pages: readonly Pick<Page, "text">[]): string {
  return pages.map((p) => p.text).join("\n");
}

function pageSpans(pages: readonly Pick<Page, "index" | "text">[]): PageSpan[] {
  const spans: PageSpan[] = [];
  let offset = 0;
  for (const page of pages) {
    spans.push({ index: page.index, start: offset, end: offset + page.text.length });
    offset += page.text.length + 1;
  }
  return spans;
}

// a low surrogate must stay with the high surrogate before it
function alignToCodePoint(text: string, index: number): number {
  const code = text.charCodeAt(index);
  return code >= 0xdc00 && code <= 0xdfff ? index + 1 : index;
}

/** Cuts a run into windows of at most `size` characters, so it is never tokenized whole. */
function charWindows(text: string, start: number, end: number, size: number): Array<[number, number]> {
  const windows: Array<[number, number]> = [];
  let from = start;
  while (from < end) {
    const to = Math.min(end, alignToCodePoint(text, from + size));
    windows.push([from, to]);
    from = to;
  }
  return windows;
}

/** Halves a whitespace-free run until every piece fits the ceiling. */
function splitOversized(text: string, start: number, end: number, maxTokens: number, tokenizer: Tokenizer): Array<[number, number]> {
  if (end - start <= 1 || tokenizer.count(text.slice(start, end)) <= maxTokens) {
    return [[start, end]];
  }
  let mid = alignToCodePoint(text, start + Math.floor((end - start) / 2));
  if (mid >= end) mid = end - 1;
  return [
    ...splitOversized(text, start, mid, maxTokens, tokenizer),
    ...splitOversized(text, mid, end, maxTokens, tokenizer),
  ];
}

function segment(text: string, maxTokens: number, tokenizer: Tokenizer): Unit[] {
  const units: Unit[] = [];
  const words = [...text.matchAll(/\S+/g)];

  for (let w = 0; w < words.length; w++) {
    const match = words[w]!;
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const nextStart = words[w + 1]?.index ?? text.length;
    const gap = text.slice(end, nextStart);

    let breakAfter: Break = "none";
    if (w === words.length - 1 || PARAGRAPH_GAP.test(gap)) breakAfter = "paragraph";
    else if (SENTENCE_END.test(match[0])) breakAfter = "sentence";

    const pieces =
      end - start > maxTokens
        ? charWindows(text, start, end, maxTokens).flatMap(([s, e]) => splitOversized(text, s, e, maxTokens, tokenizer))
        : splitOversized(text, start, end, maxTokens, tokenizer);
    pieces.forEach(([s, e], i) => {
      units.push({
        start: s,
        end: e,
        tokens: Math.max(1, tokenizer.count(text.slice(s, e))),
        breakAfter: i === pieces.length - 1 ? breakAfter : "none",
      });
    });
  }

  return units;
}

/**
 * Splits a document's pages into overlapping, token-bounded chunks.
 *
 * Each chunk grows up to `targetTokens`; if a paragraph break (or failing
 * that, a sentence end) sits within `boundaryTolerance` tokens below the
 * target, the chunk ends there instead of mid-sentence. The next chunk
 * restarts up to `overlapTokens` before the previous end. Chunk text is always
 * a verbatim slice of {@link documentText}.
 */
export function chunkDocument(doc: ChunkableDocument, opts: ChunkOptions = {}): Chunk[] {
  const { targetTokens, maxTokens, overlapTokens, boundaryTolerance } = validateChunkingConfig({
    targetTokens: opts.targetTokens ?? DEFAULT_TARGET_TOKENS,
    maxTokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
    overlapTokens: opts.overlapTokens ?? DEFAULT_OVERLAP_TOKENS,
    boundaryTolerance: opts.boundaryTolerance ?? DEFAULT_BOUNDARY_TOLERANCE,
  });
  const tokenizer = opts.tokenizer ?? defaultTokenizer;

  const text = documentText(doc.pages);
  if (!text.trim()) return [];

  const units = segment(text, maxTokens, tokenizer);
  const spans = pageSpans(doc.pages);
  const cum = [0];
  for (const u of units) cum.push(cum[cum.length - 1]! + u.tokens);
  const tokensBetween = (from: number, toInclusive: number) => cum[toInclusive + 1]! - cum[from]!;

  const out: Chunk[] = [];
  let start = 0;
  let prevEnd = -1;

  while (start < units.length) {
    let j = start;
    while (j < units.length && tokensBetween(start, j) <= targetTokens) j++;
    let end = Math.max(start, j - 1);

    if (end < units.length - 1) {
      end = preferredBoundary(units, start, end, Math.max(prevEnd + 1, start), targetTokens - boundaryTolerance, tokensBetween) ?? end;
    }

    let chunkText = text.slice(units[start]!.start, units[end]!.end);
    let tokenCount = tokenizer.count(chunkText);
    while (tokenCount > maxTokens && end > start) {
      end--;
      chunkText = text.slice(units[start]!.start, units[end]!.end);
      tokenCount = tokenizer.count(chunkText);
    }

    const charStart = units[start]!.start;
    const charEnd = units[end]!.end;
    const contentHash = sha256(chunkText);
    const ordinal = out.length;
    out.push({
      id: sha256(`${doc.documentId}:${ordinal}:${contentHash}`),
      documentId: doc.documentId,
      filename: doc.filename,
      ordinal,
      text: chunkText,
      tokenCount,
      pages: spans.filter((p) => p.start < charEnd && p.end > charStart).map((p) => p.index),
      charStart,
      charEnd,
      contentHash,
    });

    if (end >= units.length - 1) break;

    let k = end;
    let overlap = 0;
    while (k > start && overlap + units[k]!.tokens <= overlapTokens) {
      overlap += units[k]!.tokens;
      k--;
    }
    prevEnd = end;
    start = k + 1;
  }

  return out;
}

function preferredBoundary(
  units: Unit[],
  start: number,
  end: number,
  minEnd: number,
  minTokens: number,
  tokensBetween: (from: number, toInclusive: number) => number
): number | null {
  let sentence: number | null = null;
  for (let idx = end; idx >= minEnd; idx--) {
    if (tokensBetween(start, idx) < minTokens) break;
    const kind = units[idx]!.breakAfter;
    if (kind === "paragraph") return idx;
    if (kind === "sentence" && sentence === null) sentence = idx;
  }
  return sentence;
}

export interface ChunkStatistics {
  totalChunks: number;
  totalDocuments: number;
  avgTokensPerChunk: number;
  minTokens: number;
  maxTokens: number;
  documents: string[];
}

export function chunkStatistics(chunks: readonly Chunk[]): ChunkStatistics {
  const documents = [...new Set(chunks.map((c) => c.filename))];
  if (chunks.length === 0) {
    return { totalChunks: 0, totalDocuments: 0, avgTokensPerChunk: 0, minTokens: 0, maxTokens: 0, documents };
  }

  const tokens = chunks.map((c) => c.tokenCount);
  return {
    totalChunks: chunks.length,
    totalDocuments: documents.length,
    avgTokensPerChunk: Math.floor(tokens.reduce((a, b) => a + b, 0) / tokens.length),
    minTokens: Math.min(...tokens),
    maxTokens: Math.max(...tokens),
    documents,
  };
}
