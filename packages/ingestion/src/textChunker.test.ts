import { describe, expect, it } from "vitest";
import { ConfigurationError, type Tokenizer } from "@docqa/core";
import { chunkDocument, chunkStatistics, documentText, type ChunkableDocument } from "./textChunker.js";

const words: Tokenizer = { count: (text) => (text.match(/\S+/g) ?? []).length };

function doc(pages: string[], documentId = "doc-1"): ChunkableDocument {
  return { documentId, filename: `${documentId}.pdf`, pages: pages.map((text, index) => ({ index, text })) };
}

function numbered(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i + 1}`).join(" ");
}

describe("chunkDocument", () => {
  it("returns nothing for empty or whitespace-only documents", () => {
    expect(chunkDocument(doc([]), { tokenizer: words })).toEqual([]);
    expect(chunkDocument(doc(["", "  \n "]), { tokenizer: words })).toEqual([]);
  });

  it("keeps a short document in one chunk", () => {
    const chunks = chunkDocument(doc(["  Pumps need oil.  "]), { tokenizer: words });

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({
      ordinal: 0,
      text: "Pumps need oil.",
      tokenCount: 3,
      pages: [0],
      charStart: 2,
      charEnd: 17,
      filename: "doc-1.pdf",
    });
  });

  it("cuts on token counts and carries an overlap into the next chunk", () => {
    const chunks = chunkDocument(doc([numbered(25)]), {
      tokenizer: words,
      targetTokens: 10,
      maxTokens: 12,
      overlapTokens: 3,
      boundaryTolerance: 2,
    });

    expect(chunks.map((c) => c.text)).toEqual([
      "w1 w2 w3 w4 w5 w6 w7 w8 w9 w10",
      "w8 w9 w10 w11 w12 w13 w14 w15 w16 w17",
      "w15 w16 w17 w18 w19 w20 w21 w22 w23 w24",
      "w22 w23 w24 w25",
    ]);
    expect(chunks.map((c) => c.ordinal)).toEqual([0, 1, 2, 3]);
  });

  it("ends a chunk at a sentence when one is within tolerance", () => {
    const text =
      "Alpha beta gamma delta epsilon zeta eta theta. Iota kappa lambda mu nu xi omicron pi rho sigma.";
    const chunks = chunkDocument(doc([text]), {
      tokenizer: words,
      targetTokens: 10,
      maxTokens: 12,
      overlapTokens: 0,
      boundaryTolerance: 3,
    });

    expect(chunks.map((c) => c.text)).toEqual([
      "Alpha beta gamma delta epsilon zeta eta theta.",
      "Iota kappa lambda mu nu xi omicron pi rho sigma.",
    ]);
  });

  it("prefers a paragraph break over a later sentence end", () => {
    const text = "One two three. Four five six\n\nSeven eight nine ten eleven twelve";
    const chunks = chunkDocument(doc([text]), {
      tokenizer: words,
      targetTokens: 8,
      maxTokens: 10,
      overlapTokens: 0,
      boundaryTolerance: 6,
    });

    expect(chunks.map((c) => c.text)).toEqual(["One two three. Four five six", "Seven eight nine ten eleven twelve"]);
  });

  it("records which pages each chunk came from", () => {
    const pages = ["Alpha beta gamma", "delta epsilon"];
    const chunks = chunkDocument(doc(pages), {
      tokenizer: words,
      targetTokens: 3,
      maxTokens: 4,
      overlapTokens: 1,
      boundaryTolerance: 0,
    });

    expect(chunks.map((c) => [c.text, c.pages, c.charStart, c.charEnd])).toEqual([
      ["Alpha beta gamma", [0], 0, 16],
      ["gamma\ndelta epsilon", [0, 1], 11, 30],
    ]);
  });

  it("splits a single run longer than the ceiling", () => {
    const quarter: Tokenizer = { count: (text) => Math.ceil(text.length / 4) };
    const run = "x".repeat(100);

    const chunks = chunkDocument(doc([run]), {
      tokenizer: quarter,
      targetTokens: 8,
      maxTokens: 10,
      overlapTokens: 0,
      boundaryTolerance: 0,
    });

    expect(chunks.map((c) => c.text.length)).toEqual([20, 20, 20, 20, 20]);
    expect(chunks.every((c) => c.tokenCount <= 10)).toBe(true);
    expect(chunks.map((c) => c.text).join("")).toBe(run);
  });

  it("never tokenizes a long run in one piece", () => {
    let longest = 0;
    const quarter: Tokenizer = {
      count: (text) => {
        longest = Math.max(longest, text.length);
        return Math.ceil(text.length / 4);
      },
    };

    const chunks = chunkDocument(doc(["y".repeat(5000)]), {
      tokenizer: quarter,
      targetTokens: 8,
      maxTokens: 10,
      overlapTokens: 0,
      boundaryTolerance: 0,
    });

    expect(chunks).toHaveLength(250);
    expect(longest).toBe(20);
  });

  it("keeps surrogate pairs whole when cutting a run", () => {
    const chars: Tokenizer = { count: (text) => text.length };
    const run = "a" + "😀".repeat(6);

    const chunks = chunkDocument(doc([run]), {
      tokenizer: chars,
      targetTokens: 4,
      maxTokens: 4,
      overlapTokens: 0,
      boundaryTolerance: 0,
    });

    expect(chunks.map((c) => c.text).join("")).toBe(run);
    expect(chunks.map((c) => c.text)).toEqual(["a😀", "😀", "😀😀", "😀😀"]);
  });

  it("stays under the ceiling with the default tokenizer and is deterministic", () => {
    const paragraphs = Array.from({ length: 40 }, (_, p) =>
      Array.from(
        { length: 10 },
        (_, s) => `Section ${p}.${s} describes the maintenance schedule for pump ${(p + s) % 7} in detail.`
      ).join(" ")
    );
    const input = doc([paragraphs.slice(0, 20).join("\n\n"), paragraphs.slice(20).join("\n\n")]);
    const full = documentText(input.pages);

    const chunks = chunkDocument(input);
    const again = chunkDocument(input);

    expect(chunks.length).toBeGreaterThan(1);
    expect(again).toEqual(chunks);
    for (const chunk of chunks) {
      expect(chunk.tokenCount).toBeGreaterThan(0);
      expect(chunk.tokenCount).toBeLessThanOrEqual(600);
      expect(full.slice(chunk.charStart, chunk.charEnd)).toBe(chunk.text);
    }
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i]!.charStart).toBeGreaterThan(chunks[i - 1]!.charStart);
      expect(chunks[i]!.charStart).toBeLessThan(chunks[i - 1]!.charEnd);
    }
  });

  it("derives chunk ids from the document, position and content", () => {
    const a = chunkDocument(doc(["Same words here."], "a"), { tokenizer: words });
    const b = chunkDocument(doc(["Same words here."], "b"), { tokenizer: words });

    expect(a[0]!.contentHash).toBe(b[0]!.contentHash);
    expect(a[0]!.id).not.toBe(b[0]!.id);
    expect(a[0]!.id).toMatch(/^[a-f0-9]{64}$/);
  });

  it("rejects an overlap that is not smaller than the target", () => {
    expect(() => chunkDocument(doc(["text"]), { targetTokens: 10, overlapTokens: 10 })).toThrow(ConfigurationError);
    expect(() => chunkDocument(doc(["text"]), { targetTokens: 700, maxTokens: 600 })).toThrow(ConfigurationError);
  });
});

describe("chunkStatistics", () => {
  it("summarises token counts per collection of chunks", () => {
    const chunks = [
      ...chunkDocument(doc([numbered(5)], "a"), { tokenizer: words }),
      ...chunkDocument(doc([numbered(2)], "b"), { tokenizer: words }),
    ];

    expect(chunkStatistics(chunks)).toEqual({
      totalChunks: 2,
      totalDocuments: 2,
      avgTokensPerChunk: 3,
      minTokens: 2,
      maxTokens: 5,
      documents: ["a.pdf", "b.pdf"],
    });
    expect(chunkStatistics([]).totalChunks).toBe(0);
  });
});
