import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IndexError, type Chunk, type EmbeddedChunk } from "@docqa/core";
import { SqliteChunkIndex, cosineSimilarity, toFtsQuery } from "./sqliteStore.js";

function item(id: string, text: string, vector: number[], opts: { documentId?: string; ordinal?: number } = {}): EmbeddedChunk {
  const chunk: Chunk = {
    id,
    documentId: opts.documentId ?? "manual",
    filename: `${opts.documentId ?? "manual"}.pdf`,
    ordinal: opts.ordinal ?? 0,
    text,
    tokenCount: text.split(" ").length,
    pages: [0, 1],
    charStart: 0,
    charEnd: text.length,
    contentHash: `hash-${id}`,
  };
  return { chunk, vector };
}

const LUBRICATION = item("a", "The centrifugal pump requires monthly lubrication.", [1, 0], { ordinal: 0 });
const VALVES = item("b", "Valve inspection happens every quarter.", [0, 1], { ordinal: 1 });
const VIBRATION = item("c", "Pump vibration above the limit means the bearing is worn.", [1, 1], { ordinal: 2 });

describe("toFtsQuery", () => {
  it("quotes every word and joins them with OR", () => {
    expect(toFtsQuery("What's the pump's RPM?")).toBe('"what" OR "s" OR "the" OR "pump" OR "rpm"');
  });

  it("returns null when nothing searchable remains", () => {
    expect(toFtsQuery("?! -- ()")).toBeNull();
  });
});

describe("cosineSimilarity", () => {
  it("is zero for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
  });
});

describe("SqliteChunkIndex", () => {
  let index: SqliteChunkIndex;

  beforeEach(async () => {
    index = new SqliteChunkIndex(":memory:");
    await index.init();
    await index.upsertChunks({ collection: "docs", items: [LUBRICATION, VALVES, VIBRATION] });
  });

  afterEach(async () => {
    await index.close();
  });

  it("finds keyword matches with positive scores, best first", async () => {
    const hits = await index.keywordSearch({ collection: "docs", query: "pump lubrication", topK: 10 });

    expect(hits.map((h) => h.chunk.id).sort()).toEqual(["a", "c"]);
    expect(hits[0]?.chunk.id).toBe("a");
    expect(hits.every((h) => h.score > 0)).toBe(true);
    expect(hits[0]!.score).toBeGreaterThanOrEqual(hits[1]!.score);
  });

  it("treats query syntax as plain words", async () => {
    const hits = await index.keywordSearch({ collection: "docs", query: 'valve" AND (NEAR', topK: 10 });
    expect(hits.map((h) => h.chunk.id)).toEqual(["b"]);
  });

  it("returns stored chunks unchanged", async () => {
    const [hit] = await index.keywordSearch({ collection: "docs", query: "quarter", topK: 1 });
    expect(hit?.chunk).toEqual(VALVES.chunk);
  });

  it("ranks vector hits by cosine similarity and honours topK", async () => {
    const hits = await index.vectorSearch({ collection: "docs", vector: [1, 0], topK: 2 });

    expect(hits.map((h) => h.chunk.id)).toEqual(["a", "c"]);
    expect(hits[0]?.score).toBe(1);
    expect(hits[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("breaks score ties by chunk ordinal", async () => {
    await index.upsertChunks({
      collection: "ties",
      items: [item("z", "later", [1, 0], { ordinal: 5 }), item("y", "earlier", [2, 0], { ordinal: 1 })],
    });

    const hits = await index.vectorSearch({ collection: "ties", vector: [3, 0], topK: 5 });
    expect(hits.map((h) => h.chunk.id)).toEqual(["y", "z"]);
  });

  it("rejects a query vector of another dimension", async () => {
    await expect(index.vectorSearch({ collection: "docs", vector: [1, 0, 0], topK: 3 })).rejects.toBeInstanceOf(
      IndexError
    );
  });

  it("keeps collections apart", async () => {
    await index.upsertChunks({ collection: "other", items: [item("d", "Pump manual for another site.", [1, 0])] });

    const docs = await index.keywordSearch({ collection: "docs", query: "site", topK: 10 });
    const other = await index.keywordSearch({ collection: "other", query: "pump", topK: 10 });

    expect(docs).toEqual([]);
    expect(other.map((h) => h.chunk.id)).toEqual(["d"]);
  });

  it("replaces a chunk on re-upsert without duplicating its text", async () => {
    await index.upsertChunks({ collection: "docs", items: [{ ...VALVES, chunk: { ...VALVES.chunk, text: "Valve seals replaced yearly." } }] });

    expect(await index.keywordSearch({ collection: "docs", query: "quarter", topK: 10 })).toEqual([]);
    const hits = await index.keywordSearch({ collection: "docs", query: "valve", topK: 10 });
    expect(hits.map((h) => [h.chunk.id, h.chunk.text])).toEqual([["b", "Valve seals replaced yearly."]]);
  });

  it("deletes every chunk of a document", async () => {
    await index.upsertChunks({
      collection: "docs",
      items: [item("e", "Pump spare parts list.", [0.5, 0.5], { documentId: "spares" })],
    });

    expect(await index.deleteDocument({ collection: "docs", documentId: "manual" })).toBe(3);
    const hits = await index.keywordSearch({ collection: "docs", query: "pump", topK: 10 });
    expect(hits.map((h) => h.chunk.id)).toEqual(["e"]);
    expect(await index.stats("docs")).toEqual({ collection: "docs", chunks: 1, documents: 1, dimension: 2 });
  });

  it("swaps a document's chunks in one replace", async () => {
    const removed = await index.replaceDocument({
      collection: "docs",
      documentId: "manual",
      items: [item("g", "Revised pump manual.", [1, 0])],
    });

    expect(removed).toBe(3);
    const hits = await index.keywordSearch({ collection: "docs", query: "pump", topK: 10 });
    expect(hits.map((h) => h.chunk.id)).toEqual(["g"]);
  });

  it("keeps the previous chunks when a replace fails part way", async () => {
    await expect(
      index.replaceDocument({
        collection: "docs",
        documentId: "manual",
        items: [item("g", "Revised pump manual.", [1, 0]), item("h", "Unembedded page.", [], { ordinal: 1 })],
      })
    ).rejects.toBeInstanceOf(IndexError);

    expect(await index.stats("docs")).toEqual({ collection: "docs", chunks: 3, documents: 1, dimension: 2 });
    const hits = await index.keywordSearch({ collection: "docs", query: "quarter", topK: 10 });
    expect(hits.map((h) => h.chunk.id)).toEqual(["b"]);
    expect(await index.keywordSearch({ collection: "docs", query: "revised", topK: 10 })).toEqual([]);
  });

  it("reports empty collections", async () => {
    expect(await index.stats("nothing")).toEqual({ collection: "nothing", chunks: 0, documents: 0, dimension: null });
    expect(await index.keywordSearch({ collection: "nothing", query: "pump", topK: 5 })).toEqual([]);
    expect(await index.vectorSearch({ collection: "nothing", vector: [1, 0], topK: 5 })).toEqual([]);
  });

  it("refuses chunks without a vector", async () => {
    await expect(index.upsertChunks({ collection: "docs", items: [item("f", "No vector.", [])] })).rejects.toBeInstanceOf(
      IndexError
    );
  });
});
