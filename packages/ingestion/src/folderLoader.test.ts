import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { sha256 } from "@docqa/core";
import { loadFolderDocuments } from "./folderLoader.js";

describe("loadFolderDocuments", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "docqa-folder-"));
    await mkdir(path.join(root, "manuals"));
    await mkdir(path.join(root, "node_modules"));
    await writeFile(path.join(root, "b.pdf"), "%PDF-b");
    await writeFile(path.join(root, "manuals", "A.PDF"), "%PDF-a");
    await writeFile(path.join(root, "notes.txt"), "not a pdf");
    await writeFile(path.join(root, ".hidden.pdf"), "%PDF-h");
    await writeFile(path.join(root, "~$draft.pdf"), "%PDF-lock");
    await writeFile(path.join(root, "node_modules", "dep.pdf"), "%PDF-dep");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads PDFs below the folder with ids from their relative paths", async () => {
    const docs = await loadFolderDocuments({ folderPath: root });

    expect(docs.map((d) => d.name)).toEqual(["b.pdf", "manuals/A.PDF"]);
    expect(docs[0]?.id).toBe(sha256("b.pdf"));
    expect(new TextDecoder().decode(docs[1]?.bytes)).toBe("%PDF-a");
  });
});
