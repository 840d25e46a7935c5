import { promises as fs } from "node:fs";
import path from "node:path";
import { sha256, type SourceDocument } from "@docqa/core";
import { DEFAULT_IGNORE_DIRS, isIgnoredFile } from "./ignore.js";

function isPdf(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".pdf";
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const ent of entries) {
    if (ent.isDirectory()) {
      if (DEFAULT_IGNORE_DIRS.has(ent.name)) continue;
      await walk(path.join(dir, ent.name), out);
    } else if (ent.isFile()) {
      if (isIgnoredFile(ent.name)) continue;
      out.push(path.join(dir, ent.name));
    }
  }
}

/**
 * Reads every PDF under `folderPath` into a SourceDocument. The id depends
 * only on the relative path, so re-ingesting a changed file replaces it.
 */
export async function loadFolderDocuments(params: { folderPath: string }): Promise<SourceDocument[]> {
  const root = path.resolve(params.folderPath);
  const files: string[] = [];
  await walk(root, files);

  const docs: SourceDocument[] = [];
  for (const absPath of files) {
    if (!isPdf(absPath)) continue;

    const relPath = path.relative(root, absPath).replaceAll("\\", "/");
    const bytes = await fs.readFile(absPath);

    docs.push({
      id: sha256(relPath),
      name: relPath,
      bytes: new Uint8Array(bytes),
      link: `file://${absPath.replaceAll("\\", "/")}`,
    });
  }

  return docs;
}
