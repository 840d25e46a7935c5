export const DEFAULT_IGNORE_DIRS = new Set([
  ".git",
  "node_modules",
  "dist",
  "build",
  ".cache",
  ".data",
  "__MACOSX",
]);

export const DEFAULT_IGNORE_FILES = new Set([".DS_Store", "Thumbs.db"]);

export function isIgnoredFile(name: string): boolean {
  // editor lock files and dotfiles
  return DEFAULT_IGNORE_FILES.has(name) || name.startsWith("~$") || name.startsWith(".");
}
