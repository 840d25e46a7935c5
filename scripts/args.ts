import type { SearchMode } from "@docqa/core";

export function getArg(name: string): string | null {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

/**
 * Pass WITHOUT the leading "--"
 * Example: hasFlag("debug") checks for "--debug"
 */
export function hasFlag(flag: string): boolean {
  return process.argv.includes(`--${flag}`);
}

export function getArgNumber(name: string, fallback: number): number {
  const v = getArg(name);
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars).trimEnd() + "\n…";
}

export function parseMode(value: string | null): SearchMode {
  if (value === "keyword" || value === "vector" || value === "hybrid") return value;
  return "hybrid";
}
