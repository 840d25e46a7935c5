import { ConfigurationError, DEFAULT_RRF_K } from "@docqa/core";

export type RankedId = {
  id: string;
  /** 1-based position in its list. */
  rank: number;
};

export type FusedEntry = {
  id: string;
  score: number;
  /** Rank in each input list, by list position; null where absent. */
  ranks: Array<number | null>;
  /** Number of lists the id appeared in. */
  lists: number;
};

export function assertFusionK(k: number): number {
  if (!Number.isFinite(k) || k <= 0) {
    throw new ConfigurationError(`Rank fusion constant k must be a positive number, got ${k}.`);
  }
  return k;
}

/**
 * Reciprocal Rank Fusion: each id scores Σ 1/(k + rank) over the lists it
 * appears in. Ties go to the id found in more lists, then to the id seen
 * first when the lists are read in order. An id repeated within one list
 * counts once, at its best rank.
 */
export function reciprocalRankFusion(
  lists: ReadonlyArray<readonly RankedId[]>,
  opts: { k?: number; size?: number } = {}
): FusedEntry[] {
  const k = assertFusionK(opts.k ?? DEFAULT_RRF_K);
  const size = opts.size ?? Number.POSITIVE_INFINITY;
  if (size <= 0) return [];

  const entries = new Map<string, FusedEntry & { firstSeen: number }>();
  let seen = 0;

  lists.forEach((list, listIndex) => {
    const ordered = [...list].sort((a, b) => a.rank - b.rank);
    for (const { id, rank } of ordered) {
      let entry = entries.get(id);
      if (!entry) {
        entry = { id, score: 0, ranks: lists.map(() => null), lists: 0, firstSeen: seen++ };
        entries.set(id, entry);
      }
      if (entry.ranks[listIndex] !== null) continue;
      entry.ranks[listIndex] = rank;
      entry.lists++;
      entry.score += 1 / (k + rank);
    }
  });

  return [...entries.values()]
    .sort((a, b) => b.score - a.score || b.lists - a.lists || a.firstSeen - b.firstSeen)
    .slice(0, size)
    .map(({ firstSeen: _firstSeen, ...entry }) => entry);
}
