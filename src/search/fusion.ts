export type HitSource = "lex" | "vec" | "hybrid";

export interface RankedHit {
  id: string;
}

export interface FusedHit {
  id: string;
  /** Raw reciprocal-rank sum. */
  rrfScore: number;
  /** rrfScore divided by the best rrfScore of the list. */
  score: number;
  source: HitSource;
  lexRank: number | null;
  vecRank: number | null;
}

export interface FusionOptions {
  rrfK?: number;
  candidateLimit?: number;
}

const DEFAULT_OPTIONS: Required<FusionOptions> = {
  rrfK: 60,
  candidateLimit: 30,
};

/**
 * Reciprocal rank fusion: each list contributes 1 / (rank + k) with 1-based
 * ranks. Only ranks matter, so lexical and vector scores need no common scale.
 * Ties fall back to the better single-list rank, then to the id.
 */
export function rrfFusion(
  lexResults: readonly RankedHit[],
  vecResults: readonly RankedHit[],
  options: FusionOptions = {}
): FusedHit[] {
  const { rrfK, candidateLimit } = { ...DEFAULT_OPTIONS, ...options };

  const fused = new Map<string, { rrfScore: number; lexRank: number | null; vecRank: number | null }>();

  const addList = (hits: readonly RankedHit[], list: "lex" | "vec"): void => {
    const seen = new Set<string>();
    let rank = 0;
    for (const hit of hits) {
      if (seen.has(hit.id)) continue;
      seen.add(hit.id);
      rank += 1;
      if (rank > candidateLimit) break;

      const entry = fused.get(hit.id) ?? { rrfScore: 0, lexRank: null, vecRank: null };
      entry.rrfScore += 1 / (rank + rrfK);
      if (list === "lex") {
        entry.lexRank = rank;
      } else {
        entry.vecRank = rank;
      }
      fused.set(hit.id, entry);
    }
  };

  addList(lexResults, "lex");
  addList(vecResults, "vec");

  if (fused.size === 0) return [];

  const maxScore = Math.max(...[...fused.values()].map((entry) => entry.rrfScore));
  const bestRank = (entry: { lexRank: number | null; vecRank: number | null }): number =>
    Math.min(entry.lexRank ?? Number.POSITIVE_INFINITY, entry.vecRank ?? Number.POSITIVE_INFINITY);

  return [...fused.entries()]
    .map(([id, entry]) => {
      const source: HitSource =
        entry.lexRank !== null && entry.vecRank !== null ? "hybrid" : entry.lexRank !== null ? "lex" : "vec";
      return {
        id,
        rrfScore: entry.rrfScore,
        score: maxScore > 0 ? entry.rrfScore / maxScore : 0,
        source,
        lexRank: entry.lexRank,
        vecRank: entry.vecRank,
      };
    })
    .sort((a, b) => b.rrfScore - a.rrfScore || bestRank(a) - bestRank(b) || a.id.localeCompare(b.id));
}
