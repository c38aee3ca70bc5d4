import type { DbHandle } from "../db/index.js";
import type { Category } from "../types/memory.js";
import { containsHan, isStopword } from "../utils/text.js";
import { error, debug } from "../utils/logger.js";

export interface LexicalHit {
  id: string;
  snippet: string;
  score: number;
  source: "lex";
}

export interface LexicalSearchOptions {
  query: string;
  userId: string;
  /** Omitted means every category of the user. */
  categories?: readonly Category[];
  topK?: number;
}

interface LexicalRow {
  id: string;
  content: string;
  bm25_score: number;
  snippet: string;
}

type Param = string | number;

function buildFilterClause(
  userId: string,
  categories?: readonly Category[]
): { clause: string; params: Param[] } {
  const conditions: string[] = ["m.user_id = ?", "m.status = 'active'"];
  const params: Param[] = [userId];

  if (categories) {
    const placeholders = categories.map(() => "?").join(", ");
    conditions.push(`m.category IN (${placeholders})`);
    params.push(...categories);
  }

  return { clause: conditions.join(" AND "), params };
}

export function tokenizeForFts(input: string): string[] {
  const tokens = input
    .toLowerCase()
    .replace(/["'`]/g, " ")
    .split(/[^\p{L}\p{N}_]+/u)
    .map((token) => token.trim())
    .filter((token) => token.length >= 2);

  const unique = [...new Set(tokens)];
  const meaningful = unique.filter((token) => !isStopword(token));
  return (meaningful.length > 0 ? meaningful : unique).slice(0, 12);
}

function buildMatchQuery(tokens: string[], mode: "and" | "or"): string {
  const connector = mode === "and" ? " AND " : " OR ";
  return tokens.map((token) => `"${token}"`).join(connector);
}

/** Overlapping two-character grams of every Han run in the query. */
function hanGrams(query: string): string[] {
  const grams = new Set<string>();
  for (const match of query.matchAll(/\p{Script=Han}+/gu)) {
    const chars = Array.from(match[0]);
    if (chars.length === 1) {
      grams.add(chars[0]);
    }
    for (let i = 0; i < chars.length - 1; i++) {
      grams.add(chars[i] + chars[i + 1]);
    }
  }
  return [...grams].slice(0, 12);
}

/**
 * BM25 search over the FTS5 index of active items: strict AND of the query
 * tokens first, relaxed OR when that finds nothing, then substring matching
 * for Han text the unicode61 tokenizer cannot split.
 */
export function searchLexical(db: DbHandle, options: LexicalSearchOptions): LexicalHit[] {
  const { query, userId, categories, topK = 30 } = options;

  if (!query.trim() || (categories && categories.length === 0)) {
    return [];
  }

  const filter = buildFilterClause(userId, categories);

  const sql = `
    SELECT
      m.id,
      m.content,
      bm25(memory_items_fts) as bm25_score,
      snippet(memory_items_fts, 0, '<mark>', '</mark>', '...', 64) as snippet
    FROM memory_items_fts
    JOIN memory_items m ON memory_items_fts.content_rowid = m.rowid
    WHERE memory_items_fts MATCH ?
    AND ${filter.clause}
    ORDER BY bm25_score, m.id
    LIMIT ?
  `;

  const mapRows = (rows: LexicalRow[]): LexicalHit[] =>
    rows.map((row) => ({
      id: row.id,
      snippet: row.snippet || row.content.slice(0, 200),
      score: 1 / (1 + Math.abs(row.bm25_score)),
      source: "lex",
    }));

  const executeSearch = (matchQuery: string): LexicalHit[] => {
    const rows = db.db.prepare<Param[], LexicalRow>(sql).all(matchQuery, ...filter.params, topK);
    return mapRows(rows);
  };

  const searchHanFallback = (): LexicalHit[] => {
    const grams = hanGrams(query);
    if (grams.length === 0) {
      return [];
    }
    const matchCount = grams.map(() => "(instr(m.content, ?) > 0)").join(" + ");
    const rows = db.db
      .prepare<Param[], { id: string; content: string; matched: number }>(`
        SELECT id, content, matched FROM (
          SELECT m.id, m.content, m.last_accessed_at, (${matchCount}) AS matched
          FROM memory_items m
          WHERE ${filter.clause}
        )
        WHERE matched > 0
        ORDER BY matched DESC, last_accessed_at DESC, id
        LIMIT ?
      `)
      .all(...grams, ...filter.params, topK);

    return rows.map((row) => ({
      id: row.id,
      snippet: row.content.slice(0, 200),
      score: row.matched / grams.length,
      source: "lex",
    }));
  };

  const tokens = tokenizeForFts(query);
  if (tokens.length === 0) {
    debug(() => `[LexicalSearch] Query produced no searchable tokens (len=${query.length})`);
    // A single Han character is below the token length floor
    return containsHan(query) ? searchHanFallback() : [];
  }

  try {
    const strictHits = executeSearch(buildMatchQuery(tokens, "and"));
    if (strictHits.length > 0) {
      return strictHits;
    }

    if (tokens.length > 1) {
      const relaxedHits = executeSearch(buildMatchQuery(tokens, "or"));
      if (relaxedHits.length > 0) {
        return relaxedHits;
      }
    }

    return containsHan(query) ? searchHanFallback() : [];
  } catch (err) {
    error(() => `[LexicalSearch] FTS query error (queryLen=${query.length}): ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  }
}
