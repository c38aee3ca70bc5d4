import type { VectorCollection } from "../vectors/index.js";
import type { Category } from "../types/memory.js";
import { debug } from "../utils/logger.js";

export interface VectorSearchHit {
  id: string;
  score: number;
  source: "vec";
}

export interface VectorSearchOptions {
  userId: string;
  categories?: readonly Category[];
  topK?: number;
}

/**
 * Nearest active items to an already computed query vector. Items whose
 * vectors are missing simply do not appear.
 */
export function searchVector(
  vectorCollection: VectorCollection,
  embedding: number[],
  options: VectorSearchOptions
): VectorSearchHit[] {
  const { userId, categories, topK = 30 } = options;

  const results = vectorCollection.query(embedding, topK, { userId, categories });
  debug(() => `[VectorSearch] ${results.length} candidate(s) for ${userId}`);

  return results
    .filter((hit) => hit.score > 0)
    .map((hit) => ({ id: hit.id, score: hit.score, source: "vec" as const }));
}
