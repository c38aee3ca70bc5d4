import type { DbHandle } from "../db/index.js";
import { embedWithDeadline, type EmbeddingProvider } from "../embed/index.js";
import type { VectorCollection } from "../vectors/index.js";
import type { RetrievalConfig } from "../config/schema.js";
import type { InputClassifier } from "../classify/input-classifier.js";
import type { MemoryStore } from "../store/memory-store.js";
import type { TieredMemoryManager } from "../tiers/tiered-memory-manager.js";
import { CATEGORIES, type Category, type MemoryItem, type QueryIntent } from "../types/memory.js";
import { CoreError, describeError } from "../core/types.js";
import { searchLexical, type LexicalHit } from "./lexical.js";
import { searchVector, type VectorSearchHit } from "./vector.js";
import { rrfFusion, type FusedHit, type HitSource } from "./fusion.js";
import { debug, timingAsync, warn } from "../utils/logger.js";

export type RetrievalMode = RetrievalConfig["mode"];

export interface RetrievedHit {
  item: MemoryItem;
  score: number;
  rrfScore: number;
  source: HitSource;
  snippet: string;
}

export interface RetrievalResult {
  query: string;
  userId: string;
  intent: QueryIntent;
  intentConfidence: number;
  categories: Category[];
  hits: RetrievedHit[];
  /** True when the routed partitions came up short and every category was searched. */
  widened: boolean;
  /** True when the embedding service failed and only lexical search ran. */
  degraded: boolean;
}

export interface ContextRetrieverOptions {
  db: DbHandle;
  store: MemoryStore;
  classifier: InputClassifier;
  embedProvider: EmbeddingProvider;
  vectors: VectorCollection;
  tiers: TieredMemoryManager;
  config: RetrievalConfig;
}

interface PassResult {
  fused: FusedHit[];
  snippets: Map<string, string>;
}

/**
 * Intent-routed hybrid retrieval: lexical and vector candidates from the
 * routed partitions, fused by reciprocal rank, widened to every category when
 * recall is short.
 */
export class ContextRetriever {
  private readonly options: ContextRetrieverOptions;

  constructor(options: ContextRetrieverOptions) {
    this.options = options;
  }

  private get config(): RetrievalConfig {
    return this.options.config;
  }

  async retrieve(query: string, userId: string, k: number = this.config.defaultK): Promise<RetrievalResult> {
    const intent = await this.options.classifier.classifyIntent(query);
    const result: RetrievalResult = {
      query,
      userId,
      intent: intent.intent,
      intentConfidence: intent.confidence,
      categories: intent.categories,
      hits: [],
      widened: false,
      degraded: false,
    };

    if (!query.trim() || k <= 0) {
      return result;
    }

    return timingAsync(`retrieve(${intent.intent})`, async () => {
      const vector = await this.embedQuery(query);
      result.degraded = this.config.mode !== "lexical" && vector === null;

      const first = this.searchPass(query, userId, intent.categories, vector);
      const collected = this.resolveItems(userId, first);

      if (collected.length < k && intent.categories.length < CATEGORIES.length) {
        const wide = this.searchPass(query, userId, undefined, vector);
        const seen = new Set(collected.map((hit) => hit.item.id));
        const extra = this.resolveItems(userId, wide).filter((hit) => !seen.has(hit.item.id));
        collected.push(...extra);
        result.widened = true;
        debug(() => `[Retriever] Widened to all categories, +${extra.length} hit(s)`);
      }

      result.hits = await this.touch(collected.slice(0, k));
      return result;
    });
  }

  /**
   * Query embedding bounded by `embedTimeoutMs`. Returns null when the
   * provider fails or is too slow, and for lexical-only mode.
   */
  private async embedQuery(query: string): Promise<number[] | null> {
    if (this.config.mode === "lexical") {
      return null;
    }

    try {
      return await embedWithDeadline(this.options.embedProvider, query, this.config.embedTimeoutMs);
    } catch (err) {
      warn(`Embedding unavailable, falling back to lexical retrieval: ${describeError(err)}`);
      return null;
    }
  }

  private searchPass(
    query: string,
    userId: string,
    categories: readonly Category[] | undefined,
    vector: number[] | null
  ): PassResult {
    const topK = this.config.candidateLimit;
    const useLexical = this.config.mode !== "vector" || vector === null;
    const useVector = this.config.mode !== "lexical" && vector !== null;

    try {
      const lexHits: LexicalHit[] = useLexical
        ? searchLexical(this.options.db, { query, userId, categories, topK })
        : [];
      const vecHits: VectorSearchHit[] =
        useVector && vector ? searchVector(this.options.vectors, vector, { userId, categories, topK }) : [];

      return {
        fused: rrfFusion(lexHits, vecHits, { rrfK: this.config.rrfK, candidateLimit: topK }),
        snippets: new Map(lexHits.map((hit) => [hit.id, hit.snippet])),
      };
    } catch (err) {
      if (err instanceof CoreError) throw err;
      throw new CoreError(`Search failed: ${describeError(err)}`, "STORE_UNAVAILABLE", err);
    }
  }

  /** Re-reads fused ids through the store, keeping only the caller's active items. */
  private resolveItems(userId: string, pass: PassResult): RetrievedHit[] {
    const items = this.options.store.getMany(
      userId,
      pass.fused.map((hit) => hit.id)
    );
    const byId = new Map(items.map((item) => [item.id, item]));

    return pass.fused.flatMap((hit) => {
      const item = byId.get(hit.id);
      if (!item || item.status !== "active") {
        return [];
      }
      return [
        {
          item,
          score: hit.score,
          rrfScore: hit.rrfScore,
          source: hit.source,
          snippet: pass.snippets.get(hit.id) ?? item.content.slice(0, 200),
        },
      ];
    });
  }

  private async touch(hits: RetrievedHit[]): Promise<RetrievedHit[]> {
    const touched: RetrievedHit[] = [];
    for (const hit of hits) {
      try {
        const item = await this.options.tiers.onAccess(hit.item);
        touched.push({ ...hit, item });
      } catch (err) {
        // Evicted or deleted between search and access
        if (err instanceof CoreError && err.code === "NOT_FOUND") {
          continue;
        }
        throw err;
      }
    }
    return touched;
  }
}
