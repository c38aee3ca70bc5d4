import type { ClassifierConfig } from "../config/schema.js";
import type { ModelClassifier } from "../llm/types.js";
import {
  CATEGORIES,
  QUERY_INTENTS,
  isCategory,
  isQueryIntent,
  type Category,
  type MemoryMetadata,
  type QueryIntent,
} from "../types/memory.js";
import { LruCache } from "./lru-cache.js";
import { CATEGORY_PRIORITY, INTENT_PRIORITY, routeIntent } from "./routing.js";
import type { RuleTables } from "./rules.js";
import { debug } from "../utils/logger.js";

export const UNMATCHED_CONFIDENCE = 0.2;

const URL_PATTERN = /https?:\/\/[^\s<>"]+/g;

export type ClassificationSource = "rules" | "model" | "fallback";

export interface Classification {
  category: Category;
  confidence: number;
  source: ClassificationSource;
  metadata: MemoryMetadata;
  subcategories: string[];
}

export interface IntentClassification {
  intent: QueryIntent;
  confidence: number;
  source: ClassificationSource;
  categories: Category[];
}

export interface InputClassifierOptions {
  rules: RuleTables;
  config: ClassifierConfig;
  model?: ModelClassifier | null;
}

function ruleConfidence(hits: number): number {
  return Math.min(0.9, 0.5 + 0.1 * hits);
}

/**
 * Picks the label with the most matching patterns. `order` lists labels by
 * tie-break priority, so the first label to reach the top score wins.
 */
function bestByHits<L>(
  text: string,
  order: readonly L[],
  patterns: ReadonlyMap<L, readonly RegExp[]>
): { label: L; hits: number } | null {
  let best: { label: L; hits: number } | null = null;
  for (const label of order) {
    const hits = (patterns.get(label) ?? []).filter((pattern) => pattern.test(text)).length;
    if (hits > 0 && (!best || hits > best.hits)) {
      best = { label, hits };
    }
  }
  return best;
}

export class InputClassifier {
  private readonly rules: RuleTables;
  private readonly config: ClassifierConfig;
  private readonly model: ModelClassifier | null;
  private readonly categoryCache: LruCache<string, Classification>;
  private readonly intentCache: LruCache<string, IntentClassification>;

  constructor(options: InputClassifierOptions) {
    this.rules = options.rules;
    this.config = options.config;
    this.model = options.model ?? null;
    this.categoryCache = new LruCache(options.config.cacheSize);
    this.intentCache = new LruCache(options.config.cacheSize);
  }

  /** The fallback model, when configured and switched on. */
  private get activeModel(): ModelClassifier | null {
    return this.config.enableModelFallback ? this.model : null;
  }

  classifyByRules(text: string): Classification {
    const trimmed = text.trim();
    if (!trimmed) {
      return this.describe(trimmed, "general", UNMATCHED_CONFIDENCE, "fallback");
    }

    const best = bestByHits(trimmed, CATEGORY_PRIORITY, this.rules.categories);
    if (!best) {
      return this.describe(trimmed, "general", UNMATCHED_CONFIDENCE, "fallback");
    }
    return this.describe(trimmed, best.label, ruleConfidence(best.hits), "rules");
  }

  async classify(text: string): Promise<Classification> {
    const trimmed = text.trim();
    const cached = this.categoryCache.get(trimmed);
    if (cached) {
      return cached;
    }

    let result = this.classifyByRules(trimmed);
    const model = this.activeModel;
    if (trimmed && model && result.confidence < this.config.ruleConfidenceThreshold) {
      const answer = await model.classify(trimmed, CATEGORIES);
      if (answer && isCategory(answer.label) && answer.confidence > result.confidence) {
        debug(() => `[Classifier] Model relabelled ${result.category} -> ${answer.label}`);
        result = this.describe(trimmed, answer.label, answer.confidence, "model");
      }
    }

    this.categoryCache.set(trimmed, result);
    return result;
  }

  classifyIntentByRules(query: string): IntentClassification {
    const trimmed = query.trim();
    const best = trimmed ? bestByHits(trimmed, INTENT_PRIORITY, this.rules.intents) : null;
    if (!best) {
      return {
        intent: "general_search",
        confidence: UNMATCHED_CONFIDENCE,
        source: "fallback",
        categories: routeIntent("general_search"),
      };
    }
    return {
      intent: best.label,
      confidence: ruleConfidence(best.hits),
      source: "rules",
      categories: routeIntent(best.label),
    };
  }

  async classifyIntent(query: string): Promise<IntentClassification> {
    const trimmed = query.trim();
    const cached = this.intentCache.get(trimmed);
    if (cached) {
      return cached;
    }

    let result = this.classifyIntentByRules(trimmed);
    const model = this.activeModel;
    if (trimmed && model && result.confidence < this.config.ruleConfidenceThreshold) {
      const answer = await model.classify(trimmed, QUERY_INTENTS);
      if (answer && isQueryIntent(answer.label) && answer.confidence > result.confidence) {
        result = {
          intent: answer.label,
          confidence: answer.confidence,
          source: "model",
          categories: routeIntent(answer.label),
        };
      }
    }

    this.intentCache.set(trimmed, result);
    return result;
  }

  private describe(
    text: string,
    category: Category,
    confidence: number,
    source: ClassificationSource
  ): Classification {
    return {
      category,
      confidence,
      source,
      metadata: this.extractMetadata(text, category),
      subcategories: this.detectSubcategories(text, category),
    };
  }

  private extractMetadata(text: string, category: Category): MemoryMetadata {
    const metadata: MemoryMetadata = {};

    if (category === "task") {
      // "low priority" also contains "priority", so low is checked first
      if (this.rules.priority.low.some((pattern) => pattern.test(text))) {
        metadata.priority = "low";
      } else if (this.rules.priority.high.some((pattern) => pattern.test(text))) {
        metadata.priority = "high";
      } else {
        metadata.priority = "medium";
      }
    }

    if (category === "code") {
      const language = this.rules.languages.find((rule) => rule.pattern.test(text));
      if (language) {
        metadata.language = language.name;
      }
    }

    if (category === "reference") {
      const urls = text.match(URL_PATTERN);
      if (urls) {
        metadata.urls = urls;
      }
    }

    return metadata;
  }

  private detectSubcategories(text: string, category: Category): string[] {
    const rules = this.rules.subcategories.get(category) ?? [];
    return rules.filter((rule) => rule.pattern.test(text)).map((rule) => rule.name);
  }
}
