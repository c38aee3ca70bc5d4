export const CATEGORIES = [
  "question",
  "task",
  "fact",
  "concept",
  "conversation",
  "greeting",
  "code",
  "document",
  "image",
  "video",
  "procedure",
  "workflow",
  "personal",
  "reference",
  "general",
] as const;

export type Category = (typeof CATEGORIES)[number];

export const QUERY_INTENTS = [
  "retrieve_fact",
  "find_procedure",
  "search_conversation",
  "locate_code",
  "find_document",
  "get_tasks",
  "general_search",
] as const;

export type QueryIntent = (typeof QUERY_INTENTS)[number];

export const TIERS = ["working", "short_term", "long_term"] as const;

export type Tier = (typeof TIERS)[number];

export type MemoryStatus = "active" | "superseded";

export type MemoryMetadata = Record<string, unknown>;

export interface MemoryItem {
  id: string;
  userId: string;
  content: string;
  embedding: number[] | null;
  category: Category;
  tier: Tier;
  status: MemoryStatus;
  supersededBy: string | null;
  metadata: MemoryMetadata;
  accessCount: number;
  createdAt: string;
  lastAccessedAt: string;
  tierEnteredAt: string;
}

export type HistoryEventType =
  | "add"
  | "merge"
  | "supersede"
  | "promote"
  | "age_out"
  | "evict"
  | "delete"
  | "reclassify";

export interface HistoryEvent {
  id: number;
  itemId: string;
  relatedId: string | null;
  userId: string;
  event: HistoryEventType;
  detail: Record<string, unknown>;
  createdAt: string;
}

export function isCategory(value: unknown): value is Category {
  return typeof value === "string" && CATEGORIES.some((entry) => entry === value);
}

export function isQueryIntent(value: unknown): value is QueryIntent {
  return typeof value === "string" && QUERY_INTENTS.some((entry) => entry === value);
}

export function isTier(value: unknown): value is Tier {
  return typeof value === "string" && TIERS.some((entry) => entry === value);
}

/** Position of a tier in the promotion order. */
export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

export function nextTier(tier: Tier): Tier | null {
  const index = tierRank(tier);
  return index < TIERS.length - 1 ? TIERS[index + 1] : null;
}
