import { isCategory, isTier, type HistoryEvent, type HistoryEventType, type MemoryItem } from "../types/memory.js";
import { decodeVector } from "../vectors/index.js";

/**
 * Safely parse a JSON object column, returning {} on malformed data.
 */
function safeParseObject(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return {};
  } catch {
    return {};
  }
}

/**
 * Database row shape for memory_items queries
 */
export interface MemoryItemRow {
  id: string;
  user_id: string;
  category: string;
  tier: string;
  status: string;
  superseded_by: string | null;
  content: string;
  embedding: Buffer | null;
  metadata: string;
  access_count: number;
  created_at: string;
  last_accessed_at: string;
  tier_entered_at: string;
}

export interface HistoryRow {
  id: number;
  item_id: string;
  related_id: string | null;
  user_id: string;
  event: string;
  detail: string;
  created_at: string;
}

const HISTORY_EVENTS: readonly HistoryEventType[] = [
  "add",
  "merge",
  "supersede",
  "promote",
  "age_out",
  "evict",
  "delete",
  "reclassify",
];

function isHistoryEventType(value: string): value is HistoryEventType {
  return HISTORY_EVENTS.some((event) => event === value);
}

/**
 * Map a database row to a MemoryItem
 */
export function mapRowToMemoryItem(row: MemoryItemRow): MemoryItem {
  return {
    id: row.id,
    userId: row.user_id,
    content: row.content,
    embedding: row.embedding ? decodeVector(row.embedding) : null,
    category: isCategory(row.category) ? row.category : "general",
    tier: isTier(row.tier) ? row.tier : "working",
    status: row.status === "superseded" ? "superseded" : "active",
    supersededBy: row.superseded_by,
    metadata: safeParseObject(row.metadata),
    accessCount: row.access_count,
    createdAt: row.created_at,
    lastAccessedAt: row.last_accessed_at,
    tierEnteredAt: row.tier_entered_at,
  };
}

export function mapRowToHistoryEvent(row: HistoryRow): HistoryEvent {
  return {
    id: row.id,
    itemId: row.item_id,
    relatedId: row.related_id,
    userId: row.user_id,
    event: isHistoryEventType(row.event) ? row.event : "add",
    detail: safeParseObject(row.detail),
    createdAt: row.created_at,
  };
}

/**
 * Generate a unique ID for memory items
 * Uses timestamp + random suffix for uniqueness
 */
export function generateMemoryId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `mem_${timestamp}_${random}`;
}

/**
 * Validate memory item ID format
 */
export function isValidId(id: string): boolean {
  return typeof id === "string" && id.trim().length > 0 && id.length <= 128;
}
