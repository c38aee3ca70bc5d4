import type { DbHandle } from "../db/index.js";
import { CoreError, describeError } from "../core/types.js";
import {
  mapRowToHistoryEvent,
  mapRowToMemoryItem,
  type HistoryRow,
  type MemoryItemRow,
} from "../core/utils.js";
import {
  isCategory,
  isTier,
  type Category,
  type HistoryEvent,
  type HistoryEventType,
  type MemoryItem,
  type MemoryMetadata,
  type Tier,
} from "../types/memory.js";
import { encodeVector } from "../vectors/index.js";
import { debug } from "../utils/logger.js";

export interface ScanOptions {
  tier?: Tier;
  limit?: number;
}

/** Fields that may change after creation. */
export interface MemoryUpdate {
  content?: string;
  category?: Category;
  tier?: Tier;
  metadata?: MemoryMetadata;
  embedding?: number[] | null;
  tierEnteredAt?: string;
}

export interface PartitionCount {
  userId: string;
  category: Category;
  tier: Tier;
  count: number;
}

export interface HistoryEntry {
  itemId: string;
  relatedId?: string | null;
  userId: string;
  event: HistoryEventType;
  detail?: Record<string, unknown>;
  createdAt: string;
}

type SqlValue = string | number | Buffer | null;

const ITEM_COLUMNS = `
  id, user_id, category, tier, status, superseded_by, content, embedding,
  metadata, access_count, created_at, last_accessed_at, tier_entered_at
`;

interface CountRow {
  user_id: string;
  category: string;
  tier: string;
  item_count: number;
}

/**
 * SQLite-backed item store partitioned by (user_id, category). Every failure
 * coming out of the driver is reported as STORE_UNAVAILABLE.
 */
export class MemoryStore {
  constructor(private readonly handle: DbHandle) {}

  private get db() {
    return this.handle.db;
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof CoreError) {
        throw err;
      }
      throw new CoreError(`Store ${operation} failed: ${describeError(err)}`, "STORE_UNAVAILABLE", err);
    }
  }

  /** Runs `fn` inside one SQLite transaction. */
  transaction<T>(fn: () => T): T {
    return this.guard("transaction", () => this.db.transaction(fn)());
  }

  insert(item: MemoryItem): void {
    this.guard("insert", () => {
      this.db
        .prepare(`
          INSERT INTO memory_items (${ITEM_COLUMNS})
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(id) DO UPDATE SET
            user_id = excluded.user_id,
            category = excluded.category,
            tier = excluded.tier,
            status = excluded.status,
            superseded_by = excluded.superseded_by,
            content = excluded.content,
            embedding = excluded.embedding,
            metadata = excluded.metadata,
            access_count = excluded.access_count,
            last_accessed_at = excluded.last_accessed_at,
            tier_entered_at = excluded.tier_entered_at
        `)
        .run(
          item.id,
          item.userId,
          item.category,
          item.tier,
          item.status,
          item.supersededBy,
          item.content,
          item.embedding ? encodeVector(item.embedding) : null,
          JSON.stringify(item.metadata),
          item.accessCount,
          item.createdAt,
          item.lastAccessedAt,
          item.tierEnteredAt
        );
      debug(() => `[Store] Upserted ${item.id} into ${item.userId}/${item.category}`);
    });
  }

  get(userId: string, id: string): MemoryItem | null {
    return this.guard("get", () => {
      const row = this.db
        .prepare<[string, string], MemoryItemRow>(`SELECT ${ITEM_COLUMNS} FROM memory_items WHERE id = ? AND user_id = ?`)
        .get(id, userId);
      return row ? mapRowToMemoryItem(row) : null;
    });
  }

  /** Items in the order of `ids`; unknown ids and other users' items are skipped. */
  getMany(userId: string, ids: readonly string[]): MemoryItem[] {
    if (ids.length === 0) {
      return [];
    }
    return this.guard("getMany", () => {
      const placeholders = ids.map(() => "?").join(", ");
      const rows = this.db
        .prepare<string[], MemoryItemRow>(
          `SELECT ${ITEM_COLUMNS} FROM memory_items WHERE user_id = ? AND id IN (${placeholders})`
        )
        .all(userId, ...ids);
      const byId = new Map(rows.map((row) => [row.id, mapRowToMemoryItem(row)]));
      return ids.flatMap((id) => {
        const item = byId.get(id);
        return item ? [item] : [];
      });
    });
  }

  update(userId: string, id: string, fields: MemoryUpdate): MemoryItem {
    return this.guard("update", () => {
      const sets: string[] = [];
      const params: SqlValue[] = [];

      if (fields.content !== undefined) {
        sets.push("content = ?");
        params.push(fields.content);
      }
      if (fields.category !== undefined) {
        sets.push("category = ?");
        params.push(fields.category);
      }
      if (fields.tier !== undefined) {
        sets.push("tier = ?");
        params.push(fields.tier);
      }
      if (fields.metadata !== undefined) {
        sets.push("metadata = ?");
        params.push(JSON.stringify(fields.metadata));
      }
      if (fields.embedding !== undefined) {
        sets.push("embedding = ?");
        params.push(fields.embedding ? encodeVector(fields.embedding) : null);
      }
      if (fields.tierEnteredAt !== undefined) {
        sets.push("tier_entered_at = ?");
        params.push(fields.tierEnteredAt);
      }

      if (sets.length > 0) {
        const result = this.db
          .prepare<SqlValue[]>(`UPDATE memory_items SET ${sets.join(", ")} WHERE id = ? AND user_id = ?`)
          .run(...params, id, userId);
        if (result.changes === 0) {
          throw new CoreError(`Memory item not found: ${id}`, "NOT_FOUND");
        }
      }

      const updated = this.get(userId, id);
      if (!updated) {
        throw new CoreError(`Memory item not found: ${id}`, "NOT_FOUND");
      }
      return updated;
    });
  }

  delete(userId: string, id: string): boolean {
    return this.guard("delete", () => {
      const result = this.db.prepare(`DELETE FROM memory_items WHERE id = ? AND user_id = ?`).run(id, userId);
      return result.changes > 0;
    });
  }

  /**
   * Active items of the given partitions, most recently used first. Reads
   * only the `(user_id, category)` slices it names.
   */
  scan(userId: string, categories: readonly Category[], options: ScanOptions = {}): MemoryItem[] {
    if (categories.length === 0) {
      return [];
    }
    return this.guard("scan", () => {
      const params: SqlValue[] = [userId, ...categories];
      let sql = `
        SELECT ${ITEM_COLUMNS} FROM memory_items
        WHERE user_id = ? AND category IN (${categories.map(() => "?").join(", ")}) AND status = 'active'
      `;
      if (options.tier) {
        sql += ` AND tier = ?`;
        params.push(options.tier);
      }
      sql += ` ORDER BY last_accessed_at DESC, created_at DESC, id ASC`;
      if (options.limit !== undefined) {
        sql += ` LIMIT ?`;
        params.push(options.limit);
      }
      return this.db.prepare<SqlValue[], MemoryItemRow>(sql).all(...params).map(mapRowToMemoryItem);
    });
  }

  /** Non-empty partition counters of one user, or of everyone when omitted. */
  counts(userId?: string): PartitionCount[] {
    return this.guard("counts", () => {
      const rows = userId === undefined
        ? this.db.prepare<[], CountRow>(`SELECT * FROM partition_counts WHERE item_count > 0`).all()
        : this.db
            .prepare<[string], CountRow>(`SELECT * FROM partition_counts WHERE user_id = ? AND item_count > 0`)
            .all(userId);
      return rows.flatMap((row) =>
        isCategory(row.category) && isTier(row.tier)
          ? [{ userId: row.user_id, category: row.category, tier: row.tier, count: row.item_count }]
          : []
      );
    });
  }

  partitionCount(userId: string, category: Category, tier: Tier): number {
    return this.guard("partitionCount", () => {
      const row = this.db
        .prepare<[string, string, string], { item_count: number }>(
          `SELECT item_count FROM partition_counts WHERE user_id = ? AND category = ? AND tier = ?`
        )
        .get(userId, category, tier);
      return row?.item_count ?? 0;
    });
  }

  recordAccess(userId: string, id: string, accessedAt: string): void {
    this.guard("recordAccess", () => {
      this.db.transaction(() => {
        const result = this.db
          .prepare(`
            UPDATE memory_items
            SET access_count = access_count + 1, last_accessed_at = ?
            WHERE id = ? AND user_id = ?
          `)
          .run(accessedAt, id, userId);
        if (result.changes === 0) {
          throw new CoreError(`Memory item not found: ${id}`, "NOT_FOUND");
        }
        this.db.prepare(`INSERT INTO item_accesses (item_id, accessed_at) VALUES (?, ?)`).run(id, accessedAt);
      })();
    });
  }

  countAccessesAfter(id: string, after: string): number {
    return this.guard("countAccessesAfter", () => {
      const row = this.db
        .prepare<[string, string], { count: number }>(
          `SELECT COUNT(*) AS count FROM item_accesses WHERE item_id = ? AND accessed_at > ?`
        )
        .get(id, after);
      return row?.count ?? 0;
    });
  }

  /** Drops access log rows older than `before`; returns how many went. */
  pruneAccessesBefore(before: string): number {
    return this.guard("pruneAccessesBefore", () =>
      this.db.prepare(`DELETE FROM item_accesses WHERE accessed_at < ?`).run(before).changes
    );
  }

  /** Least recently used active items of one partition tier. */
  lruCandidates(userId: string, category: Category, tier: Tier, limit: number): MemoryItem[] {
    return this.guard("lruCandidates", () =>
      this.db
        .prepare<[string, string, string, number], MemoryItemRow>(`
          SELECT ${ITEM_COLUMNS} FROM memory_items
          WHERE user_id = ? AND category = ? AND tier = ? AND status = 'active'
          ORDER BY last_accessed_at ASC, created_at ASC, id ASC
          LIMIT ?
        `)
        .all(userId, category, tier, limit)
        .map(mapRowToMemoryItem)
    );
  }

  /** Active items that entered `tier` before the given instant, oldest first. */
  listEnteredBefore(tier: Tier, before: string, limit: number): MemoryItem[] {
    return this.guard("listEnteredBefore", () =>
      this.db
        .prepare<[string, string, number], MemoryItemRow>(`
          SELECT ${ITEM_COLUMNS} FROM memory_items
          WHERE tier = ? AND status = 'active' AND tier_entered_at < ?
          ORDER BY tier_entered_at ASC, id ASC
          LIMIT ?
        `)
        .all(tier, before, limit)
        .map(mapRowToMemoryItem)
    );
  }

  markSuperseded(userId: string, id: string, supersededBy: string): void {
    this.guard("markSuperseded", () => {
      const result = this.db
        .prepare(`
          UPDATE memory_items SET status = 'superseded', superseded_by = ?
          WHERE id = ? AND user_id = ? AND status = 'active'
        `)
        .run(supersededBy, id, userId);
      if (result.changes === 0) {
        throw new CoreError(`Active memory item not found: ${id}`, "NOT_FOUND");
      }
    });
  }

  supersededCount(userId: string): number {
    return this.guard("supersededCount", () => {
      const row = this.db
        .prepare<[string], { count: number }>(
          `SELECT COUNT(*) AS count FROM memory_items WHERE user_id = ? AND status = 'superseded'`
        )
        .get(userId);
      return row?.count ?? 0;
    });
  }

  listMissingEmbeddings(limit: number): MemoryItem[] {
    return this.guard("listMissingEmbeddings", () =>
      this.db
        .prepare<[number], MemoryItemRow>(`
          SELECT ${ITEM_COLUMNS} FROM memory_items
          WHERE embedding IS NULL AND status = 'active'
          ORDER BY created_at ASC
          LIMIT ?
        `)
        .all(limit)
        .map(mapRowToMemoryItem)
    );
  }

  countMissingEmbeddings(userId: string): number {
    return this.guard("countMissingEmbeddings", () => {
      const row = this.db
        .prepare<[string], { count: number }>(
          `SELECT COUNT(*) AS count FROM memory_items WHERE user_id = ? AND embedding IS NULL AND status = 'active'`
        )
        .get(userId);
      return row?.count ?? 0;
    });
  }

  appendHistory(entry: HistoryEntry): void {
    this.guard("appendHistory", () => {
      this.db
        .prepare(`
          INSERT INTO memory_history (item_id, related_id, user_id, event, detail, created_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(
          entry.itemId,
          entry.relatedId ?? null,
          entry.userId,
          entry.event,
          JSON.stringify(entry.detail ?? {}),
          entry.createdAt
        );
    });
  }

  /** Events where the item is either the subject or the related item. */
  history(userId: string, id: string): HistoryEvent[] {
    return this.guard("history", () =>
      this.db
        .prepare<[string, string, string], HistoryRow>(`
          SELECT * FROM memory_history
          WHERE user_id = ? AND (item_id = ? OR related_id = ?)
          ORDER BY id ASC
        `)
        .all(userId, id, id)
        .map(mapRowToHistoryEvent)
    );
  }
}
