import type { DbHandle } from "./index.js";
import { CATEGORIES, TIERS } from "../types/memory.js";

const categoryList = CATEGORIES.map((c) => `'${c}'`).join(", ");
const tierList = TIERS.map((t) => `'${t}'`).join(", ");

export function runMigrations(handle: DbHandle): void {
  const { db } = handle;

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    );
  `);

  const applied = new Set(
    db.prepare<[], { version: number }>(`SELECT version FROM schema_migrations`).all().map((row) => row.version)
  );
  if (!applied.has(1)) {
    migrateV1(handle);
  }
  if (!applied.has(2)) {
    migrateV2(handle);
  }
}

function migrateV1({ db }: DbHandle): void {
  db.transaction(() => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS memory_items (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        category TEXT NOT NULL CHECK(category IN (${categoryList})),
        tier TEXT NOT NULL DEFAULT 'working' CHECK(tier IN (${tierList})),
        status TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active', 'superseded')),
        superseded_by TEXT,
        content TEXT NOT NULL,
        embedding BLOB,
        metadata TEXT NOT NULL DEFAULT '{}',
        access_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        last_accessed_at TEXT NOT NULL,
        tier_entered_at TEXT NOT NULL
      );
    `);

    // (user_id, category) is the partition key
    db.exec(`CREATE INDEX IF NOT EXISTS idx_memory_items_partition ON memory_items(user_id, category, status, tier);`);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_memory_items_lru ON memory_items(user_id, category, tier, last_accessed_at);`);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_memory_items_missing_embedding ON memory_items(created_at) WHERE embedding IS NULL;`);

    db.exec(`
      CREATE TABLE IF NOT EXISTS item_accesses (
        item_id TEXT NOT NULL,
        accessed_at TEXT NOT NULL,
        FOREIGN KEY (item_id) REFERENCES memory_items(id) ON DELETE CASCADE
      );
    `);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_item_accesses_item ON item_accesses(item_id, accessed_at);`);

    db.exec(`
      CREATE TABLE IF NOT EXISTS partition_counts (
        user_id TEXT NOT NULL,
        category TEXT NOT NULL,
        tier TEXT NOT NULL,
        item_count INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (user_id, category, tier)
      );
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS memory_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        item_id TEXT NOT NULL,
        related_id TEXT,
        user_id TEXT NOT NULL,
        event TEXT NOT NULL,
        detail TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL
      );
    `);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_memory_history_item ON memory_history(user_id, item_id);`);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_memory_history_related ON memory_history(user_id, related_id);`);

    db.exec(`
      CREATE VIRTUAL TABLE IF NOT EXISTS memory_items_fts USING fts5(
        content,
        content_rowid UNINDEXED,
        tokenize='porter unicode61'
      );
    `);

    // Lexical index holds active rows only
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS memory_items_fts_ai AFTER INSERT ON memory_items
      WHEN new.status = 'active'
      BEGIN
        INSERT INTO memory_items_fts(content_rowid, content) VALUES (new.rowid, new.content);
      END;
    `);
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS memory_items_fts_ad AFTER DELETE ON memory_items
      BEGIN
        DELETE FROM memory_items_fts WHERE content_rowid = old.rowid;
      END;
    `);
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS memory_items_fts_au AFTER UPDATE OF content, status ON memory_items
      WHEN old.status = 'active' OR new.status = 'active'
      BEGIN
        DELETE FROM memory_items_fts WHERE content_rowid = old.rowid;
        INSERT INTO memory_items_fts(content_rowid, content)
        SELECT new.rowid, new.content
        WHERE new.status = 'active';
      END;
    `);

    // Partition counters change in the same statement as the row they count
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS partition_counts_ai AFTER INSERT ON memory_items
      WHEN new.status = 'active'
      BEGIN
        INSERT INTO partition_counts (user_id, category, tier, item_count)
        VALUES (new.user_id, new.category, new.tier, 1)
        ON CONFLICT(user_id, category, tier) DO UPDATE SET item_count = item_count + 1;
      END;
    `);
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS partition_counts_ad AFTER DELETE ON memory_items
      WHEN old.status = 'active'
      BEGIN
        UPDATE partition_counts SET item_count = item_count - 1
        WHERE user_id = old.user_id AND category = old.category AND tier = old.tier;
      END;
    `);
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS partition_counts_au AFTER UPDATE OF user_id, category, tier, status ON memory_items
      BEGIN
        UPDATE partition_counts SET item_count = item_count - 1
        WHERE old.status = 'active'
          AND user_id = old.user_id AND category = old.category AND tier = old.tier;
        INSERT INTO partition_counts (user_id, category, tier, item_count)
        SELECT new.user_id, new.category, new.tier, 1
        WHERE new.status = 'active'
        ON CONFLICT(user_id, category, tier) DO UPDATE SET item_count = item_count + 1;
      END;
    `);

    db.prepare(`
      INSERT INTO schema_migrations (version, applied_at)
      VALUES (1, datetime('now'))
    `).run();
  })();
}

// Access log pruning scans by time alone
function migrateV2({ db }: DbHandle): void {
  db.transaction(() => {
    db.exec(`CREATE INDEX IF NOT EXISTS idx_item_accesses_time ON item_accesses(accessed_at);`);
    db.prepare(`
      INSERT INTO schema_migrations (version, applied_at)
      VALUES (2, datetime('now'))
    `).run();
  })();
}
