import type { DbHandle } from "../db/index.js";
import type { Category } from "../types/memory.js";
import { debug, info } from "../utils/logger.js";

export interface VectorHit {
  id: string;
  distance: number;
  score: number;
  fields: VectorFields;
}

export interface VectorFields {
  userId: string;
  category: Category;
}

export interface VectorFilter {
  userId: string;
  /** Omitted means every category of the user. */
  categories?: readonly Category[];
}

export interface VectorCollection {
  insert(id: string, embedding: number[], fields: VectorFields): void;
  query(embedding: number[], topK: number, filter: VectorFilter): VectorHit[];
  updateFields(id: string, fields: Partial<VectorFields>): void;
  delete(id: string): void;
  count(): number;
  close(): void;
}

export function encodeVector(vector: readonly number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

export function decodeVector(blob: Buffer): number[] {
  // Copy first: SQLite buffers are not guaranteed to be 4-byte aligned
  const bytes = Uint8Array.from(blob);
  return Array.from(new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4)));
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

interface VectorRow {
  item_id: string;
  user_id: string;
  category: Category;
  vector: Buffer;
}

/**
 * Vector collection stored beside the items in SQLite. Queries read the
 * filtered partition and rank it by exact cosine similarity.
 */
export function createSqliteVectorCollection(handle: DbHandle, dimensions: number): VectorCollection {
  const { db } = handle;

  db.exec(`
    CREATE TABLE IF NOT EXISTS item_vectors (
      item_id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      category TEXT NOT NULL,
      dimensions INTEGER NOT NULL,
      vector BLOB NOT NULL
    );
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_item_vectors_partition ON item_vectors(user_id, category);`);

  const upsertStmt = db.prepare(`
    INSERT INTO item_vectors (item_id, user_id, category, dimensions, vector)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(item_id) DO UPDATE SET
      user_id = excluded.user_id,
      category = excluded.category,
      dimensions = excluded.dimensions,
      vector = excluded.vector
  `);
  const deleteStmt = db.prepare(`DELETE FROM item_vectors WHERE item_id = ?`);
  const countStmt = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM item_vectors`);

  info(() => `[VectorStore] SQLite collection ready (${dimensions} dimensions)`);

  return {
    insert(id: string, embedding: number[], fields: VectorFields): void {
      if (embedding.length !== dimensions) {
        throw new Error(`Vector for ${id} has ${embedding.length} dimensions, expected ${dimensions}`);
      }
      upsertStmt.run(id, fields.userId, fields.category, dimensions, encodeVector(embedding));
    },

    query(embedding: number[], topK: number, filter: VectorFilter): VectorHit[] {
      if (topK <= 0 || (filter.categories && filter.categories.length === 0)) {
        return [];
      }

      const params: string[] = [filter.userId];
      let sql = `SELECT item_id, user_id, category, vector FROM item_vectors WHERE user_id = ?`;
      if (filter.categories) {
        sql += ` AND category IN (${filter.categories.map(() => "?").join(", ")})`;
        params.push(...filter.categories);
      }

      const rows = db.prepare<string[], VectorRow>(sql).all(...params);
      debug(() => `[VectorStore] Scanning ${rows.length} vectors for ${filter.userId}`);

      return rows
        .map((row) => {
          const score = cosineSimilarity(embedding, decodeVector(row.vector));
          return {
            id: row.item_id,
            distance: 1 - score,
            score,
            fields: { userId: row.user_id, category: row.category },
          };
        })
        .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
        .slice(0, topK);
    },

    updateFields(id: string, fields: Partial<VectorFields>): void {
      if (fields.userId !== undefined) {
        db.prepare(`UPDATE item_vectors SET user_id = ? WHERE item_id = ?`).run(fields.userId, id);
      }
      if (fields.category !== undefined) {
        db.prepare(`UPDATE item_vectors SET category = ? WHERE item_id = ?`).run(fields.category, id);
      }
    },

    delete(id: string): void {
      deleteStmt.run(id);
    },

    count(): number {
      return countStmt.get()?.count ?? 0;
    },

    close(): void {
      debug(() => "[VectorStore] Closed");
    },
  };
}
