import pMap from "p-map";
import type { CoreContext } from "./context.js";
import type { MemoryItem } from "../types/memory.js";
import type { BackfillResult } from "./types.js";
import { describeError } from "./types.js";
import { syncVectorForItem } from "./vector-sync.js";
import { checkDimensions, withDeadline } from "../embed/index.js";
import { debug, warn } from "../utils/logger.js";

const BACKFILL_LIMIT = 500;

/**
 * Embed active items stored while the embedding service was down.
 *
 * Items are embedded in batches of `ai.embedding.batchSize`, with up to
 * `ai.embedding.concurrency` batches in flight. A failed batch is counted
 * and left for the next run.
 *
 * @param ctx - Core context with dependencies
 * @returns BackfillResult with counts and duration
 */
export async function backfillEmbeddings(ctx: CoreContext): Promise<BackfillResult> {
  const startTime = Date.now();
  const result: BackfillResult = { processed: 0, errors: 0, duration: 0 };

  const pending = ctx.store.listMissingEmbeddings(BACKFILL_LIMIT);
  if (pending.length === 0) {
    result.duration = Date.now() - startTime;
    return result;
  }

  const { batchSize, concurrency } = ctx.config.ai.embedding;
  const batches: MemoryItem[][] = [];
  for (let i = 0; i < pending.length; i += batchSize) {
    batches.push(pending.slice(i, i + batchSize));
  }

  await pMap(
    batches,
    async (batch) => {
      try {
        await backfillBatch(ctx, batch);
        result.processed += batch.length;
      } catch (error) {
        result.errors += batch.length;
        warn(`Embedding backfill failed for ${batch.length} item(s): ${describeError(error)}`);
      }
    },
    { concurrency }
  );

  result.duration = Date.now() - startTime;
  debug(() => `[Backfill] ${result.processed} embedded, ${result.errors} failed in ${result.duration}ms`);
  return result;
}

async function backfillBatch(ctx: CoreContext, batch: MemoryItem[]): Promise<void> {
  const provider = ctx.embedProvider;
  const embeddings = await withDeadline(ctx.config.retrieval.embedTimeoutMs * batch.length, "Embedding batch", (signal) =>
    provider.embedBatch(
      batch.map((item) => ({ id: item.id, text: item.content })),
      { signal }
    )
  );
  for (const entry of embeddings) {
    checkDimensions(entry.embedding, provider.dimensions, provider.model);
  }
  const byId = new Map(embeddings.map((entry) => [entry.id, entry.embedding]));

  for (const item of batch) {
    const embedding = byId.get(item.id);
    if (!embedding) {
      continue;
    }
    // The item may have changed category or content while the batch was embedding
    await ctx.locks.withPartition(item.userId, item.category, () => {
      const current = ctx.store.get(item.userId, item.id);
      if (!current || current.status !== "active" || current.content !== item.content || current.embedding) {
        return;
      }
      ctx.store.transaction(() => {
        const updated = ctx.store.update(current.userId, current.id, { embedding });
        syncVectorForItem(ctx, updated);
      });
    });
  }
}
