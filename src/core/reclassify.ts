import type { CoreContext } from "./context.js";
import type { Category, MemoryItem } from "../types/memory.js";
import { PartitionLocks } from "../store/partition-lock.js";
import { CoreError, ReclassifyInputSchema, parseInput, type ReclassifyInput } from "./types.js";
import { info } from "../utils/logger.js";

/**
 * Holds both partition locks, always taken in key order so two opposite
 * moves cannot wait on each other.
 */
function withBothPartitions<T>(
  locks: PartitionLocks,
  userId: string,
  a: Category,
  b: Category,
  fn: () => T
): Promise<T> {
  const [first, second] = [a, b].sort((x, y) =>
    PartitionLocks.key(userId, x).localeCompare(PartitionLocks.key(userId, y))
  );
  if (first === second) {
    return locks.withPartition(userId, first, fn);
  }
  return locks.withPartition(userId, first, () => locks.withPartition(userId, second, fn));
}

/**
 * Moves an active item to another category partition. Without an explicit
 * category the item's content is classified again.
 *
 * @param ctx - Core context with dependencies
 * @param input - userId, id and optional target category
 * @returns the item after the move (unchanged when the category is the same)
 * @throws CoreError NOT_FOUND for unknown ids, CONFLICT for superseded items
 */
export async function reclassify(ctx: CoreContext, input: ReclassifyInput): Promise<MemoryItem> {
  const data = parseInput(ReclassifyInputSchema, input);
  const existing = ctx.store.get(data.userId, data.id);
  if (!existing) {
    throw new CoreError(`Memory item not found: ${data.id}`, "NOT_FOUND");
  }
  if (existing.status !== "active") {
    throw new CoreError(`Cannot reclassify superseded item: ${data.id}`, "CONFLICT");
  }

  const classification = data.category ? null : await ctx.classifier.classify(existing.content);
  const target = data.category ?? classification?.category ?? existing.category;
  if (target === existing.category) {
    return existing;
  }

  return withBothPartitions(ctx.locks, data.userId, existing.category, target, () => {
    const current = ctx.store.get(data.userId, data.id);
    if (!current || current.status !== "active") {
      throw new CoreError(`Memory item not found: ${data.id}`, "NOT_FOUND");
    }

    const now = ctx.clock().toISOString();
    const metadata = classification
      ? { ...current.metadata, confidence: classification.confidence, classifiedBy: classification.source }
      : { ...current.metadata, classifiedBy: "manual" };

    const moved = ctx.store.transaction(() => {
      const updated = ctx.store.update(current.userId, current.id, { category: target, metadata });
      ctx.vectorCollection.updateFields(current.id, { category: target });
      ctx.store.appendHistory({
        itemId: current.id,
        userId: current.userId,
        event: "reclassify",
        detail: { from: current.category, to: target },
        createdAt: now,
      });
      return updated;
    });

    info(() => `[Reclassify] ${current.id}: ${current.category} -> ${target}`);
    ctx.tiers.evictOverflow(moved.userId, target, moved.tier);
    return moved;
  });
}
