import type { CoreContext } from "./context.js";
import type { Category, Tier } from "../types/memory.js";
import type { MemoryStatistics } from "./types.js";

function emptyCategoryCounts(): Record<Category, number> {
  return {
    question: 0,
    task: 0,
    fact: 0,
    concept: 0,
    conversation: 0,
    greeting: 0,
    code: 0,
    document: 0,
    image: 0,
    video: 0,
    procedure: 0,
    workflow: 0,
    personal: 0,
    reference: 0,
    general: 0,
  };
}

function emptyTierCounts(): Record<Tier, number> {
  return { working: 0, short_term: 0, long_term: 0 };
}

/**
 * Per-user counts read from the trigger-maintained partition counters.
 *
 * @param ctx - Core context with dependencies
 * @param userId - User whose partitions are summarized
 */
export async function statistics(ctx: CoreContext, userId: string): Promise<MemoryStatistics> {
  const partitions = ctx.store.counts(userId);
  const byCategory = emptyCategoryCounts();
  const byTier = emptyTierCounts();
  let total = 0;

  for (const slice of partitions) {
    byCategory[slice.category] += slice.count;
    byTier[slice.tier] += slice.count;
    total += slice.count;
  }

  return {
    userId,
    total,
    byCategory,
    byTier,
    partitions: partitions.map(({ category, tier, count }) => ({ category, tier, count })),
    superseded: ctx.store.supersededCount(userId),
    pendingEmbeddings: ctx.store.countMissingEmbeddings(userId),
  };
}
