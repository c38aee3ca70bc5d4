import type { CoreContext } from "./context.js";
import type { MemoryItem } from "../types/memory.js";
import { describeError } from "./types.js";
import { embedWithDeadline } from "../embed/index.js";
import { warn } from "../utils/logger.js";

/**
 * Embeds text, returning null instead of throwing when the provider is down,
 * too slow, or answers with the wrong vector size. Items stored without a
 * vector are picked up later by backfill.
 */
export async function tryEmbed(ctx: CoreContext, text: string): Promise<number[] | null> {
  try {
    return await embedWithDeadline(ctx.embedProvider, text, ctx.config.retrieval.embedTimeoutMs);
  } catch (error) {
    warn(`Embedding unavailable, storing without vector: ${describeError(error)}`);
    return null;
  }
}

/** Mirrors an item's cached embedding into the vector collection. */
export function syncVectorForItem(ctx: CoreContext, item: MemoryItem): void {
  if (item.status !== "active" || !item.embedding) {
    ctx.vectorCollection.delete(item.id);
    return;
  }
  ctx.vectorCollection.insert(item.id, item.embedding, { userId: item.userId, category: item.category });
}

export function deleteVectorForItem(ctx: CoreContext, id: string): void {
  ctx.vectorCollection.delete(id);
}
