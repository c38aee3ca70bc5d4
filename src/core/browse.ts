import type { CoreContext } from "./context.js";
import type { MemoryItem } from "../types/memory.js";
import { BrowseInputSchema, parseInput, type BrowseInput } from "./types.js";

/**
 * List active items of one category partition, most recently used first.
 * Does not count as an access.
 *
 * @param ctx - Core context with dependencies
 * @param input - userId, category, optional tier and limit
 * @throws CoreError VALIDATION for an unknown category or tier
 */
export async function browse(ctx: CoreContext, input: BrowseInput): Promise<MemoryItem[]> {
  const data = parseInput(BrowseInputSchema, input);
  return ctx.store.scan(data.userId, [data.category], { tier: data.tier, limit: data.limit });
}
