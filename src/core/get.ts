import type { CoreContext } from "./context.js";
import type { HistoryEvent, MemoryItem } from "../types/memory.js";
import { isValidId } from "./utils.js";
import { CoreError } from "./types.js";

/**
 * Fetch a single memory item by ID, scoped to its owner
 *
 * @param ctx - Core context with dependencies
 * @param userId - Owner of the item
 * @param id - Memory item ID to fetch
 * @returns MemoryItem (active or superseded) or null if not found
 * @throws CoreError if validation fails
 */
export async function get(ctx: CoreContext, userId: string, id: string): Promise<MemoryItem | null> {
  if (!isValidId(id)) {
    throw new CoreError("Invalid memory item ID", "VALIDATION");
  }
  return ctx.store.get(userId, id);
}

/**
 * Audit trail of an item: its own events plus those where it was the
 * replacement or merge source.
 */
export async function history(ctx: CoreContext, userId: string, id: string): Promise<HistoryEvent[]> {
  if (!isValidId(id)) {
    throw new CoreError("Invalid memory item ID", "VALIDATION");
  }
  return ctx.store.history(userId, id);
}
