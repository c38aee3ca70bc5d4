import type { CoreContext } from "./context.js";
import { isValidId } from "./utils.js";
import { CoreError } from "./types.js";
import { deleteVectorForItem } from "./vector-sync.js";
import { debug } from "../utils/logger.js";

/**
 * Hard delete a memory item by ID. The row, its vector and its access log go;
 * the history table keeps a `delete` event.
 *
 * @param ctx - Core context with dependencies
 * @param userId - Owner of the item
 * @param id - Memory item ID to delete
 * @returns true if item was deleted, false if not found
 * @throws CoreError if validation fails or the store is unavailable
 */
export async function deleteMemory(ctx: CoreContext, userId: string, id: string): Promise<boolean> {
  if (!isValidId(id)) {
    throw new CoreError("Invalid memory item ID", "VALIDATION");
  }

  const existing = ctx.store.get(userId, id);
  if (!existing) {
    return false;
  }

  return ctx.locks.withPartition(userId, existing.category, () =>
    ctx.store.transaction(() => {
      if (!ctx.store.delete(userId, id)) {
        return false;
      }
      deleteVectorForItem(ctx, id);
      ctx.store.appendHistory({
        itemId: id,
        userId,
        event: "delete",
        detail: { category: existing.category, tier: existing.tier, status: existing.status },
        createdAt: ctx.clock().toISOString(),
      });
      debug(() => `[Delete] Removed ${id} from ${userId}/${existing.category}`);
      return true;
    })
  );
}
