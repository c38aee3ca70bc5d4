import type { CoreContext } from "./context.js";
import type { MemoryItem, MemoryMetadata } from "../types/memory.js";
import type { Classification } from "../classify/input-classifier.js";
import type { ConflictDecision } from "../conflict/resolver.js";
import { AddMemoryInputSchema, CoreError, parseInput, type AddMemoryInput, type AddResult } from "./types.js";
import { generateMemoryId } from "./utils.js";
import { syncVectorForItem, tryEmbed } from "./vector-sync.js";
import { debug, info } from "../utils/logger.js";

/** Classifier output folded under the caller's metadata; caller keys win. */
function buildMetadata(classification: Classification, metadata: MemoryMetadata): MemoryMetadata {
  return {
    ...classification.metadata,
    ...(classification.subcategories.length > 0 ? { subcategories: classification.subcategories } : {}),
    confidence: classification.confidence,
    classifiedBy: classification.source,
    ...metadata,
  };
}

/**
 * Add a memory item: classify, embed, then resolve against the partition
 * under its lock and insert, merge or supersede.
 *
 * The partition lock is held from the candidate scan until the write lands,
 * so two concurrent adds to one partition see each other's result.
 *
 * @param ctx - Core context with dependencies
 * @param input - content, userId and optional metadata
 * @throws CoreError VALIDATION for bad input, STORE_UNAVAILABLE when SQLite fails
 */
export async function add(ctx: CoreContext, input: AddMemoryInput): Promise<AddResult> {
  const data = parseInput(AddMemoryInputSchema, input);
  const classification = await ctx.classifier.classify(data.content);
  const embedding = await tryEmbed(ctx, data.content);
  const category = classification.category;

  return ctx.locks.withPartition(data.userId, category, async () => {
    const incoming = { userId: data.userId, category, content: data.content, embedding };
    const partition = ctx.store.scan(data.userId, [category]);
    const candidates = ctx.resolver.findCandidates(incoming, partition);
    const decision = ctx.resolver.resolve(incoming, candidates);
    debug(() => `[Add] ${data.userId}/${category}: ${decision.action} (${decision.reason})`);

    const id = generateMemoryId();
    const metadata = buildMetadata(classification, data.metadata);

    if (decision.action === "merge_into") {
      const target = candidates.find((candidate) => candidate.item.id === decision.targetId)?.item;
      if (!target) {
        throw new CoreError(`Merge target vanished: ${decision.targetId}`, "CONFLICT");
      }
      const merged = await mergeInto(ctx, target, { id, content: data.content, metadata }, decision);
      return {
        id: merged.id,
        action: decision.action,
        category,
        confidence: classification.confidence,
        tier: merged.tier,
      };
    }

    const now = ctx.clock().toISOString();
    const item: MemoryItem = {
      id,
      userId: data.userId,
      content: data.content,
      embedding,
      category,
      tier: "working",
      status: "active",
      supersededBy: null,
      metadata: decision.action === "supersede" ? { ...metadata, supersedes: decision.targetId } : metadata,
      accessCount: 0,
      createdAt: now,
      lastAccessedAt: now,
      tierEnteredAt: now,
    };

    ctx.store.transaction(() => {
      ctx.store.insert(item);
      syncVectorForItem(ctx, item);
      ctx.store.appendHistory({
        itemId: id,
        userId: item.userId,
        event: "add",
        detail: { category, confidence: classification.confidence, source: classification.source },
        createdAt: now,
      });

      if (decision.action === "supersede") {
        ctx.store.markSuperseded(item.userId, decision.targetId, id);
        ctx.vectorCollection.delete(decision.targetId);
        ctx.store.appendHistory({
          itemId: decision.targetId,
          relatedId: id,
          userId: item.userId,
          event: "supersede",
          detail: { reason: decision.reason, confidence: decision.confidence },
          createdAt: now,
        });
      }
    });

    if (decision.action === "supersede") {
      info(() => `[Add] ${id} supersedes ${decision.targetId}: ${decision.reason}`);
    }

    ctx.tiers.evictOverflow(item.userId, category, item.tier);

    return {
      id,
      action: decision.action,
      category,
      confidence: classification.confidence,
      tier: item.tier,
      ...(decision.action === "supersede" ? { supersededId: decision.targetId } : {}),
    };
  });
}

async function mergeInto(
  ctx: CoreContext,
  target: MemoryItem,
  incoming: { id: string; content: string; metadata: MemoryMetadata },
  decision: Extract<ConflictDecision, { action: "merge_into" }>
): Promise<MemoryItem> {
  const merged = ctx.resolver.merge(target, incoming);
  const contentChanged = merged.content !== target.content;
  const embedding = contentChanged ? await tryEmbed(ctx, merged.content) : target.embedding;
  const now = ctx.clock().toISOString();

  const updated = ctx.store.transaction(() => {
    const result = ctx.store.update(target.userId, target.id, {
      content: merged.content,
      metadata: merged.metadata,
      embedding,
    });
    syncVectorForItem(ctx, result);
    ctx.store.appendHistory({
      itemId: target.id,
      relatedId: incoming.id,
      userId: target.userId,
      event: "merge",
      detail: { reason: decision.reason, confidence: decision.confidence, contentChanged },
      createdAt: now,
    });
    return result;
  });

  info(() => `[Add] Merged ${incoming.id} into ${target.id}: ${decision.reason}`);
  return updated;
}
