import type { TiersConfig } from "../config/schema.js";
import type { MemoryStore } from "../store/memory-store.js";
import type { PartitionLocks } from "../store/partition-lock.js";
import { nextTier, TIERS, type Category, type MemoryItem, type Tier } from "../types/memory.js";
import type { VectorCollection } from "../vectors/index.js";
import { debug, error, info } from "../utils/logger.js";

const SWEEP_BATCH = 500;

export interface TieredMemoryManagerOptions {
  store: MemoryStore;
  vectors: VectorCollection;
  locks: PartitionLocks;
  config: TiersConfig;
  clock?: () => Date;
}

export interface SweepReport {
  /** working -> short_term moves. */
  agedOut: number;
  /** Rarely used short_term items moved on to long_term. */
  archived: number;
  evicted: number;
  /** Access log rows older than the promotion window. */
  prunedAccesses: number;
}

/**
 * Moves items forward through working -> short_term -> long_term and keeps
 * each (user, category, tier) slice within its capacity.
 */
export class TieredMemoryManager {
  private readonly store: MemoryStore;
  private readonly vectors: VectorCollection;
  private readonly locks: PartitionLocks;
  private readonly config: TiersConfig;
  private readonly clock: () => Date;
  private running: Promise<SweepReport> | null = null;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(options: TieredMemoryManagerOptions) {
    this.store = options.store;
    this.vectors = options.vectors;
    this.locks = options.locks;
    this.config = options.config;
    this.clock = options.clock ?? (() => new Date());
  }

  capacityFor(tier: Tier): number | null {
    switch (tier) {
      case "working":
        return this.config.workingCapacity;
      case "short_term":
        return this.config.shortTermCapacity;
      case "long_term":
        return this.config.longTermCapacity;
    }
  }

  promotionThreshold(tier: Tier): number | null {
    switch (tier) {
      case "working":
        return this.config.promoteWorkingAfter;
      case "short_term":
        return this.config.promoteShortTermAfter;
      case "long_term":
        return null;
    }
  }

  /**
   * Records a retrieval hit and promotes the item one tier when its accesses
   * inside the current window exceed the tier's threshold.
   */
  async onAccess(item: MemoryItem): Promise<MemoryItem> {
    return this.locks.withPartition(item.userId, item.category, () => {
      const now = this.clock();
      const nowIso = now.toISOString();
      this.store.recordAccess(item.userId, item.id, nowIso);

      const current = this.store.get(item.userId, item.id);
      if (!current) {
        return item;
      }

      const target = nextTier(current.tier);
      const threshold = this.promotionThreshold(current.tier);
      if (!target || threshold === null) {
        return current;
      }

      const windowStart = new Date(now.getTime() - this.config.accessWindowMs).toISOString();
      const accesses = this.accessesInWindow(current, windowStart);
      if (accesses <= threshold) {
        return current;
      }

      const promoted = this.store.transaction(() => {
        const updated = this.store.update(current.userId, current.id, { tier: target, tierEnteredAt: nowIso });
        this.store.appendHistory({
          itemId: current.id,
          userId: current.userId,
          event: "promote",
          detail: { from: current.tier, to: target, accesses },
          createdAt: nowIso,
        });
        return updated;
      });
      info(() => `[Tiers] Promoted ${current.id} ${current.tier} -> ${target} after ${accesses} accesses`);

      this.evictOverflow(current.userId, current.category, target);
      return promoted;
    });
  }

  /**
   * Evicts least recently used items until the slice fits its capacity.
   * Callers must already hold the partition lock.
   */
  evictOverflow(userId: string, category: Category, tier: Tier): number {
    const capacity = this.capacityFor(tier);
    if (capacity === null) {
      return 0;
    }

    const overflow = this.store.partitionCount(userId, category, tier) - capacity;
    if (overflow <= 0) {
      return 0;
    }

    const victims = this.store.lruCandidates(userId, category, tier, overflow);
    for (const victim of victims) {
      this.evict(victim);
    }
    return victims.length;
  }

  /** Lock-taking capacity check for one slice; each eviction locks separately. */
  async enforceCapacity(userId: string, category: Category, tier: Tier): Promise<number> {
    const capacity = this.capacityFor(tier);
    if (capacity === null) {
      return 0;
    }

    const overflow = this.store.partitionCount(userId, category, tier) - capacity;
    if (overflow <= 0) {
      return 0;
    }

    let evicted = 0;
    for (const victim of this.store.lruCandidates(userId, category, tier, overflow)) {
      const removed = await this.locks.withPartition(userId, category, () => {
        if (this.store.partitionCount(userId, category, tier) <= capacity) {
          return false;
        }
        const current = this.store.get(userId, victim.id);
        if (!current || current.tier !== tier || current.status !== "active") {
          return false;
        }
        this.evict(current);
        return true;
      });
      if (removed) evicted++;
    }
    return evicted;
  }

  private evict(item: MemoryItem): void {
    const nowIso = this.clock().toISOString();
    this.store.transaction(() => {
      this.store.delete(item.userId, item.id);
      this.vectors.delete(item.id);
      this.store.appendHistory({
        itemId: item.id,
        userId: item.userId,
        event: "evict",
        detail: { tier: item.tier, category: item.category, lastAccessedAt: item.lastAccessedAt },
        createdAt: nowIso,
      });
    });
    debug(() => `[Tiers] Evicted ${item.id} from ${item.userId}/${item.category}/${item.tier}`);
  }

  /**
   * Age-out, archive, capacity sweep, then access log pruning. Concurrent
   * callers share the run in flight.
   */
  tick(): Promise<SweepReport> {
    if (this.running) {
      return this.running;
    }
    this.running = this.sweep().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private async sweep(): Promise<SweepReport> {
    const now = this.clock().getTime();
    const windowStart = new Date(now - this.config.accessWindowMs).toISOString();

    const agedOut = await this.ageOut("working", "short_term", this.config.workingTtlMs);
    const archived = await this.ageOut(
      "short_term",
      "long_term",
      this.config.shortTermTtlMs,
      (item) => this.accessesInWindow(item, windowStart) < this.config.minAccessesToKeep
    );

    let evicted = 0;
    for (const tier of TIERS) {
      const capacity = this.capacityFor(tier);
      if (capacity === null) continue;
      const overfull = this.store.counts().filter((slice) => slice.tier === tier && slice.count > capacity);
      for (const slice of overfull) {
        evicted += await this.enforceCapacity(slice.userId, slice.category, tier);
      }
    }

    // Promotion never looks further back than the window
    const prunedAccesses = this.store.pruneAccessesBefore(windowStart);

    if (agedOut > 0 || archived > 0 || evicted > 0) {
      info(
        () =>
          `[Tiers] Sweep moved ${agedOut} item(s) to short_term, ${archived} to long_term and evicted ${evicted}`
      );
    }
    debug(() => `[Tiers] Pruned ${prunedAccesses} access record(s) before ${windowStart}`);
    return { agedOut, archived, evicted, prunedAccesses };
  }

  /** Accesses since the later of the window start and the item's tier entry. */
  private accessesInWindow(item: MemoryItem, windowStart: string): number {
    const since = windowStart > item.tierEnteredAt ? windowStart : item.tierEnteredAt;
    return this.store.countAccessesAfter(item.id, since);
  }

  /**
   * Moves items that entered `from` more than `ttlMs` ago forward to `to`.
   * `eligible` can hold back items that are still in use.
   */
  private async ageOut(
    from: Tier,
    to: Tier,
    ttlMs: number,
    eligible: (item: MemoryItem) => boolean = () => true
  ): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - ttlMs).toISOString();
    let moved = 0;
    let skipped = 0;

    for (;;) {
      // Held-back items stay at the front of the listing
      const batch = this.store.listEnteredBefore(from, cutoff, skipped + SWEEP_BATCH).slice(skipped);
      const skippedBefore = skipped;
      let progressed = 0;
      for (const item of batch) {
        const done = await this.locks.withPartition(item.userId, item.category, () => {
          const current = this.store.get(item.userId, item.id);
          if (!current || current.status !== "active" || current.tier !== from || current.tierEnteredAt >= cutoff) {
            return false;
          }
          if (!eligible(current)) {
            skipped++;
            return false;
          }
          const nowIso = this.clock().toISOString();
          this.store.transaction(() => {
            this.store.update(current.userId, current.id, { tier: to, tierEnteredAt: nowIso });
            this.store.appendHistory({
              itemId: current.id,
              userId: current.userId,
              event: "age_out",
              detail: { from, to, enteredAt: current.tierEnteredAt },
              createdAt: nowIso,
            });
          });
          return true;
        });
        if (done) progressed++;
      }
      moved += progressed;
      if (batch.length < SWEEP_BATCH || (progressed === 0 && skipped === skippedBefore)) {
        break;
      }
    }

    return moved;
  }

  /** Runs `task` (default: `tick`) every `sweepIntervalMs` without holding the process open. */
  startSweeper(task: () => Promise<unknown> = () => this.tick()): void {
    if (this.sweeper) {
      return;
    }
    this.sweeper = setInterval(() => {
      task().catch((err: unknown) => {
        error(`Tier sweep failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, this.config.sweepIntervalMs);
    this.sweeper.unref();
    debug(() => `[Tiers] Sweeper started (every ${this.config.sweepIntervalMs}ms)`);
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }
}
