import type { Category } from "../types/memory.js";

/**
 * Keyed async mutex. Work submitted under the same key runs one at a time in
 * submission order; different keys never wait on each other.
 */
export class PartitionLocks {
  private tails = new Map<string, Promise<void>>();

  static key(userId: string, category: Category): string {
    return `${userId}\u0000${category}`;
  }

  run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return current;
  }

  withPartition<T>(userId: string, category: Category, fn: () => T | Promise<T>): Promise<T> {
    return this.run(PartitionLocks.key(userId, category), fn);
  }

  isHeld(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
