import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { openDatabase, closeDatabase, type DbHandle } from "../src/db/index.js";
import { runMigrations } from "../src/db/migrate.js";
import { createDefaultConfig, type AppConfig, type AppConfigInput } from "../src/config/schema.js";
import { createMemoryManager, type DynamicMemoryManager } from "../src/core/index.js";
import { HashingEmbeddingProvider } from "../src/embed/hashing-provider.js";
import type { EmbeddingProvider, EmbedOptions, EmbedRequest, EmbedResult } from "../src/embed/types.js";
import type { ModelClassifier } from "../src/llm/types.js";
import type { MemoryItem } from "../src/types/memory.js";
import { initLogger } from "../src/utils/logger.js";

// Keep warnings from expected failures out of the test output
initLogger({ verbose: false, quiet: true });

export function createTestDb(prefix = "memlane-test-"): { handle: DbHandle; dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  const handle = openDatabase(join(dir, "test.db"));
  runMigrations(handle);

  return {
    handle,
    dir,
    cleanup: () => {
      closeDatabase(handle);
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export const BASE_TIME = new Date("2026-03-02T09:00:00.000Z");

/** Manually advanced clock. */
export class FakeClock {
  private current: Date;

  constructor(start: Date = BASE_TIME) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  iso(): string {
    return this.current.toISOString();
  }
}

export function makeItem(overrides: Partial<MemoryItem> & Pick<MemoryItem, "id" | "content">): MemoryItem {
  const at = overrides.createdAt ?? BASE_TIME.toISOString();
  return {
    userId: "u1",
    embedding: null,
    category: "general",
    tier: "working",
    status: "active",
    supersededBy: null,
    metadata: {},
    accessCount: 0,
    createdAt: at,
    lastAccessedAt: at,
    tierEnteredAt: at,
    ...overrides,
  };
}

export function hashingProvider(dimensions = 256): HashingEmbeddingProvider {
  return new HashingEmbeddingProvider({
    provider: "hashing",
    model: "hashing-test",
    dimensions,
    batchSize: 8,
  });
}

/** Embedding service that is down. */
export class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  readonly model = "failing-test";
  calls = 0;

  constructor(dimensions = 256) {
    this.dimensions = dimensions;
  }

  async initialize(): Promise<void> {}

  async embed(_text: string, _options?: EmbedOptions): Promise<number[]> {
    this.calls++;
    throw new Error("connection refused");
  }

  async embedBatch(_requests: EmbedRequest[], _options?: EmbedOptions): Promise<EmbedResult[]> {
    this.calls++;
    throw new Error("connection refused");
  }

  async healthCheck(): Promise<boolean> {
    return false;
  }

  async dispose(): Promise<void> {}
}

/** Embedding service that never answers until aborted. */
export class HangingEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  readonly model = "hanging-test";

  constructor(dimensions = 256) {
    this.dimensions = dimensions;
  }

  async initialize(): Promise<void> {}

  embed(_text: string, options: EmbedOptions = {}): Promise<number[]> {
    return new Promise((_, reject) => {
      options.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  }

  async embedBatch(requests: EmbedRequest[], options: EmbedOptions = {}): Promise<EmbedResult[]> {
    const embeddings = await Promise.all(requests.map((req) => this.embed(req.text, options)));
    return embeddings.map((embedding, i) => ({ id: requests[i].id, embedding, dimensions: this.dimensions }));
  }

  async healthCheck(): Promise<boolean> {
    return false;
  }

  async dispose(): Promise<void> {}
}

/** Embedding service that stalls and ignores abort signals. */
export class UnresponsiveEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  readonly model = "unresponsive-test";

  constructor(dimensions = 256) {
    this.dimensions = dimensions;
  }

  async initialize(): Promise<void> {}

  embed(_text: string, _options?: EmbedOptions): Promise<number[]> {
    return new Promise(() => {});
  }

  embedBatch(_requests: EmbedRequest[], _options?: EmbedOptions): Promise<EmbedResult[]> {
    return new Promise(() => {});
  }

  healthCheck(): Promise<boolean> {
    return new Promise(() => {});
  }

  async dispose(): Promise<void> {}
}

/** Embedding model whose vectors are longer than the configured size. */
export class OversizedEmbeddingProvider implements EmbeddingProvider {
  readonly model = "oversized-test";
  private readonly inner: HashingEmbeddingProvider;

  constructor(
    readonly dimensions = 256,
    private readonly actualDimensions = 768
  ) {
    this.inner = hashingProvider(actualDimensions);
  }

  async initialize(): Promise<void> {
    await this.inner.initialize();
  }

  embed(text: string, options?: EmbedOptions): Promise<number[]> {
    return this.inner.embed(text, options);
  }

  embedBatch(requests: EmbedRequest[], options?: EmbedOptions): Promise<EmbedResult[]> {
    return this.inner.embedBatch(requests, options);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async dispose(): Promise<void> {
    await this.inner.dispose();
  }
}

/** Embedding service that can be switched off and on. */
export class ToggleEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  readonly model = "toggle-test";
  available = true;
  private readonly inner: HashingEmbeddingProvider;

  constructor(dimensions = 256) {
    this.dimensions = dimensions;
    this.inner = hashingProvider(dimensions);
  }

  async initialize(): Promise<void> {
    await this.inner.initialize();
  }

  async embed(text: string, options?: EmbedOptions): Promise<number[]> {
    if (!this.available) throw new Error("service unavailable");
    return this.inner.embed(text, options);
  }

  async embedBatch(requests: EmbedRequest[], options?: EmbedOptions): Promise<EmbedResult[]> {
    if (!this.available) throw new Error("service unavailable");
    return this.inner.embedBatch(requests, options);
  }

  async healthCheck(): Promise<boolean> {
    return this.available;
  }

  async dispose(): Promise<void> {
    await this.inner.dispose();
  }
}

/** Model classifier that answers with a fixed label and records its calls. */
export class StubModelClassifier implements ModelClassifier {
  readonly model = "stub-model";
  calls: Array<{ text: string; labels: readonly string[] }> = [];

  constructor(private readonly answer: { label: string; confidence: number } | null) {}

  async classify(text: string, labels: readonly string[]): Promise<{ label: string; confidence: number } | null> {
    this.calls.push({ text, labels });
    return this.answer;
  }
}

export interface TestManager {
  manager: DynamicMemoryManager;
  config: AppConfig;
  clock: FakeClock;
  cleanup: () => Promise<void>;
}

export async function createTestManager(
  options: {
    config?: AppConfigInput;
    embedProvider?: EmbeddingProvider;
    modelClassifier?: ModelClassifier | null;
  } = {}
): Promise<TestManager> {
  const dir = mkdtempSync(join(tmpdir(), "memlane-manager-"));
  const config = createDefaultConfig({
    ...options.config,
    storage: { dbPath: join(dir, "memory.db") },
  });
  const clock = new FakeClock();
  const manager = await createMemoryManager(config, {
    embedProvider: options.embedProvider ?? hashingProvider(config.ai.embedding.dimensions),
    modelClassifier: options.modelClassifier ?? null,
    clock: clock.now,
  });

  return {
    manager,
    config,
    clock,
    cleanup: async () => {
      await manager.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
