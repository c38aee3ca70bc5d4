import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { AppConfig } from "../config/schema.js";
import type { RetrievalResult } from "../search/index.js";
import type { Category, HistoryEvent, MemoryItem, Tier } from "../types/memory.js";
import { openDatabase, closeDatabase } from "../db/index.js";
import { runMigrations } from "../db/migrate.js";
import { createEmbeddingProvider, withDeadline, type EmbeddingProvider } from "../embed/index.js";
import { createSqliteVectorCollection } from "../vectors/index.js";
import { OpenAICompatibleModelClassifier, type ModelClassifier } from "../llm/index.js";
import { InputClassifier, loadRules, type RuleTables } from "../classify/index.js";
import { createCoreContext, type CoreContext } from "./context.js";
import { add } from "./add.js";
import { retrieve } from "./retrieve.js";
import { browse } from "./browse.js";
import { statistics } from "./statistics.js";
import { get, history } from "./get.js";
import { deleteMemory } from "./delete.js";
import { reclassify } from "./reclassify.js";
import { backfillEmbeddings } from "./backfill.js";
import type {
  AddMemoryInput,
  AddResult,
  BackfillResult,
  MemoryStatistics,
  TickReport,
} from "./types.js";
import { debug, info, warn } from "../utils/logger.js";

export interface BrowseOptions {
  tier?: Tier;
  limit?: number;
}

/**
 * Application-facing entry point: one object owning the store, classifier,
 * resolver, tier manager and retriever for a database.
 */
export class DynamicMemoryManager {
  private closed = false;

  constructor(readonly ctx: CoreContext) {}

  add(input: AddMemoryInput): Promise<AddResult> {
    return add(this.ctx, input);
  }

  retrieve(query: string, userId: string, k?: number): Promise<RetrievalResult> {
    return retrieve(this.ctx, { query, userId, k });
  }

  getByCategory(userId: string, category: Category, options: BrowseOptions = {}): Promise<MemoryItem[]> {
    return browse(this.ctx, { userId, category, ...options });
  }

  statistics(userId: string): Promise<MemoryStatistics> {
    return statistics(this.ctx, userId);
  }

  get(userId: string, id: string): Promise<MemoryItem | null> {
    return get(this.ctx, userId, id);
  }

  delete(userId: string, id: string): Promise<boolean> {
    return deleteMemory(this.ctx, userId, id);
  }

  reclassify(userId: string, id: string, category?: Category): Promise<MemoryItem> {
    return reclassify(this.ctx, { userId, id, category });
  }

  history(userId: string, id: string): Promise<HistoryEvent[]> {
    return history(this.ctx, userId, id);
  }

  /**
   * Checks the embedding service once, bounded by `retrieval.embedTimeoutMs`.
   * False when it is down, too slow or returns vectors of the wrong size.
   */
  async checkEmbeddings(): Promise<boolean> {
    const provider = this.ctx.embedProvider;
    try {
      const healthy = await withDeadline(this.ctx.config.retrieval.embedTimeoutMs, "Embedding health check", () =>
        provider.healthCheck()
      );
      if (!healthy) {
        warn(`Embedding provider ${provider.model} failed its health check; retrieval will be lexical-only`);
      }
      return healthy;
    } catch (err) {
      warn(`Embedding provider ${provider.model} health check: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  backfillEmbeddings(): Promise<BackfillResult> {
    return backfillEmbeddings(this.ctx);
  }

  /** Tier sweep followed by embedding backfill. */
  async tick(): Promise<TickReport> {
    const sweep = await this.ctx.tiers.tick();
    const backfill = await this.backfillEmbeddings();
    return { ...sweep, backfilled: backfill.processed };
  }

  /** Runs `tick` every `tiers.sweepIntervalMs` until `close`. */
  startMaintenance(): void {
    this.ctx.tiers.startSweeper(() => this.tick());
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.ctx.tiers.stopSweeper();
    this.ctx.vectorCollection.close();
    await this.ctx.embedProvider.dispose();
    closeDatabase(this.ctx.db);
    debug(() => "[Manager] Closed");
  }
}

export interface CreateMemoryManagerOptions {
  /** Replaces the provider built from `ai.embedding`. */
  embedProvider?: EmbeddingProvider;
  /** `null` disables the model fallback even when configured. */
  modelClassifier?: ModelClassifier | null;
  rules?: RuleTables;
  clock?: () => Date;
}

/**
 * Opens (and migrates) the configured database and wires every component.
 */
export async function createMemoryManager(
  config: AppConfig,
  options: CreateMemoryManagerOptions = {}
): Promise<DynamicMemoryManager> {
  const dbPath = config.storage.dbPath;
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(resolve(dbPath)), { recursive: true });
  }

  const db = openDatabase(dbPath);
  try {
    runMigrations(db);

    const embedProvider = options.embedProvider ?? createEmbeddingProvider(config.ai.embedding);
    await embedProvider.initialize();

    const model =
      options.modelClassifier !== undefined
        ? options.modelClassifier
        : config.classifier.enableModelFallback
          ? new OpenAICompatibleModelClassifier(config.ai.llm)
          : null;

    const classifier = new InputClassifier({
      rules: options.rules ?? loadRules(),
      config: config.classifier,
      model,
    });

    const ctx = createCoreContext({
      db,
      embedProvider,
      vectorCollection: createSqliteVectorCollection(db, embedProvider.dimensions),
      classifier,
      config,
      clock: options.clock,
    });

    info(() => `[Manager] Ready (db=${dbPath}, embeddings=${embedProvider.model}, model fallback=${model ? model.model : "off"})`);
    return new DynamicMemoryManager(ctx);
  } catch (err) {
    closeDatabase(db);
    throw err;
  }
}
