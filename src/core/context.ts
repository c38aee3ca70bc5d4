import type { DbHandle } from "../db/index.js";
import type { EmbeddingProvider } from "../embed/index.js";
import type { VectorCollection } from "../vectors/index.js";
import type { AppConfig } from "../config/schema.js";
import type { InputClassifier } from "../classify/index.js";
import { MemoryStore, PartitionLocks } from "../store/index.js";
import { ConflictResolver } from "../conflict/index.js";
import { TieredMemoryManager } from "../tiers/index.js";
import { ContextRetriever } from "../search/index.js";

/**
 * CoreContext holds all dependencies needed by core operations.
 * This allows for clean dependency injection and easier testing.
 */
export interface CoreContext {
  /** Database handle for SQLite operations */
  db: DbHandle;

  store: MemoryStore;

  /** Serializes writes per (userId, category) partition */
  locks: PartitionLocks;

  classifier: InputClassifier;

  resolver: ConflictResolver;

  tiers: TieredMemoryManager;

  retriever: ContextRetriever;

  /** Embedding provider for generating vectors */
  embedProvider: EmbeddingProvider;

  /** Vector collection for storing/retrieving embeddings */
  vectorCollection: VectorCollection;

  /** Application configuration */
  config: AppConfig;

  clock: () => Date;
}

/**
 * Options for creating a CoreContext
 */
export interface CreateCoreContextOptions {
  db: DbHandle;
  embedProvider: EmbeddingProvider;
  vectorCollection: VectorCollection;
  classifier: InputClassifier;
  config: AppConfig;
  clock?: () => Date;
}

/**
 * Factory function to create a CoreContext. Builds the store, locks, resolver,
 * tier manager and retriever on top of the injected services.
 */
export function createCoreContext(options: CreateCoreContextOptions): CoreContext {
  const clock = options.clock ?? (() => new Date());
  const store = new MemoryStore(options.db);
  const locks = new PartitionLocks();
  const tiers = new TieredMemoryManager({
    store,
    vectors: options.vectorCollection,
    locks,
    config: options.config.tiers,
    clock,
  });
  const retriever = new ContextRetriever({
    db: options.db,
    store,
    classifier: options.classifier,
    embedProvider: options.embedProvider,
    vectors: options.vectorCollection,
    tiers,
    config: options.config.retrieval,
  });

  return {
    db: options.db,
    store,
    locks,
    classifier: options.classifier,
    resolver: new ConflictResolver(options.config.conflict),
    tiers,
    retriever,
    embedProvider: options.embedProvider,
    vectorCollection: options.vectorCollection,
    config: options.config,
    clock,
  };
}
