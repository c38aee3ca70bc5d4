// ============================================================================
// Core API - Service layer for MCP and CLI
// ============================================================================

// Export context
export { createCoreContext, type CoreContext, type CreateCoreContextOptions } from "./context.js";

// Export facade
export {
  DynamicMemoryManager,
  createMemoryManager,
  type BrowseOptions,
  type CreateMemoryManagerOptions,
} from "./manager.js";

// Export operations
export { add } from "./add.js";
export { retrieve } from "./retrieve.js";
export { browse } from "./browse.js";
export { statistics } from "./statistics.js";
export { get, history } from "./get.js";
export { deleteMemory, deleteMemory as delete } from "./delete.js";
export { reclassify } from "./reclassify.js";
export { backfillEmbeddings } from "./backfill.js";

// Export types and schemas
export {
  // Schemas
  AddMemoryInputSchema,
  RetrieveInputSchema,
  BrowseInputSchema,
  ReclassifyInputSchema,

  // Types
  type AddMemoryInput,
  type AddMemoryData,
  type RetrieveInput,
  type BrowseInput,
  type BrowseData,
  type ReclassifyInput,
  type AddAction,
  type AddResult,
  type PartitionStat,
  type MemoryStatistics,
  type TickReport,
  type BackfillResult,
  type CoreErrorCode,
  CoreError,
  describeError,
  parseInput,
} from "./types.js";

// Export utilities
export { generateMemoryId, isValidId } from "./utils.js";
