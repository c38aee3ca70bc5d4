// Types
export type {
  FileDiscoveryOptions,
  DiscoveredFile,
  ParsedDocument,
  Chunk,
  ChunkingOptions,
  IngestResult,
  IngestProgress,
  ProgressCallback,
} from "./types.js";

// Core functions
export { discoverFiles, DEFAULT_PATTERNS } from "./discovery.js";
export { parseDocument, hashContent } from "./parser.js";
export { chunkDocument, DEFAULT_CHUNK_SIZE_TOKENS } from "./chunker.js";
export { ingestFiles, type IngestOptions } from "./orchestrator.js";
export { ProgressReporter } from "./progress.js";
