import type { AddAction } from "../core/types.js";

export interface FileDiscoveryOptions {
  rootPath: string;
  patterns: string[];
  exclude?: string[];
}

export interface DiscoveredFile {
  absolutePath: string;
  relativePath: string;
  size: number;
  mtime: Date;
}

export interface ParsedDocument {
  title: string;
  content: string;
  contentHash: string;
  frontmatter: Record<string, unknown>;
  tags: string[];
  source: string; // relative path
  wordCount: number;
}

export interface Chunk {
  seq: number;
  tokenCount: number;
  text: string;
}

export interface ChunkingOptions {
  maxTokens: number;
}

export interface IngestResult {
  scanned: number;
  chunks: number;
  actions: Record<AddAction, number>;
  errors: Array<{ file: string; error: string }>;
  duration: number;
}

export interface IngestProgress {
  phase: "scanning" | "parsing" | "storing";
  current: number;
  total: number;
  currentFile?: string;
  description?: string;
}

export type ProgressCallback = (progress: IngestProgress) => void;
