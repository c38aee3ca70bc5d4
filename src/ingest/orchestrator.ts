import pMap from "p-map";
import type { DynamicMemoryManager } from "../core/manager.js";
import { describeError } from "../core/types.js";
import { discoverFiles, DEFAULT_PATTERNS } from "./discovery.js";
import { parseDocument } from "./parser.js";
import { chunkDocument } from "./chunker.js";
import type { ProgressReporter } from "./progress.js";
import type { IngestResult, ParsedDocument } from "./types.js";
import { debug } from "../utils/logger.js";

const PARSE_CONCURRENCY = 10;

export interface IngestOptions {
  manager: DynamicMemoryManager;
  userId: string;
  rootPath: string;
  patterns?: string[];
  maxChunkTokens?: number;
  reporter?: ProgressReporter;
}

/**
 * Adds every chunk of every discovered note as a memory item. Chunks go
 * through the normal add path, so re-ingesting an unchanged file merges into
 * the items it produced last time.
 */
export async function ingestFiles(options: IngestOptions): Promise<IngestResult> {
  const { manager, userId, rootPath, reporter } = options;
  const startTime = Date.now();
  const result: IngestResult = {
    scanned: 0,
    chunks: 0,
    actions: { insert_new: 0, merge_into: 0, supersede: 0 },
    errors: [],
    duration: 0,
  };

  reporter?.update({ phase: "scanning", current: 0, total: 0, description: "Scanning for files..." });
  const files = await discoverFiles({ rootPath, patterns: options.patterns ?? DEFAULT_PATTERNS });
  result.scanned = files.length;

  const parsed: ParsedDocument[] = [];
  let parsedCount = 0;
  await pMap(
    files,
    async (file) => {
      try {
        parsed.push(parseDocument(file.absolutePath, file.relativePath));
      } catch (error) {
        result.errors.push({ file: file.relativePath, error: describeError(error) });
      }
      parsedCount++;
      reporter?.update({ phase: "parsing", current: parsedCount, total: files.length, currentFile: file.relativePath });
    },
    { concurrency: PARSE_CONCURRENCY }
  );
  parsed.sort((a, b) => a.source.localeCompare(b.source));

  // Sequential: chunks of one file usually land in the same partition
  let stored = 0;
  for (const doc of parsed) {
    const chunks = chunkDocument(doc.content, { maxTokens: options.maxChunkTokens });
    try {
      for (const chunk of chunks) {
        const added = await manager.add({
          content: chunk.text,
          userId,
          metadata: {
            source: doc.source,
            title: doc.title,
            chunk: chunk.seq,
            ...(doc.tags.length > 0 ? { tags: doc.tags } : {}),
          },
        });
        result.actions[added.action]++;
        result.chunks++;
      }
    } catch (error) {
      result.errors.push({ file: doc.source, error: describeError(error) });
    }
    stored++;
    reporter?.update({ phase: "storing", current: stored, total: parsed.length, currentFile: doc.source });
    debug(() => `[Ingest] ${doc.source}: ${chunks.length} chunk(s)`);
  }

  result.duration = Date.now() - startTime;
  return result;
}
