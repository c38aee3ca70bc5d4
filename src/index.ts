#!/usr/bin/env node

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { loadAppConfig } from "./config/loadConfig.js";
import type { AppConfig } from "./config/schema.js";
import { createMemoryManager, type DynamicMemoryManager } from "./core/index.js";
import { ingestFiles, ProgressReporter } from "./ingest/index.js";
import { startMcpServer } from "./mcp/index.js";
import { formatContext, type ContextStyle } from "./search/format.js";
import { CATEGORIES, TIERS, isCategory, isTier } from "./types/memory.js";
import { initLogger } from "./utils/logger.js";

const RETRIEVAL_MODES = ["hybrid", "lexical", "vector"] as const;
const CONTEXT_STYLES: readonly ContextStyle[] = ["structured", "concise", "detailed"];

function parseLogsFlag(args: string[]): boolean | undefined {
  const flag = args.find((a) => a.startsWith("--logs="));
  if (!flag) return undefined;
  return flag.split("=")[1] === "true";
}

function flagValue(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

function positionals(args: string[]): string[] {
  return args.filter((a) => !a.startsWith("--"));
}

function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function isRetrievalMode(value: string): value is AppConfig["retrieval"]["mode"] {
  return RETRIEVAL_MODES.some((mode) => mode === value);
}

function isContextStyle(value: string): value is ContextStyle {
  return CONTEXT_STYLES.some((style) => style === value);
}

async function withManager<T>(
  args: string[],
  fn: (manager: DynamicMemoryManager, userId: string, config: AppConfig) => Promise<T>,
  configure?: (config: AppConfig) => void
): Promise<T> {
  const config = loadAppConfig();
  configure?.(config);
  const userId = flagValue(args, "user") ?? config.defaultUser;
  const manager = await createMemoryManager(config);
  try {
    return await fn(manager, userId, config);
  } finally {
    await manager.close();
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] || "help";

  const logsFlag = parseLogsFlag(args);
  initLogger({
    verbose: logsFlag,
    // stdout belongs to the MCP transport
    stream: command === "serve" ? "stderr" : "stdout",
  });

  try {
    switch (command) {
      case "add":
        await handleAdd(args.slice(1));
        break;
      case "query":
        await handleQuery(args.slice(1));
        break;
      case "browse":
        await handleBrowse(args.slice(1));
        break;
      case "stats":
        await handleStats(args.slice(1));
        break;
      case "history":
        await handleHistory(args.slice(1));
        break;
      case "delete":
        await handleDelete(args.slice(1));
        break;
      case "reclassify":
        await handleReclassify(args.slice(1));
        break;
      case "tick":
        await handleTick(args.slice(1));
        break;
      case "ingest":
        await handleIngest(args.slice(1));
        break;
      case "serve":
        await handleServe();
        break;
      case "help":
      default:
        showHelp();
        break;
    }
  } catch (error) {
    console.error("\n❌ Error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

async function handleAdd(args: string[]): Promise<void> {
  const content = positionals(args).join(" ").trim();
  if (!content) {
    console.error("Usage: memlane add <content> [--user=<id>] [--source=<label>]");
    process.exit(1);
  }
  const source = flagValue(args, "source");

  await withManager(args, async (manager, userId) => {
    const result = await manager.add({ content, userId, metadata: source ? { source } : {} });
    console.log(`✓ ${result.action} ${result.id}`);
    console.log(`  Category: ${result.category} (confidence ${result.confidence.toFixed(2)}) | Tier: ${result.tier}`);
    if (result.supersededId) {
      console.log(`  Superseded: ${result.supersededId}`);
    }
  });
}

async function handleQuery(args: string[]): Promise<void> {
  const query = positionals(args).join(" ").trim();
  const rawMode = flagValue(args, "mode");
  const rawFormat = flagValue(args, "format");

  if (!query) {
    console.error(
      "Usage: memlane query <query> [--user=<id>] [--k=<n>] [--mode=hybrid|lexical|vector] [--format=structured|concise|detailed] [--max-tokens=<n>]"
    );
    process.exit(1);
  }
  if (rawMode && !isRetrievalMode(rawMode)) {
    console.error(`Invalid mode: "${rawMode}". Must be one of: ${RETRIEVAL_MODES.join(", ")}`);
    process.exit(1);
  }
  if (rawFormat && !isContextStyle(rawFormat)) {
    console.error(`Invalid format: "${rawFormat}". Must be one of: ${CONTEXT_STYLES.join(", ")}`);
    process.exit(1);
  }

  const k = parsePositiveInt(flagValue(args, "k"), "k");
  const maxTokens = parsePositiveInt(flagValue(args, "max-tokens"), "max-tokens");

  await withManager(
    args,
    async (manager, userId) => {
      const result = await manager.retrieve(query, userId, k);
      console.log(`🔍 Intent: ${result.intent} -> ${result.categories.join(", ")}`);
      if (result.widened) console.log("   (widened to all categories)");
      if (result.degraded) console.log("   (embedding unavailable, lexical results only)");
      console.log("");

      if (result.hits.length === 0) {
        console.log("No results found.\n");
        return;
      }

      if (rawFormat && isContextStyle(rawFormat)) {
        console.log(formatContext(result, { style: rawFormat, maxTokens }));
        return;
      }

      console.log(`Found ${result.hits.length} result(s):\n`);
      result.hits.forEach((hit, i) => {
        console.log(`${i + 1}. [${hit.item.category}] ${hit.item.id}`);
        console.log(`   Score: ${hit.score.toFixed(3)} | Source: ${hit.source} | Tier: ${hit.item.tier}`);
        console.log(`   ${hit.item.content.slice(0, 100)}${hit.item.content.length > 100 ? "..." : ""}`);
        console.log("");
      });
    },
    (config) => {
      if (rawMode && isRetrievalMode(rawMode)) {
        config.retrieval.mode = rawMode;
      }
    }
  );
}

async function handleBrowse(args: string[]): Promise<void> {
  const [category] = positionals(args);
  const tier = flagValue(args, "tier");

  if (!category || !isCategory(category)) {
    console.error(`Usage: memlane browse <category> [--user=<id>] [--tier=<tier>] [--limit=<n>]`);
    console.error(`Categories: ${CATEGORIES.join(", ")}`);
    process.exit(1);
  }
  if (tier !== undefined && !isTier(tier)) {
    console.error(`Invalid tier: "${tier}". Must be one of: ${TIERS.join(", ")}`);
    process.exit(1);
  }
  const limit = parsePositiveInt(flagValue(args, "limit"), "limit");

  await withManager(args, async (manager, userId) => {
    const items = await manager.getByCategory(userId, category, {
      tier: tier !== undefined && isTier(tier) ? tier : undefined,
      limit,
    });
    console.log(`📂 ${category}: ${items.length} item(s)\n`);
    for (const item of items) {
      console.log(`• ${item.id} [${item.tier}] accessed ${item.accessCount}x`);
      console.log(`  ${item.content.slice(0, 100)}${item.content.length > 100 ? "..." : ""}`);
    }
  });
}

async function handleStats(args: string[]): Promise<void> {
  await withManager(args, async (manager, userId, config) => {
    const stats = await manager.statistics(userId);
    console.log("📊 memlane - Statistics\n");
    console.log(`User: ${userId}`);
    console.log(`Database: ${config.storage.dbPath}`);
    console.log("");
    console.log(`Active items: ${stats.total}`);
    for (const tier of TIERS) {
      console.log(`  ${tier}: ${stats.byTier[tier]}`);
    }
    console.log(`Superseded: ${stats.superseded}`);
    console.log(`Pending embeddings: ${stats.pendingEmbeddings}`);
    const used = CATEGORIES.filter((category) => stats.byCategory[category] > 0);
    if (used.length > 0) {
      console.log("\nBy category:");
      for (const category of used) {
        console.log(`  ${category}: ${stats.byCategory[category]}`);
      }
    }
  });
}

async function handleHistory(args: string[]): Promise<void> {
  const [id] = positionals(args);
  if (!id) {
    console.error("Usage: memlane history <id> [--user=<id>]");
    process.exit(1);
  }

  await withManager(args, async (manager, userId) => {
    const events = await manager.history(userId, id);
    if (events.length === 0) {
      console.log(`No history for ${id}.`);
      return;
    }
    for (const event of events) {
      const related = event.relatedId ? ` (${event.relatedId})` : "";
      console.log(`${event.createdAt}  ${event.event.padEnd(10)} ${event.itemId}${related} ${JSON.stringify(event.detail)}`);
    }
  });
}

async function handleDelete(args: string[]): Promise<void> {
  const [id] = positionals(args);
  if (!id) {
    console.error("Usage: memlane delete <id> [--user=<id>]");
    process.exit(1);
  }

  await withManager(args, async (manager, userId) => {
    const deleted = await manager.delete(userId, id);
    console.log(deleted ? `✓ Deleted ${id}` : `Not found: ${id}`);
  });
}

async function handleReclassify(args: string[]): Promise<void> {
  const [id] = positionals(args);
  const category = flagValue(args, "category");
  if (!id) {
    console.error("Usage: memlane reclassify <id> [--category=<category>] [--user=<id>]");
    process.exit(1);
  }
  if (category !== undefined && !isCategory(category)) {
    console.error(`Invalid category: "${category}". Must be one of: ${CATEGORIES.join(", ")}`);
    process.exit(1);
  }

  await withManager(args, async (manager, userId) => {
    const item = await manager.reclassify(userId, id, category !== undefined && isCategory(category) ? category : undefined);
    console.log(`✓ ${item.id} is now ${item.category}`);
  });
}

async function handleTick(args: string[]): Promise<void> {
  await withManager(args, async (manager) => {
    const report = await manager.tick();
    console.log(
      `✓ Aged out: ${report.agedOut} | Archived: ${report.archived} | Evicted: ${report.evicted} | ` +
        `Access records pruned: ${report.prunedAccesses} | Embeddings backfilled: ${report.backfilled}`
    );
  });
}

async function handleIngest(args: string[]): Promise<void> {
  const [pathArg] = positionals(args);
  if (!pathArg) {
    console.error("Usage: memlane ingest <path> [--user=<id>] [--max-tokens=<n>]");
    process.exit(1);
  }

  const targetPath = resolve(pathArg);
  if (!existsSync(targetPath)) {
    console.error(`Error: Path does not exist: ${targetPath}`);
    process.exit(1);
  }
  const maxChunkTokens = parsePositiveInt(flagValue(args, "max-tokens"), "max-tokens");

  console.log("🚀 memlane - Ingesting notes\n");

  await withManager(args, async (manager, userId) => {
    const reporter = new ProgressReporter();
    reporter.start();
    const result = await ingestFiles({ manager, userId, rootPath: targetPath, maxChunkTokens, reporter });
    reporter.finish(result);
  });
}

async function handleServe(): Promise<void> {
  const handle = await startMcpServer();
  const shutdown = (): void => {
    handle
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("Shutdown failed:", error instanceof Error ? error.message : String(error));
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

function showHelp(): void {
  console.log(`
memlane - Dynamic memory classification and retrieval

Usage:
  memlane <command> [options]

Commands:
  add <content> [--user=<id>] [--source=<label>]     Store a memory
  query <query> [--user=<id>] [--k=<n>] [--mode=hybrid|lexical|vector]
        [--format=structured|concise|detailed] [--max-tokens=<n>]
                                                     Retrieve memories
  browse <category> [--user=<id>] [--tier=<tier>] [--limit=<n>]
                                                     List one category
  stats [--user=<id>]                                Show counts per category and tier
  history <id> [--user=<id>]                         Show an item's audit trail
  delete <id> [--user=<id>]                          Delete an item
  reclassify <id> [--category=<category>]            Move an item to another category
  tick                                               Run tier maintenance and embedding backfill
  ingest <path> [--user=<id>] [--max-tokens=<n>]     Add markdown/text notes from a directory
  serve                                              Start the MCP server over stdio
  help                                               Show this help message

Every command accepts --logs=true|false.

Examples:
  memlane add "Remember to call the dentist on Friday"
  memlane query "what do I need to do Friday"
  memlane query "meeting time" --format=concise --max-tokens=200
  memlane browse task --tier=working
  memlane ingest ./notes --user=alice
`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
