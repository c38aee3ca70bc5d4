import { z, ZodError } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadAppConfig } from "../config/loadConfig.js";
import { createMemoryManager, CoreError, type DynamicMemoryManager } from "../core/index.js";
import { formatContext } from "../search/format.js";
import { CATEGORIES, QUERY_INTENTS, TIERS } from "../types/memory.js";
import { describeError } from "../core/types.js";

const CategorySchema = z.enum(CATEGORIES);
const TierSchema = z.enum(TIERS);
const UserIdSchema = z.string().trim().min(1).optional();
const ToolLimitSchema = z.number().int().positive().max(100);

const MemoryItemSchema = z.object({
  id: z.string(),
  userId: z.string(),
  content: z.string(),
  category: CategorySchema,
  tier: TierSchema,
  status: z.enum(["active", "superseded"]),
  supersededBy: z.string().nullable(),
  metadata: z.record(z.string(), z.unknown()),
  accessCount: z.number().int().nonnegative(),
  createdAt: z.string(),
  lastAccessedAt: z.string(),
  tierEnteredAt: z.string(),
});

const RetrievedHitSchema = z.object({
  id: z.string(),
  category: CategorySchema,
  tier: TierSchema,
  content: z.string(),
  score: z.number(),
  source: z.enum(["lex", "vec", "hybrid"]),
  snippet: z.string(),
});

const HistoryEventSchema = z.object({
  itemId: z.string(),
  relatedId: z.string().nullable(),
  event: z.string(),
  detail: z.record(z.string(), z.unknown()),
  createdAt: z.string(),
});

const MemoryAddInputSchema = z.object({
  content: z.string().min(1, "content is required"),
  userId: UserIdSchema,
  metadata: z.record(z.string(), z.unknown()).optional(),
});

const MemoryAddOutputSchema = z.object({
  id: z.string(),
  action: z.enum(["insert_new", "merge_into", "supersede"]),
  category: CategorySchema,
  confidence: z.number(),
  tier: TierSchema,
  supersededId: z.string().optional(),
});

const MemoryRetrieveInputSchema = z.object({
  query: z.string().min(1, "query is required"),
  userId: UserIdSchema,
  k: ToolLimitSchema.optional(),
  format: z.enum(["structured", "concise", "detailed"]).optional(),
  maxTokens: z.number().int().positive().optional(),
});

const MemoryRetrieveOutputSchema = z.object({
  intent: z.enum(QUERY_INTENTS),
  categories: z.array(CategorySchema),
  widened: z.boolean(),
  degraded: z.boolean(),
  count: z.number().int().nonnegative(),
  hits: z.array(RetrievedHitSchema),
  context: z.string().optional(),
});

const MemoryBrowseInputSchema = z.object({
  category: CategorySchema,
  userId: UserIdSchema,
  tier: TierSchema.optional(),
  limit: ToolLimitSchema.optional(),
});

const MemoryBrowseOutputSchema = z.object({
  items: z.array(MemoryItemSchema),
  count: z.number().int().nonnegative(),
});

const MemoryStatisticsInputSchema = z.object({
  userId: UserIdSchema,
});

const MemoryStatisticsOutputSchema = z.object({
  userId: z.string(),
  total: z.number().int().nonnegative(),
  byCategory: z.record(z.string(), z.number()),
  byTier: z.record(z.string(), z.number()),
  superseded: z.number().int().nonnegative(),
  pendingEmbeddings: z.number().int().nonnegative(),
});

const MemoryIdInputSchema = z.object({
  id: z.string().min(1),
  userId: UserIdSchema,
});

const MemoryGetOutputSchema = z.object({
  item: MemoryItemSchema.nullable(),
});

const MemoryDeleteOutputSchema = z.object({
  deleted: z.boolean(),
});

const MemoryHistoryOutputSchema = z.object({
  events: z.array(HistoryEventSchema),
});

const MemoryReclassifyInputSchema = z.object({
  id: z.string().min(1),
  userId: UserIdSchema,
  category: CategorySchema.optional(),
});

const MemoryReclassifyOutputSchema = z.object({
  item: MemoryItemSchema,
});

const MemoryTickOutputSchema = z.object({
  agedOut: z.number().int().nonnegative(),
  archived: z.number().int().nonnegative(),
  evicted: z.number().int().nonnegative(),
  prunedAccesses: z.number().int().nonnegative(),
  backfilled: z.number().int().nonnegative(),
});

export interface McpServerHandle {
  close: () => Promise<void>;
}

export interface CreateMcpServerOptions {
  /** User for tool calls that omit `userId`. */
  defaultUser: string;
  /** Registers the admin `memory_tick` tool. */
  enableTick?: boolean;
  verbose?: boolean;
}

interface StartMcpServerOptions {
  configPath?: string;
  verbose?: boolean;
}

interface ToolErrorPayload {
  code: string;
  message: string;
}

export function formatToolError(error: unknown): ToolErrorPayload {
  if (error instanceof CoreError) {
    return { code: error.code, message: error.message };
  }

  if (error instanceof ZodError) {
    return {
      code: "VALIDATION",
      message: error.errors.map((e) => `${e.path.join(".") || "input"}: ${e.message}`).join(", "),
    };
  }

  return { code: "INTERNAL", message: describeError(error) };
}

function createMcpLogger(verbose: boolean) {
  const log = (message: string): void => {
    if (!verbose) {
      return;
    }
    const timestamp = new Date().toISOString();
    process.stderr.write(`[memlane:mcp ${timestamp}] ${message}\n`);
  };

  return {
    info: log,
  };
}

function summarizeForLog(label: string, value: string): string {
  return `${label}Len=${value.length}`;
}

type ToolResult =
  | {
      content: Array<{ type: "text"; text: string }>;
      structuredContent: Record<string, unknown>;
    }
  | {
      isError: true;
      content: Array<{ type: "text"; text: string }>;
    };

async function executeTool<T extends Record<string, unknown>, I>(
  schema: z.ZodType<T, z.ZodTypeDef, I>,
  operation: () => Promise<I>
): Promise<ToolResult> {
  try {
    const parsed = schema.parse(await operation());
    return {
      content: [{ type: "text", text: JSON.stringify(parsed) }],
      structuredContent: parsed,
    };
  } catch (error) {
    return {
      isError: true,
      content: [{ type: "text", text: JSON.stringify(formatToolError(error)) }],
    };
  }
}

/**
 * Registers the memory tools on a new MCP server. Transport and lifecycle
 * belong to the caller.
 */
export function createMcpServer(manager: DynamicMemoryManager, options: CreateMcpServerOptions): McpServer {
  const logger = createMcpLogger(options.verbose ?? false);
  const userOf = (userId: string | undefined): string => userId ?? options.defaultUser;

  const server = new McpServer({
    name: "memlane",
    version: "0.1.0",
  });

  server.registerTool(
    "memory_add",
    {
      title: "Memory Add",
      description: "Store a memory. It is classified, checked against similar memories, and merged or superseded when appropriate.",
      inputSchema: MemoryAddInputSchema.shape,
      outputSchema: MemoryAddOutputSchema.shape,
    },
    async (input) =>
      executeTool(MemoryAddOutputSchema, async () => {
        logger.info(`memory_add called (${summarizeForLog("content", input.content)})`);
        return manager.add({ content: input.content, userId: userOf(input.userId), metadata: input.metadata });
      })
  );

  server.registerTool(
    "memory_retrieve",
    {
      title: "Memory Retrieve",
      description: "Retrieve memories relevant to a query, routed by the query's intent.",
      inputSchema: MemoryRetrieveInputSchema.shape,
      outputSchema: MemoryRetrieveOutputSchema.shape,
    },
    async (input) =>
      executeTool(MemoryRetrieveOutputSchema, async () => {
        logger.info(`memory_retrieve called (${summarizeForLog("query", input.query)})`);
        const result = await manager.retrieve(input.query, userOf(input.userId), input.k);
        return {
          intent: result.intent,
          categories: result.categories,
          widened: result.widened,
          degraded: result.degraded,
          count: result.hits.length,
          hits: result.hits.map((hit) => ({
            id: hit.item.id,
            category: hit.item.category,
            tier: hit.item.tier,
            content: hit.item.content,
            score: hit.score,
            source: hit.source,
            snippet: hit.snippet,
          })),
          ...(input.format
            ? { context: formatContext(result, { style: input.format, maxTokens: input.maxTokens }) }
            : {}),
        };
      })
  );

  server.registerTool(
    "memory_browse",
    {
      title: "Memory Browse",
      description: "List active memories of one category, most recently used first.",
      inputSchema: MemoryBrowseInputSchema.shape,
      outputSchema: MemoryBrowseOutputSchema.shape,
    },
    async (input) =>
      executeTool(MemoryBrowseOutputSchema, async () => {
        logger.info(`memory_browse called (category=${input.category})`);
        const items = await manager.getByCategory(userOf(input.userId), input.category, {
          tier: input.tier,
          limit: input.limit,
        });
        return { items, count: items.length };
      })
  );

  server.registerTool(
    "memory_statistics",
    {
      title: "Memory Statistics",
      description: "Counts of memories per category and tier.",
      inputSchema: MemoryStatisticsInputSchema.shape,
      outputSchema: MemoryStatisticsOutputSchema.shape,
    },
    async (input) =>
      executeTool(MemoryStatisticsOutputSchema, async () => {
        logger.info("memory_statistics called");
        return manager.statistics(userOf(input.userId));
      })
  );

  server.registerTool(
    "memory_get",
    {
      title: "Memory Get",
      description: "Get a memory item by id.",
      inputSchema: MemoryIdInputSchema.shape,
      outputSchema: MemoryGetOutputSchema.shape,
    },
    async (input) =>
      executeTool(MemoryGetOutputSchema, async () => {
        logger.info(`memory_get called (id=${input.id})`);
        return { item: await manager.get(userOf(input.userId), input.id) };
      })
  );

  server.registerTool(
    "memory_delete",
    {
      title: "Memory Delete",
      description: "Delete a memory item by id.",
      inputSchema: MemoryIdInputSchema.shape,
      outputSchema: MemoryDeleteOutputSchema.shape,
    },
    async (input) =>
      executeTool(MemoryDeleteOutputSchema, async () => {
        logger.info(`memory_delete called (id=${input.id})`);
        return { deleted: await manager.delete(userOf(input.userId), input.id) };
      })
  );

  server.registerTool(
    "memory_history",
    {
      title: "Memory History",
      description: "Audit trail of a memory: adds, merges, supersessions, tier moves.",
      inputSchema: MemoryIdInputSchema.shape,
      outputSchema: MemoryHistoryOutputSchema.shape,
    },
    async (input) =>
      executeTool(MemoryHistoryOutputSchema, async () => {
        logger.info(`memory_history called (id=${input.id})`);
        return { events: await manager.history(userOf(input.userId), input.id) };
      })
  );

  server.registerTool(
    "memory_reclassify",
    {
      title: "Memory Reclassify",
      description: "Move a memory to another category, or classify it again when no category is given.",
      inputSchema: MemoryReclassifyInputSchema.shape,
      outputSchema: MemoryReclassifyOutputSchema.shape,
    },
    async (input) =>
      executeTool(MemoryReclassifyOutputSchema, async () => {
        logger.info(`memory_reclassify called (id=${input.id})`);
        return { item: await manager.reclassify(userOf(input.userId), input.id, input.category) };
      })
  );

  if (options.enableTick) {
    server.registerTool(
      "memory_tick",
      {
        title: "Memory Tick",
        description: "Run tier maintenance and embedding backfill now (admin).",
        inputSchema: {},
        outputSchema: MemoryTickOutputSchema.shape,
      },
      async () =>
        executeTool(MemoryTickOutputSchema, async () => {
          logger.info("memory_tick called");
          return manager.tick();
        })
    );
    logger.info("Registered optional tool: memory_tick");
  }

  return server;
}

export async function startMcpServer(options: StartMcpServerOptions = {}): Promise<McpServerHandle> {
  const verbose = options.verbose ?? process.env.MEMLANE_MCP_VERBOSE === "true";
  const logger = createMcpLogger(verbose);

  let manager: DynamicMemoryManager | null = null;
  let server: McpServer | null = null;

  const dispose = async (): Promise<void> => {
    const errors: unknown[] = [];
    try {
      await server?.close();
    } catch (error) {
      errors.push(error);
    }
    try {
      await manager?.close();
    } catch (error) {
      errors.push(error);
    }
    for (const error of errors) {
      process.stderr.write(`[memlane:mcp] shutdown error: ${describeError(error)}\n`);
    }
  };

  try {
    logger.info("Loading configuration");
    const config = loadAppConfig(options.configPath, { silent: true });

    manager = await createMemoryManager(config);
    manager.startMaintenance();
    const embeddingsReady = await manager.checkEmbeddings();
    logger.info(`Memory manager ready (embeddings ${embeddingsReady ? "ok" : "degraded"})`);

    server = createMcpServer(manager, {
      defaultUser: config.defaultUser,
      enableTick: process.env.MEMLANE_ENABLE_TICK_TOOL === "true",
      verbose,
    });

    await server.connect(new StdioServerTransport());
    logger.info("MCP server connected over stdio");

    let closed = false;
    return {
      close: async () => {
        if (closed) {
          return;
        }
        closed = true;
        logger.info("Shutting down MCP server");
        await dispose();
      },
    };
  } catch (error) {
    await dispose();
    throw new Error(`Failed to start MCP server: ${describeError(error)}`);
  }
}
