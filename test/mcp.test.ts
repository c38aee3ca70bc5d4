import assert from "node:assert/strict";
import test from "node:test";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createMcpServer, formatToolError } from "../src/mcp/index.js";
import { CoreError } from "../src/core/types.js";
import { createTestManager, type TestManager } from "./helpers.js";

const TextResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
  structuredContent: z.record(z.string(), z.unknown()).optional(),
});

async function connect(testManager: TestManager): Promise<{ client: Client; close: () => Promise<void> }> {
  const server = createMcpServer(testManager.manager, { defaultUser: "default", enableTick: true });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client({ name: "memlane-test", version: "0.0.0" });
  await client.connect(clientTransport);

  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

async function call(client: Client, name: string, args: Record<string, unknown>) {
  return TextResultSchema.parse(await client.callTool({ name, arguments: args }));
}

test("all memory tools are registered", async () => {
  const testManager = await createTestManager();
  const { client, close } = await connect(testManager);
  try {
    const { tools } = await client.listTools();
    assert.deepEqual(
      tools.map((tool) => tool.name).sort(),
      [
        "memory_add",
        "memory_browse",
        "memory_delete",
        "memory_get",
        "memory_history",
        "memory_reclassify",
        "memory_retrieve",
        "memory_statistics",
        "memory_tick",
      ]
    );
  } finally {
    await close();
    await testManager.cleanup();
  }
});

test("add then retrieve through the tools, defaulting the user", async () => {
  const testManager = await createTestManager();
  const { client, close } = await connect(testManager);
  try {
    const added = await call(client, "memory_add", { content: "Remember to buy milk on Friday" });
    const addOutput = z
      .object({ id: z.string(), action: z.string(), category: z.string() })
      .parse(added.structuredContent);
    assert.equal(addOutput.action, "insert_new");
    assert.equal(addOutput.category, "task");
    assert.ok(await testManager.manager.get("default", addOutput.id));

    const retrieved = await call(client, "memory_retrieve", {
      query: "what do I need to do Friday",
      format: "concise",
    });
    const retrieveOutput = z
      .object({
        intent: z.string(),
        count: z.number(),
        hits: z.array(z.object({ id: z.string(), category: z.string() })),
        context: z.string(),
      })
      .parse(retrieved.structuredContent);
    assert.equal(retrieveOutput.intent, "get_tasks");
    assert.equal(retrieveOutput.count, 1);
    assert.equal(retrieveOutput.hits[0].id, addOutput.id);
    assert.equal(retrieveOutput.context, "Relevant context:\n- Remember to buy milk on Friday");
  } finally {
    await close();
    await testManager.cleanup();
  }
});

test("browse output leaves out embeddings", async () => {
  const testManager = await createTestManager();
  const { client, close } = await connect(testManager);
  try {
    await call(client, "memory_add", { content: "Remember to buy milk on Friday", userId: "u1" });

    const browsed = await call(client, "memory_browse", { category: "task", userId: "u1" });
    const output = z
      .object({ count: z.number(), items: z.array(z.record(z.string(), z.unknown())) })
      .parse(browsed.structuredContent);
    assert.equal(output.count, 1);
    assert.equal(output.items[0].content, "Remember to buy milk on Friday");
    assert.equal("embedding" in output.items[0], false);

    const stats = await call(client, "memory_statistics", { userId: "u1" });
    assert.equal(z.object({ total: z.number() }).parse(stats.structuredContent).total, 1);
  } finally {
    await close();
    await testManager.cleanup();
  }
});

test("core errors come back as tool errors with their code", async () => {
  const testManager = await createTestManager();
  const { client, close } = await connect(testManager);
  try {
    const invalid = await call(client, "memory_get", { id: "   " });
    assert.equal(invalid.isError, true);
    assert.deepEqual(JSON.parse(invalid.content[0].text), {
      code: "VALIDATION",
      message: "Invalid memory item ID",
    });

    const missing = await call(client, "memory_reclassify", { id: "mem_missing", category: "task" });
    assert.equal(missing.isError, true);
    assert.deepEqual(JSON.parse(missing.content[0].text), {
      code: "NOT_FOUND",
      message: "Memory item not found: mem_missing",
    });
  } finally {
    await close();
    await testManager.cleanup();
  }
});

test("delete, history and tick tools", async () => {
  const testManager = await createTestManager();
  const { client, close } = await connect(testManager);
  try {
    const added = await call(client, "memory_add", { content: "oat milk" });
    const { id } = z.object({ id: z.string() }).parse(added.structuredContent);

    const deleted = await call(client, "memory_delete", { id });
    assert.deepEqual(deleted.structuredContent, { deleted: true });

    const history = await call(client, "memory_history", { id });
    const events = z.object({ events: z.array(z.object({ event: z.string() })) }).parse(history.structuredContent).events;
    assert.deepEqual(
      events.map((event) => event.event),
      ["add", "delete"]
    );

    const tick = await call(client, "memory_tick", {});
    assert.deepEqual(tick.structuredContent, { agedOut: 0, archived: 0, evicted: 0, prunedAccesses: 0, backfilled: 0 });
  } finally {
    await close();
    await testManager.cleanup();
  }
});

test("formatToolError maps error kinds to codes", () => {
  assert.deepEqual(formatToolError(new CoreError("gone", "NOT_FOUND")), { code: "NOT_FOUND", message: "gone" });
  assert.deepEqual(formatToolError(new Error("boom")), { code: "INTERNAL", message: "boom" });

  const parsed = z.object({ k: z.number() }).safeParse({ k: "x" });
  assert.equal(parsed.success, false);
  if (!parsed.success) {
    assert.deepEqual(formatToolError(parsed.error), {
      code: "VALIDATION",
      message: "k: Expected number, received string",
    });
  }
});
