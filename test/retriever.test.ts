import assert from "node:assert/strict";
import test from "node:test";
import { CATEGORIES } from "../src/types/memory.js";
import { createTestManager, FailingEmbeddingProvider, HangingEmbeddingProvider } from "./helpers.js";

test("task query routes to the task partition and finds the reminder", async () => {
  const { manager, cleanup } = await createTestManager();
  try {
    const added = await manager.add({ content: "Remember to buy milk on Friday", userId: "u1" });
    assert.equal(added.category, "task");

    const result = await manager.retrieve("what do I need to do Friday", "u1");
    assert.equal(result.intent, "get_tasks");
    assert.deepEqual(result.categories, ["task"]);
    assert.equal(result.degraded, false);
    assert.equal(result.hits[0].item.id, added.id);
    assert.match(result.hits[0].snippet, /<mark>Friday<\/mark>/);
  } finally {
    await cleanup();
  }
});

test("superseded items are never returned", async () => {
  const { manager, cleanup } = await createTestManager();
  try {
    await manager.add({ content: "meeting at 3pm", userId: "u1" });
    const latest = await manager.add({ content: "meeting at 4pm", userId: "u1" });
    assert.equal(latest.action, "supersede");

    const result = await manager.retrieve("what time is the meeting", "u1");
    assert.equal(result.intent, "general_search");
    assert.equal(result.widened, false);
    assert.deepEqual(
      result.hits.map((hit) => hit.item.id),
      [latest.id]
    );
  } finally {
    await cleanup();
  }
});

test("short recall widens to every category and keeps routed hits first", async () => {
  const { manager, cleanup } = await createTestManager();
  try {
    const task = await manager.add({ content: "Remember to call Alice", userId: "u1" });
    const birthday = await manager.add({ content: "Alice's birthday is in June", userId: "u1" });
    assert.equal(task.category, "task");
    assert.equal(birthday.category, "general");

    const result = await manager.retrieve("what do i need to do about alice", "u1");
    assert.equal(result.intent, "get_tasks");
    assert.equal(result.widened, true);
    assert.deepEqual(
      result.hits.map((hit) => hit.item.id),
      [task.id, birthday.id]
    );
  } finally {
    await cleanup();
  }
});

test("a failing embedding service degrades to lexical results", async () => {
  const provider = new FailingEmbeddingProvider();
  const { manager, cleanup } = await createTestManager({ embedProvider: provider });
  try {
    const added = await manager.add({ content: "Remember to buy milk on Friday", userId: "u1" });
    assert.equal((await manager.get("u1", added.id))?.embedding, null);

    const result = await manager.retrieve("what do I need to do Friday", "u1");
    assert.equal(result.degraded, true);
    assert.deepEqual(
      result.hits.map((hit) => [hit.item.id, hit.source]),
      [[added.id, "lex"]]
    );
  } finally {
    await cleanup();
  }
});

test("a hanging embedding service is cut off by the timeout", async () => {
  const { manager, cleanup } = await createTestManager({
    embedProvider: new HangingEmbeddingProvider(),
    config: { retrieval: { embedTimeoutMs: 50 } },
  });
  try {
    const added = await manager.add({ content: "Remember to buy milk on Friday", userId: "u1" });

    const result = await manager.retrieve("what do I need to do Friday", "u1");
    assert.equal(result.degraded, true);
    assert.equal(result.hits[0].item.id, added.id);
  } finally {
    await cleanup();
  }
});

test("lexical mode never embeds and is not degraded", async () => {
  const provider = new FailingEmbeddingProvider();
  const { manager, cleanup } = await createTestManager({
    embedProvider: provider,
    config: { retrieval: { mode: "lexical" } },
  });
  try {
    await manager.add({ content: "oat milk", userId: "u1" });
    const callsAfterAdd = provider.calls;

    const result = await manager.retrieve("oat milk", "u1");
    assert.equal(result.degraded, false);
    assert.equal(result.hits.length, 1);
    assert.equal(result.hits[0].source, "lex");
    assert.equal(provider.calls, callsAfterAdd);
  } finally {
    await cleanup();
  }
});

test("lexical mode finds a single Han character", async () => {
  const { manager, cleanup } = await createTestManager({ config: { retrieval: { mode: "lexical" } } });
  try {
    const added = await manager.add({ content: "猫在桌子上睡觉", userId: "u1" });

    const result = await manager.retrieve("猫", "u1");
    assert.deepEqual(
      result.hits.map((hit) => hit.item.id),
      [added.id]
    );
  } finally {
    await cleanup();
  }
});

test("vector mode ranks by embedding similarity only", async () => {
  const { manager, cleanup } = await createTestManager({ config: { retrieval: { mode: "vector" } } });
  try {
    const added = await manager.add({ content: "oat milk", userId: "u1" });

    const result = await manager.retrieve("oat milk", "u1");
    assert.equal(result.degraded, false);
    assert.deepEqual(
      result.hits.map((hit) => [hit.item.id, hit.source]),
      [[added.id, "vec"]]
    );
  } finally {
    await cleanup();
  }
});

test("users never see each other's items", async () => {
  const { manager, cleanup } = await createTestManager();
  try {
    await manager.add({ content: "secret launch plan for the rocket", userId: "alice" });

    const other = await manager.retrieve("secret launch plan", "bob");
    assert.deepEqual(other.hits, []);

    const owner = await manager.retrieve("secret launch plan", "alice");
    assert.equal(owner.hits.length, 1);
  } finally {
    await cleanup();
  }
});

test("k caps the number of hits", async () => {
  const { manager, cleanup } = await createTestManager();
  try {
    await manager.add({ content: "garden tomatoes need water", userId: "u1" });
    await manager.add({ content: "garden fence needs paint", userId: "u1" });
    await manager.add({ content: "garden shed key is under the mat", userId: "u1" });

    const result = await manager.retrieve("garden", "u1", 2);
    assert.equal(result.hits.length, 2);
  } finally {
    await cleanup();
  }
});

test("blank queries return no hits", async () => {
  const { manager, cleanup } = await createTestManager();
  try {
    await manager.add({ content: "garden tomatoes need water", userId: "u1" });
    const result = await manager.retrieve("   ", "u1");
    assert.equal(result.intent, "general_search");
    assert.deepEqual(result.categories, [...CATEGORIES]);
    assert.deepEqual(result.hits, []);
    assert.equal(result.widened, false);
  } finally {
    await cleanup();
  }
});

test("repeated retrieval promotes the item out of working memory", async () => {
  const { manager, clock, cleanup } = await createTestManager();
  try {
    const added = await manager.add({ content: "Remember to buy milk on Friday", userId: "u1" });

    const tiers: string[] = [];
    for (let i = 0; i < 3; i++) {
      clock.advance(1000);
      const result = await manager.retrieve("what do I need to do Friday", "u1");
      tiers.push(result.hits[0].item.tier);
    }

    assert.deepEqual(tiers, ["working", "working", "short_term"]);
    const events = await manager.history("u1", added.id);
    assert.deepEqual(
      events.map((event) => event.event),
      ["add", "promote"]
    );
  } finally {
    await cleanup();
  }
});
