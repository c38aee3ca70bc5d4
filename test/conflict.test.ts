import assert from "node:assert/strict";
import test from "node:test";
import { createDefaultConfig } from "../src/config/schema.js";
import { ConflictResolver, type IncomingItem } from "../src/conflict/resolver.js";
import { findContradiction, jaccard, profileText } from "../src/conflict/signals.js";
import type { MemoryItem } from "../src/types/memory.js";
import { makeItem } from "./helpers.js";

const resolver = new ConflictResolver(createDefaultConfig().conflict);

function incoming(content: string, overrides: Partial<IncomingItem> = {}): IncomingItem {
  return { userId: "u1", category: "general", content, embedding: null, ...overrides };
}

function decide(existing: MemoryItem[], content: string) {
  const item = incoming(content);
  return resolver.resolve(item, resolver.findCandidates(item, existing));
}

test("clock times in different notations normalize to the same value", () => {
  assert.deepEqual([...profileText("meeting moved to 3pm").values.time], ["15:00"]);
  assert.deepEqual([...profileText("meeting moved to 3:00 PM").values.time], ["15:00"]);
  assert.deepEqual([...profileText("下午3点开会").values.time], ["15:00"]);
  assert.deepEqual([...profileText("standup at 9:30").values.time], ["09:30"]);
});

test("profile separates subject from values", () => {
  const profile = profileText("Dentist appointment on Monday at 10am");
  assert.deepEqual([...profile.subject].sort(), ["appointment", "dentist"]);
  assert.deepEqual([...profile.values.date], ["monday"]);
  assert.deepEqual([...profile.values.time], ["10:00"]);
  assert.equal(profile.negated, false);
});

test("jaccard of two empty sets is zero", () => {
  assert.equal(jaccard(new Set(), new Set()), 0);
  assert.equal(jaccard(new Set(["a", "b"]), new Set(["b", "c"])), 1 / 3);
});

test("contradictions by kind", () => {
  assert.equal(findContradiction(profileText("meeting at 3pm"), profileText("meeting at 4pm"))?.kind, "time");
  assert.equal(findContradiction(profileText("dentist on monday"), profileText("dentist on tuesday"))?.kind, "date");
  assert.equal(findContradiction(profileText("the rent is 1200"), profileText("the rent is 1350"))?.kind, "number");
  assert.equal(findContradiction(profileText("I like coffee"), profileText("I do not like coffee"))?.kind, "negation");
  assert.equal(findContradiction(profileText("meeting at 3pm"), profileText("meeting at 15:00")), null);
});

test("exact restatement merges into the existing item", () => {
  const existing = [makeItem({ id: "m1", content: "meeting moved to 3pm" })];
  const decision = decide(existing, "meeting moved to 3:00 PM");
  assert.equal(decision.action, "merge_into");
  assert.equal(decision.action === "merge_into" ? decision.targetId : null, "m1");
  assert.equal(decision.confidence, 1);
});

test("a changed time supersedes the older item", () => {
  const existing = [makeItem({ id: "m1", content: "meeting at 3pm" })];
  const decision = decide(existing, "meeting at 4pm");
  assert.equal(decision.action, "supersede");
  if (decision.action !== "supersede") return;
  assert.equal(decision.targetId, "m1");
  assert.equal(decision.reason, "time changed (15:00 -> 16:00)");
  assert.deepEqual(decision.contradiction, { kind: "time", before: ["15:00"], after: ["16:00"] });
});

test("a negated restatement supersedes the older item", () => {
  const existing = [makeItem({ id: "m1", content: "I like coffee", category: "personal" })];
  const item = incoming("I do not like coffee", { category: "personal" });
  const decision = resolver.resolve(item, resolver.findCandidates(item, existing));
  assert.equal(decision.action, "supersede");
  assert.equal(decision.reason, "negation changed (affirmed -> negated)");
});

test("unrelated content is inserted as new", () => {
  const existing = [makeItem({ id: "m1", content: "buy milk" })];
  const decision = decide(existing, "walk the dog");
  assert.deepEqual(decision, { action: "insert_new", confidence: 1, reason: "no similar items in partition" });
});

test("candidates are limited to the incoming item's active partition", () => {
  const existing = [
    makeItem({ id: "same", content: "meeting at 3pm" }),
    makeItem({ id: "other-category", content: "meeting at 3pm", category: "task" }),
    makeItem({ id: "other-user", content: "meeting at 3pm", userId: "u2" }),
    makeItem({ id: "retired", content: "meeting at 3pm", status: "superseded", supersededBy: "same" }),
  ];
  const candidates = resolver.findCandidates(incoming("meeting at 4pm"), existing);
  assert.deepEqual(
    candidates.map((c) => c.item.id),
    ["same"]
  );
});

test("embedding similarity alone makes a candidate", () => {
  const existing = [makeItem({ id: "m1", content: "quarterly revenue figures", embedding: [1, 0, 0] })];
  const item = incoming("sales numbers for the quarter", { embedding: [1, 0, 0] });

  const candidates = resolver.findCandidates(item, existing);
  assert.equal(candidates.length, 1);
  assert.equal(candidates[0].similarity, 1);

  // similar vectors but no textual duplicate or contradiction
  const decision = resolver.resolve(item, candidates);
  assert.equal(decision.action, "insert_new");
  assert.equal(decision.reason, "no duplicate or contradiction");
});

test("partial overlap keeps both items", () => {
  const item = incoming("alpha beta gamma epsilon");
  const candidate = { item: makeItem({ id: "m1", content: "alpha beta gamma delta" }), similarity: 0.9 };
  const decision = resolver.resolve(item, [candidate]);
  assert.equal(decision.action, "insert_new");
  assert.match(decision.reason, /^ambiguous overlap 0\.60/);
});

test("merge joins both texts and keeps existing metadata", () => {
  const existing = makeItem({
    id: "m1",
    content: "meeting moved to 3pm",
    metadata: { priority: "high", mergedFrom: ["m0"] },
  });
  const merged = resolver.merge(existing, {
    id: "m2",
    content: "meeting moved to 3:00 PM",
    metadata: { priority: "low", source: "notes.md", mergedFrom: ["ignored"] },
  });

  assert.equal(merged.content, "meeting moved to 3pm\nmeeting moved to 3:00 PM");
  assert.deepEqual(merged.metadata, { priority: "high", source: "notes.md", mergedFrom: ["m0", "m2"] });
});

test("merge does not repeat text already contained", () => {
  const existing = makeItem({ id: "m1", content: "buy milk and eggs" });
  assert.equal(resolver.merge(existing, { id: "m2", content: "buy milk", metadata: {} }).content, "buy milk and eggs");
  assert.equal(
    resolver.merge(existing, { id: "m2", content: "buy milk and eggs today", metadata: {} }).content,
    "buy milk and eggs today"
  );
});
