import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import test from "node:test";
import { chunkDocument } from "../src/ingest/chunker.js";
import { discoverFiles, DEFAULT_PATTERNS } from "../src/ingest/discovery.js";
import { ingestFiles } from "../src/ingest/orchestrator.js";
import { parseDocument } from "../src/ingest/parser.js";
import { createTestManager } from "./helpers.js";

function createNotesDir(files: Record<string, string>): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "memlane-notes-"));
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(dir, relativePath);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, "utf-8");
  }
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

test("chunker keeps short notes whole", () => {
  const content = "# Title\n\nFirst paragraph.\n\nSecond paragraph.";
  assert.deepEqual(
    chunkDocument(content).map((chunk) => [chunk.seq, chunk.text]),
    [[0, content]]
  );
  assert.deepEqual(chunkDocument("  \n\n "), []);
});

test("chunker splits on paragraph boundaries under a small budget", () => {
  const chunks = chunkDocument("Apples are red.\n\nBananas are yellow.\n\nGrapes are purple.", { maxTokens: 8 });
  assert.deepEqual(
    chunks.map((chunk) => [chunk.seq, chunk.text]),
    [
      [0, "Apples are red."],
      [1, "Bananas are yellow."],
      [2, "Grapes are purple."],
    ]
  );
});

test("chunker never splits a fenced code block on blank lines", () => {
  const code = "```js\nconst a = 1;\n\nconst b = 2;\n```";
  const chunks = chunkDocument(`Intro line.\n\n${code}`);
  assert.equal(chunks.length, 1);
  assert.equal(chunks[0].text, `Intro line.\n\n${code}`);
});

test("chunker cuts a single oversized sentence by tokens", () => {
  const words = Array.from({ length: 60 }, (_, i) => `word${i}`).join(" ");
  const chunks = chunkDocument(words, { maxTokens: 10 });
  assert.equal(chunks.length > 1, true);
  assert.equal(chunks[0].text.startsWith("word0"), true);
  assert.equal(chunks[chunks.length - 1].text.endsWith("59"), true);
});

test("parser reads front matter title and tags", () => {
  const { dir, cleanup } = createNotesDir({
    "garden.md": "---\ntitle: Garden Log\ntags: home, outdoor\n---\n# Ignored heading\n\nWater the tomatoes.\n",
    "untitled.md": "\uFEFFJust a line of text.\r\nAnd another.\r\n",
    "heading.md": "# Weekly Review\n\nAll good.\n",
  });
  try {
    const garden = parseDocument(join(dir, "garden.md"), "garden.md");
    assert.equal(garden.title, "Garden Log");
    assert.deepEqual(garden.tags, ["home", "outdoor"]);
    assert.equal(garden.source, "garden.md");
    assert.equal(garden.content, "# Ignored heading\n\nWater the tomatoes.\n");
    assert.equal(garden.wordCount, 6);

    const untitled = parseDocument(join(dir, "untitled.md"), "notes/untitled.md");
    assert.equal(untitled.title, "untitled");
    assert.equal(untitled.content, "Just a line of text.\nAnd another.\n");
    assert.deepEqual(untitled.tags, []);

    assert.equal(parseDocument(join(dir, "heading.md"), "heading.md").title, "Weekly Review");
  } finally {
    cleanup();
  }
});

test("discovery finds notes and skips excluded directories", async () => {
  const { dir, cleanup } = createNotesDir({
    "b.md": "b",
    "a.txt": "a",
    "sub/c.markdown": "c",
    "node_modules/pkg/readme.md": "skip",
    "data.json": "{}",
  });
  try {
    const files = await discoverFiles({ rootPath: dir, patterns: DEFAULT_PATTERNS });
    assert.deepEqual(
      files.map((file) => file.relativePath),
      ["a.txt", "b.md", "sub/c.markdown"]
    );
  } finally {
    cleanup();
  }
});

test("ingest adds each chunk and re-ingest merges into the same items", async () => {
  const { manager, cleanup } = await createTestManager();
  const notes = createNotesDir({
    "notes/garden.md": "---\ntitle: Garden\ntags: [home, outdoor]\n---\nWater the tomatoes every morning.\n",
    "notes/car.md": "The car needs new tires before winter.\n",
  });
  try {
    const first = await ingestFiles({ manager, userId: "u1", rootPath: notes.dir });
    assert.equal(first.scanned, 2);
    assert.equal(first.chunks, 2);
    assert.deepEqual(first.actions, { insert_new: 2, merge_into: 0, supersede: 0 });
    assert.deepEqual(first.errors, []);

    const [garden] = await manager.getByCategory("u1", "workflow");
    assert.equal(garden.content, "Water the tomatoes every morning.");
    assert.equal(garden.metadata.source, "notes/garden.md");
    assert.equal(garden.metadata.title, "Garden");
    assert.equal(garden.metadata.chunk, 0);
    assert.deepEqual(garden.metadata.tags, ["home", "outdoor"]);

    const second = await ingestFiles({ manager, userId: "u1", rootPath: notes.dir });
    assert.deepEqual(second.actions, { insert_new: 0, merge_into: 2, supersede: 0 });
    assert.equal((await manager.statistics("u1")).total, 2);
  } finally {
    notes.cleanup();
    await cleanup();
  }
});
