import assert from "node:assert/strict";
import test from "node:test";
import { checkDimensions, embedWithDeadline, EmbeddingDimensionError, withDeadline } from "../src/embed/index.js";
import { hashingProvider, OversizedEmbeddingProvider, UnresponsiveEmbeddingProvider } from "./helpers.js";

test("withDeadline settles even when the task ignores its signal", async () => {
  let aborted = false;
  await assert.rejects(
    withDeadline(20, "Embedding", (signal) => {
      signal.addEventListener("abort", () => {
        aborted = true;
      });
      return new Promise<number>(() => {});
    }),
    { message: "Embedding timed out after 20ms" }
  );
  assert.equal(aborted, true);
  assert.equal(await withDeadline(1000, "Embedding", async () => 7), 7);
});

test("checkDimensions names the setting to change", () => {
  assert.doesNotThrow(() => checkDimensions([0, 1, 0], 3, "tiny"));
  assert.throws(() => checkDimensions([0, 1], 3, "tiny"), {
    name: "EmbeddingDimensionError",
    message: 'Embedding model "tiny" returned 2 dimensions but ai.embedding.dimensions is 3; set MEMLANE_EMBED_DIMENSIONS=2',
  });
});

test("embedWithDeadline rejects stalled and oversized providers", async () => {
  const stalled = new UnresponsiveEmbeddingProvider();
  await assert.rejects(embedWithDeadline(stalled, "hello", 20), { message: "Embedding timed out after 20ms" });

  const oversized = new OversizedEmbeddingProvider(256, 768);
  await oversized.initialize();
  await assert.rejects(embedWithDeadline(oversized, "hello", 1000), EmbeddingDimensionError);

  const provider = hashingProvider(16);
  await provider.initialize();
  assert.equal((await embedWithDeadline(provider, "hello world", 1000)).length, 16);
});
