import assert from "node:assert/strict";
import test from "node:test";
import { InputClassifier, UNMATCHED_CONFIDENCE } from "../src/classify/input-classifier.js";
import { compileRules, loadRules } from "../src/classify/rules.js";
import { LruCache } from "../src/classify/lru-cache.js";
import { buildClassificationPrompt, parseLabelResponse } from "../src/llm/openai-classifier.js";
import { CATEGORIES } from "../src/types/memory.js";
import { createDefaultConfig } from "../src/config/schema.js";
import { StubModelClassifier } from "./helpers.js";

const rules = loadRules();

function createClassifier(
  options: { model?: StubModelClassifier; enableModelFallback?: boolean } = {}
): InputClassifier {
  const config = createDefaultConfig({
    classifier: { enableModelFallback: options.enableModelFallback ?? false },
  });
  return new InputClassifier({ rules, config: config.classifier, model: options.model ?? null });
}

test("reminder text is a task with medium priority", async () => {
  const result = await createClassifier().classify("Remember to buy milk on Friday");
  assert.equal(result.category, "task");
  assert.equal(result.confidence, 0.6);
  assert.equal(result.source, "rules");
  assert.deepEqual(result.metadata, { priority: "medium" });
});

test("fenced python is code with the language detected", async () => {
  const result = await createClassifier().classify("```python\ndef add(a, b):\n    return a + b\n```");
  assert.equal(result.category, "code");
  assert.equal(result.confidence, 0.7);
  assert.equal(result.metadata.language, "python");
});

test("empty and unrecognized input fall back to general", async () => {
  const classifier = createClassifier();
  for (const text of ["", "   ", "zzqx blorp"]) {
    const result = await classifier.classify(text);
    assert.equal(result.category, "general");
    assert.equal(result.confidence, UNMATCHED_CONFIDENCE);
    assert.equal(result.source, "fallback");
  }
});

test("equal rule hits are broken by category priority", () => {
  // reference and image both match once; reference ranks higher
  const result = createClassifier().classifyByRules("Check out the screenshot");
  assert.equal(result.category, "reference");
  assert.equal(result.confidence, 0.6);
});

test("Chinese rules share the same tables", () => {
  const classifier = createClassifier();
  assert.equal(classifier.classifyByRules("记得明天交报告").category, "task");
  assert.equal(classifier.classifyByRules("你好").category, "greeting");
  assert.equal(classifier.classifyIntentByRules("我的待办有哪些").intent, "get_tasks");
});

test("task priority: low wins over the bare word priority", () => {
  const classifier = createClassifier();
  assert.equal(classifier.classifyByRules("urgent: remember to renew passport").metadata.priority, "high");
  assert.equal(classifier.classifyByRules("low priority: need to tidy the garage").metadata.priority, "low");
});

test("reference items carry their urls", () => {
  const result = createClassifier().classifyByRules("see also https://example.com/docs");
  assert.equal(result.category, "reference");
  assert.equal(result.confidence, 0.7);
  assert.deepEqual(result.metadata.urls, ["https://example.com/docs"]);
});

test("question subcategories", () => {
  const result = createClassifier().classifyByRules("Why is the sky blue?");
  assert.equal(result.category, "question");
  assert.deepEqual(result.subcategories, ["explanatory"]);
});

test("classification is deterministic", async () => {
  const classifier = createClassifier();
  const first = classifier.classifyByRules("Remember to water the plants every week");
  const second = createClassifier().classifyByRules("Remember to water the plants every week");
  assert.deepEqual(first, second);
  assert.deepEqual(await classifier.classify("hello again"), await classifier.classify("hello again"));
});

test("intent routing", async () => {
  const classifier = createClassifier();

  const tasks = await classifier.classifyIntent("what do I need to do Friday");
  assert.equal(tasks.intent, "get_tasks");
  assert.deepEqual(tasks.categories, ["task"]);

  const procedure = await classifier.classifyIntent("how do I reset the router");
  assert.equal(procedure.intent, "find_procedure");
  assert.deepEqual(procedure.categories, ["procedure", "workflow", "task"]);

  const code = await classifier.classifyIntent("show me the code for login");
  assert.equal(code.intent, "locate_code");
  assert.equal(code.confidence, 0.7);

  const general = await classifier.classifyIntent("purple elephants");
  assert.equal(general.intent, "general_search");
  assert.equal(general.confidence, UNMATCHED_CONFIDENCE);
  assert.deepEqual(general.categories, [...CATEGORIES]);
});

test("model fallback relabels low-confidence input", async () => {
  const model = new StubModelClassifier({ label: "fact", confidence: 0.8 });
  const classifier = createClassifier({ model, enableModelFallback: true });

  const result = await classifier.classify("zzqx blorp");
  assert.equal(result.category, "fact");
  assert.equal(result.confidence, 0.8);
  assert.equal(result.source, "model");
  assert.equal(model.calls.length, 1);
  assert.deepEqual(model.calls[0].labels, [...CATEGORIES]);

  // rule confidence 0.6 is not below the 0.6 threshold
  await classifier.classify("Remember to buy milk on Friday");
  assert.equal(model.calls.length, 1);
});

test("model answers outside the label set are ignored", async () => {
  const model = new StubModelClassifier({ label: "banana", confidence: 0.95 });
  const classifier = createClassifier({ model, enableModelFallback: true });

  const result = await classifier.classify("zzqx blorp");
  assert.equal(result.category, "general");
  assert.equal(result.source, "fallback");
});

test("model is not consulted when fallback is switched off", async () => {
  const model = new StubModelClassifier({ label: "fact", confidence: 0.8 });
  const classifier = createClassifier({ model, enableModelFallback: false });

  assert.equal((await classifier.classify("zzqx blorp")).category, "general");
  assert.equal(model.calls.length, 0);
});

test("cached results skip the model on repeat input", async () => {
  const model = new StubModelClassifier({ label: "concept", confidence: 0.75 });
  const classifier = createClassifier({ model, enableModelFallback: true });

  await classifier.classify("entropy of closed systems");
  await classifier.classify("entropy of closed systems");
  assert.equal(model.calls.length, 1);
});

test("rule file validation rejects unknown categories", () => {
  assert.throws(() =>
    compileRules({
      categories: { bogus: ["x"] },
      intents: {},
      priority: { high: [], low: [] },
      languages: [],
      subcategories: {},
    })
  );
});

test("lru cache evicts the least recently read entry", () => {
  const cache = new LruCache<string, number>(2);
  cache.set("a", 1);
  cache.set("b", 2);
  assert.equal(cache.get("a"), 1);
  cache.set("c", 3);
  assert.equal(cache.get("b"), undefined);
  assert.equal(cache.get("a"), 1);
  assert.equal(cache.get("c"), 3);
  assert.equal(cache.size, 2);
});

test("model replies are parsed against the closed label set", () => {
  assert.deepEqual(parseLabelResponse('{"label": "Fact", "confidence": 0.9}', CATEGORIES), {
    label: "fact",
    confidence: 0.9,
  });
  assert.deepEqual(parseLabelResponse('{"label": "task"}', CATEGORIES), { label: "task", confidence: 0.7 });
  assert.equal(parseLabelResponse("the answer is fact", CATEGORIES), null);
  assert.equal(parseLabelResponse('{"label": "banana", "confidence": 0.99}', CATEGORIES), null);
  assert.equal(parseLabelResponse('{"label": "fact", "confidence": 3}', CATEGORIES), null);

  const prompt = buildClassificationPrompt("buy milk", ["task", "fact"]);
  assert.equal(prompt.split("\n")[0], "Classify the following text into exactly one of these labels: task, fact");
  assert.equal(prompt.includes('Text: "buy milk"'), true);
});
