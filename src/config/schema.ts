import { z } from "zod";

const classifierSchema = z.object({
  ruleConfidenceThreshold: z.number().min(0).max(1).default(0.6),
  enableModelFallback: z.boolean().default(false),
  cacheSize: z.number().int().nonnegative().default(500),
});

const conflictSchema = z.object({
  candidateThreshold: z.number().min(0).max(1).default(0.85),
  mergeThreshold: z.number().min(0).max(1).default(0.8),
  subjectThreshold: z.number().min(0).max(1).default(0.6),
  ambiguityFloor: z.number().min(0).max(1).default(0.4),
});

const tiersSchema = z.object({
  workingCapacity: z.number().int().positive().default(100),
  shortTermCapacity: z.number().int().positive().default(1000),
  longTermCapacity: z.number().int().positive().nullable().default(null),
  promoteWorkingAfter: z.number().int().nonnegative().default(2),
  promoteShortTermAfter: z.number().int().nonnegative().default(4),
  accessWindowMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
  workingTtlMs: z.number().int().positive().default(60 * 60 * 1000),
  shortTermTtlMs: z.number().int().positive().default(7 * 24 * 60 * 60 * 1000),
  minAccessesToKeep: z.number().int().nonnegative().default(2),
  sweepIntervalMs: z.number().int().positive().default(5 * 60 * 1000),
});

const retrievalSchema = z.object({
  defaultK: z.number().int().positive().default(10),
  candidateLimit: z.number().int().positive().default(30),
  rrfK: z.number().positive().default(60),
  embedTimeoutMs: z.number().int().positive().default(2000),
  mode: z.enum(["hybrid", "lexical", "vector"]).default("hybrid"),
});

const embeddingConfigSchema = z.object({
  provider: z.enum(["hashing", "openai", "ollama"]).default("hashing"),
  model: z.string().default("hashing-v1"),
  dimensions: z.number().int().positive().default(256),
  batchSize: z.number().int().positive().default(8),
  concurrency: z.number().int().positive().default(2),
  baseUrl: z.string().optional(), // For ollama/openai providers
  apiKey: z.string().optional(), // For openai provider
});

const llmConfigSchema = z.object({
  provider: z.enum(["openai", "ollama"]).default("ollama"),
  model: z.string().default("qwen2.5:3b"),
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  timeoutMs: z.number().int().positive().default(5000),
});

export const appConfigSchema = z.object({
  classifier: classifierSchema.default({}),
  conflict: conflictSchema.default({}),
  tiers: tiersSchema.default({}),
  retrieval: retrievalSchema.default({}),
  ai: z.object({
    embedding: embeddingConfigSchema.default({}),
    llm: llmConfigSchema.default({}),
  }).default({}),
  storage: z.object({
    dbPath: z.string().default("./data/memlane.db"),
  }).default({}),
  defaultUser: z.string().min(1).default("default"),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type AppConfigInput = z.input<typeof appConfigSchema>;
export type ClassifierConfig = z.infer<typeof classifierSchema>;
export type ConflictConfig = z.infer<typeof conflictSchema>;
export type TiersConfig = z.infer<typeof tiersSchema>;
export type RetrievalConfig = z.infer<typeof retrievalSchema>;

export function createDefaultConfig(overrides: AppConfigInput = {}): AppConfig {
  return appConfigSchema.parse(overrides);
}
