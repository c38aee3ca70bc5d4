import { z } from "zod";
import { CATEGORIES, TIERS, type Category, type Tier } from "../types/memory.js";

// ============================================================================
// Input Schemas
// ============================================================================

const userIdSchema = z.string().trim().min(1, "userId is required");

export const AddMemoryInputSchema = z.object({
  content: z.string().trim().min(1, "Content is required"),
  userId: userIdSchema,
  metadata: z.record(z.string(), z.unknown()).default({}),
}).strict();

export const RetrieveInputSchema = z.object({
  query: z.string(),
  userId: userIdSchema,
  k: z.number().int().positive().max(100).optional(),
}).strict();

export const BrowseInputSchema = z.object({
  userId: userIdSchema,
  category: z.enum(CATEGORIES),
  tier: z.enum(TIERS).optional(),
  limit: z.number().int().positive().max(1000).default(50),
}).strict();

export const ReclassifyInputSchema = z.object({
  userId: userIdSchema,
  id: z.string().min(1),
  category: z.enum(CATEGORIES).optional(),
}).strict();

// ============================================================================
// Output Types
// ============================================================================

export type AddAction = "insert_new" | "merge_into" | "supersede";

export interface AddResult {
  id: string;
  action: AddAction;
  category: Category;
  confidence: number;
  tier: Tier;
  /** Set when the new item retired an older contradictory one. */
  supersededId?: string;
}

export interface PartitionStat {
  category: Category;
  tier: Tier;
  count: number;
}

export interface MemoryStatistics {
  userId: string;
  total: number;
  byCategory: Record<Category, number>;
  byTier: Record<Tier, number>;
  partitions: PartitionStat[];
  superseded: number;
  pendingEmbeddings: number;
}

export interface TickReport {
  agedOut: number;
  archived: number;
  evicted: number;
  prunedAccesses: number;
  backfilled: number;
}

export interface BackfillResult {
  processed: number;
  errors: number;
  duration: number;
}

// ============================================================================
// Error Types
// ============================================================================

export type CoreErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "STORE_UNAVAILABLE"
  | "EMBEDDING_UNAVAILABLE"
  | "CONFLICT";

export class CoreError extends Error {
  constructor(
    message: string,
    public code: CoreErrorCode,
    public cause?: unknown
  ) {
    super(message);
    this.name = "CoreError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parses input against a schema, reporting failures as VALIDATION errors.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new CoreError(`Invalid input: ${message}`, "VALIDATION", parsed.error);
  }
  return parsed.data;
}

// ============================================================================
// Type Exports
// ============================================================================

export type AddMemoryInput = z.input<typeof AddMemoryInputSchema>;
export type AddMemoryData = z.output<typeof AddMemoryInputSchema>;

export type RetrieveInput = z.input<typeof RetrieveInputSchema>;

export type BrowseInput = z.input<typeof BrowseInputSchema>;
export type BrowseData = z.output<typeof BrowseInputSchema>;

export type ReclassifyInput = z.input<typeof ReclassifyInputSchema>;
