import type { CoreContext } from "./context.js";
import type { RetrievalResult } from "../search/context-retriever.js";
import { RetrieveInputSchema, parseInput, type RetrieveInput } from "./types.js";

/**
 * Retrieve up to `k` items relevant to a query, routed by the query's intent.
 * Each returned item counts as an access and may be promoted.
 *
 * @param ctx - Core context with dependencies
 * @param input - query, userId and optional k (default `retrieval.defaultK`)
 * @throws CoreError VALIDATION for bad input, STORE_UNAVAILABLE when SQLite fails
 */
export async function retrieve(ctx: CoreContext, input: RetrieveInput): Promise<RetrievalResult> {
  const data = parseInput(RetrieveInputSchema, input);
  return ctx.retriever.retrieve(data.query, data.userId, data.k ?? ctx.config.retrieval.defaultK);
}
