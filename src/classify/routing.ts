import { CATEGORIES, type Category, type QueryIntent } from "../types/memory.js";

/** Which partitions each query intent searches, in routing order. */
export const INTENT_ROUTES: Readonly<Record<QueryIntent, readonly Category[]>> = {
  retrieve_fact: ["fact", "concept", "reference", "personal"],
  find_procedure: ["procedure", "workflow", "task"],
  search_conversation: ["conversation", "question", "greeting"],
  locate_code: ["code"],
  find_document: ["document", "reference", "image", "video"],
  get_tasks: ["task"],
  general_search: CATEGORIES,
};

/** Tie-break order when two categories match the same number of rules. */
export const CATEGORY_PRIORITY: readonly Category[] = [
  "code",
  "procedure",
  "workflow",
  "task",
  "reference",
  "document",
  "image",
  "video",
  "personal",
  "question",
  "fact",
  "concept",
  "greeting",
  "conversation",
  "general",
];

export const INTENT_PRIORITY: readonly QueryIntent[] = [
  "locate_code",
  "find_procedure",
  "get_tasks",
  "find_document",
  "search_conversation",
  "retrieve_fact",
  "general_search",
];

export function routeIntent(intent: QueryIntent): Category[] {
  return [...INTENT_ROUTES[intent]];
}
