import { encode } from "gpt-tokenizer";
import type { Category } from "../types/memory.js";
import type { RetrievalResult, RetrievedHit } from "./context-retriever.js";

export type ContextStyle = "structured" | "concise" | "detailed";

export interface FormatContextOptions {
  style?: ContextStyle;
  /** Token budget for the whole block; lines that do not fit are dropped. */
  maxTokens?: number;
}

const PER_CATEGORY_LIMIT = 3;
const CONCISE_LIMIT = 5;

function titleCase(category: Category): string {
  return category
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

function structuredLines(hits: readonly RetrievedHit[]): string[][] {
  const byCategory = new Map<Category, RetrievedHit[]>();
  for (const hit of hits) {
    const bucket = byCategory.get(hit.item.category) ?? [];
    bucket.push(hit);
    byCategory.set(hit.item.category, bucket);
  }

  return [...byCategory.entries()].map(([category, bucket]) => [
    `## ${titleCase(category)}`,
    ...bucket.slice(0, PER_CATEGORY_LIMIT).map((hit) => `- ${hit.item.content}`),
  ]);
}

function conciseLines(hits: readonly RetrievedHit[]): string[][] {
  return [["Relevant context:"], ...hits.slice(0, CONCISE_LIMIT).map((hit) => [`- ${hit.item.content}`])];
}

function detailedLines(result: RetrievalResult): string[][] {
  const header = [
    "## Retrieved Context",
    `Query: ${result.query}`,
    `Intent: ${result.intent}`,
    `Total items: ${result.hits.length}`,
  ];
  const entries = result.hits.map((hit, index) => [
    `${index + 1}. [${hit.item.category}] ${hit.item.content}`,
    `   Score: ${hit.score.toFixed(2)} | Source: ${hit.source} | Tier: ${hit.item.tier}`,
  ]);
  return [header, ...entries];
}

/**
 * Renders retrieved items as a prompt-ready text block. Groups are kept whole
 * or dropped whole when a token budget is given.
 */
export function formatContext(result: RetrievalResult, options: FormatContextOptions = {}): string {
  const { style = "structured", maxTokens } = options;

  if (result.hits.length === 0) {
    return "";
  }

  let groups: string[][];
  let separator = "\n\n";
  if (style === "concise") {
    groups = conciseLines(result.hits);
    separator = "\n";
  } else if (style === "detailed") {
    groups = detailedLines(result);
  } else {
    groups = structuredLines(result.hits);
  }

  if (maxTokens === undefined) {
    return groups.map((group) => group.join("\n")).join(separator);
  }

  const kept: string[] = [];
  let used = 0;
  for (const group of groups) {
    const text = group.join("\n");
    const cost = encode(kept.length > 0 ? `${separator}${text}` : text).length;
    if (used + cost > maxTokens) {
      break;
    }
    kept.push(text);
    used += cost;
  }
  return kept.join(separator);
}

export function countTokens(text: string): number {
  return encode(text).length;
}
