import { readFileSync } from "node:fs";
import { z } from "zod";
import { CATEGORIES, QUERY_INTENTS, type Category, type QueryIntent } from "../types/memory.js";

const DEFAULT_RULES_URL = new URL("../../data/classifier-rules.json", import.meta.url);

const namedPatternSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
});

const ruleFileSchema = z.object({
  categories: z.record(z.enum(CATEGORIES), z.array(z.string().min(1))),
  intents: z.record(z.enum(QUERY_INTENTS), z.array(z.string().min(1))),
  priority: z.object({
    high: z.array(z.string().min(1)),
    low: z.array(z.string().min(1)),
  }),
  languages: z.array(z.object({ language: z.string().min(1), pattern: z.string().min(1) })),
  subcategories: z.record(z.enum(CATEGORIES), z.array(namedPatternSchema)),
});

export type RuleFile = z.infer<typeof ruleFileSchema>;

export interface NamedRule {
  name: string;
  pattern: RegExp;
}

export interface RuleTables {
  categories: ReadonlyMap<Category, readonly RegExp[]>;
  intents: ReadonlyMap<QueryIntent, readonly RegExp[]>;
  priority: { high: readonly RegExp[]; low: readonly RegExp[] };
  languages: readonly NamedRule[];
  subcategories: ReadonlyMap<Category, readonly NamedRule[]>;
}

function compile(source: string): RegExp {
  try {
    return new RegExp(source, "iu");
  } catch (err) {
    throw new Error(`Invalid classifier pattern ${JSON.stringify(source)}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function compileRules(input: unknown): RuleTables {
  const file = ruleFileSchema.parse(input);

  const categories = new Map<Category, RegExp[]>();
  for (const category of CATEGORIES) {
    categories.set(category, (file.categories[category] ?? []).map(compile));
  }

  const intents = new Map<QueryIntent, RegExp[]>();
  for (const intent of QUERY_INTENTS) {
    intents.set(intent, (file.intents[intent] ?? []).map(compile));
  }

  const subcategories = new Map<Category, NamedRule[]>();
  for (const category of CATEGORIES) {
    const rules = file.subcategories[category];
    if (rules) {
      subcategories.set(category, rules.map((rule) => ({ name: rule.name, pattern: compile(rule.pattern) })));
    }
  }

  return {
    categories,
    intents,
    priority: {
      high: file.priority.high.map(compile),
      low: file.priority.low.map(compile),
    },
    languages: file.languages.map((entry) => ({ name: entry.language, pattern: compile(entry.pattern) })),
    subcategories,
  };
}

/**
 * Reads and compiles the rule tables. Defaults to the file shipped in `data/`.
 */
export function loadRules(path: string | URL = DEFAULT_RULES_URL): RuleTables {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return compileRules(raw);
}
