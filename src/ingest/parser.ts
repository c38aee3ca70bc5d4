import { readFileSync } from "node:fs";
import { createHash } from "node:crypto";
import matter from "gray-matter";
import type { ParsedDocument } from "./types.js";

/**
 * Parse a markdown or plain-text note, extracting front matter and content
 */
export function parseDocument(absolutePath: string, relativePath: string): ParsedDocument {
  const rawContent = readFileSync(absolutePath, "utf-8");
  const parsed = matter(rawContent);
  const frontmatter: Record<string, unknown> = { ...parsed.data };

  const content = parsed.content
    .replace(/^\uFEFF/, "") // strip BOM
    .replace(/\r\n/g, "\n");

  return {
    title: extractTitle(content, frontmatter, relativePath),
    content,
    contentHash: hashContent(rawContent),
    frontmatter,
    tags: extractTags(frontmatter.tags),
    source: relativePath,
    wordCount: content.split(/\s+/).filter((w) => w.length > 0).length,
  };
}

/**
 * Priority: frontmatter.title > first H1 > filename
 */
function extractTitle(content: string, frontmatter: Record<string, unknown>, fallbackPath: string): string {
  if (typeof frontmatter.title === "string" && frontmatter.title.trim()) {
    return frontmatter.title.trim();
  }

  const h1Match = content.match(/^#\s+(.+)$/m);
  if (h1Match) {
    return h1Match[1].trim();
  }

  const filename = fallbackPath.split("/").pop() || fallbackPath;
  return filename.replace(/\.[^/.]+$/, "");
}

/** Accepts `tags: [a, b]` or `tags: "a, b"`. */
function extractTags(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((tag): tag is string => typeof tag === "string").map((tag) => tag.trim()).filter(Boolean);
  }
  if (typeof value === "string") {
    return value.split(",").map((tag) => tag.trim()).filter(Boolean);
  }
  return [];
}

export function hashContent(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}
