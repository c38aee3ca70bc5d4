import FastGlob from "fast-glob";
import { statSync } from "node:fs";
import { relative, resolve } from "node:path";
import type { FileDiscoveryOptions, DiscoveredFile } from "./types.js";

export const DEFAULT_PATTERNS = ["**/*.md", "**/*.markdown", "**/*.txt"];

const DEFAULT_EXCLUDE = [
  "**/node_modules/**",
  "**/.git/**",
  "**/dist/**",
  "**/build/**",
  "**/coverage/**",
];

/**
 * Discover note files under a directory, sorted by relative path
 */
export async function discoverFiles(options: FileDiscoveryOptions): Promise<DiscoveredFile[]> {
  const { patterns, exclude = DEFAULT_EXCLUDE } = options;
  const rootPath = resolve(options.rootPath);

  const files = await FastGlob(patterns, {
    cwd: rootPath,
    onlyFiles: true,
    followSymbolicLinks: false,
    dot: false,
    ignore: exclude,
    absolute: true,
  });

  const discovered: DiscoveredFile[] = files.map((absolutePath) => {
    const stats = statSync(absolutePath);
    return {
      absolutePath,
      relativePath: relative(rootPath, absolutePath).split("\\").join("/"),
      size: stats.size,
      mtime: stats.mtime,
    };
  });

  discovered.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  return discovered;
}
