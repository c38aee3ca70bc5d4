import type { EmbeddingProvider } from "./types.js";

/**
 * Runs `task` with an abort signal and a hard deadline. The deadline wins
 * even when the task ignores its signal.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  label: string,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** The embedding model's output size disagrees with `ai.embedding.dimensions`. */
export class EmbeddingDimensionError extends Error {
  constructor(
    public readonly model: string,
    public readonly actual: number,
    public readonly expected: number
  ) {
    super(
      `Embedding model "${model}" returned ${actual} dimensions but ai.embedding.dimensions is ${expected}; ` +
        `set MEMLANE_EMBED_DIMENSIONS=${actual}`
    );
    this.name = "EmbeddingDimensionError";
  }
}

/**
 * Throws when a vector does not have the configured length. The vector
 * collection is sized from `ai.embedding.dimensions`, so a model with a
 * different output size is a configuration error.
 */
export function checkDimensions(vector: readonly number[], expected: number, model: string): void {
  if (vector.length !== expected) {
    throw new EmbeddingDimensionError(model, vector.length, expected);
  }
}

/** Single embedding bounded by `timeoutMs` and checked against the provider's dimensions. */
export async function embedWithDeadline(
  provider: EmbeddingProvider,
  text: string,
  timeoutMs: number
): Promise<number[]> {
  const vector = await withDeadline(timeoutMs, "Embedding", (signal) => provider.embed(text, { signal }));
  checkDimensions(vector, provider.dimensions, provider.model);
  return vector;
}
