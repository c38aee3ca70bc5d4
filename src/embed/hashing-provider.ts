import type { EmbeddingProvider, EmbedOptions, EmbedRequest, EmbedResult, EmbeddingProviderConfig } from "./types.js";
import { contentTokens } from "../utils/text.js";
import { debug, info } from "../utils/logger.js";

/** 32-bit FNV-1a. */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Local feature-hashing embeddings: each content token lands in one signed
 * bucket and the vector is scaled to unit length. Texts sharing words end up
 * close under cosine similarity. No network, no model files.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  public readonly dimensions: number;
  public readonly model: string;
  private batchSize: number;
  private disposed = false;
  private initialized = false;

  constructor(config: EmbeddingProviderConfig) {
    this.dimensions = config.dimensions;
    this.model = config.model;
    this.batchSize = config.batchSize;
  }

  async initialize(): Promise<void> {
    if (this.disposed) {
      throw new Error("Provider has been disposed");
    }

    if (this.initialized) {
      return;
    }

    info(() => `[HashingProvider] Ready: ${this.model} (${this.dimensions} dims)`);
    this.initialized = true;
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    if (!this.initialized) {
      throw new Error("Provider not initialized. Call initialize() first.");
    }

    if (this.disposed) {
      throw new Error("Provider has been disposed");
    }

    options.signal?.throwIfAborted();

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of contentTokens(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimensions;
      vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
    }

    const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
    if (magnitude === 0) {
      return vector;
    }
    return vector.map((val) => val / magnitude);
  }

  async embedBatch(requests: EmbedRequest[], options: EmbedOptions = {}): Promise<EmbedResult[]> {
    const results: EmbedResult[] = [];

    for (let i = 0; i < requests.length; i += this.batchSize) {
      const batch = requests.slice(i, i + this.batchSize);

      debug(() => `[HashingProvider] Processing batch ${Math.floor(i / this.batchSize) + 1}/${Math.ceil(requests.length / this.batchSize)}`);

      for (const req of batch) {
        const embedding = await this.embed(req.text, options);
        results.push({
          id: req.id,
          embedding,
          dimensions: this.dimensions,
        });
      }
    }

    return results;
  }

  async healthCheck(): Promise<boolean> {
    return this.initialized && !this.disposed;
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.initialized = false;

    debug(() => "[HashingProvider] Disposed");
  }
}
