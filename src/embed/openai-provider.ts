import OpenAI from "openai";
import type { EmbeddingProvider, EmbedOptions, EmbedRequest, EmbedResult, EmbeddingProviderConfig } from "./types.js";
import { checkDimensions, EmbeddingDimensionError } from "./deadline.js";
import { debug, error, info } from "../utils/logger.js";

const OLLAMA_DEFAULT_URL = "http://localhost:11434/v1";

/**
 * Embeddings over an OpenAI-compatible HTTP API. Covers OpenAI itself and
 * Ollama's `/v1` endpoint.
 */
export class OpenAICompatibleEmbeddingProvider implements EmbeddingProvider {
  public readonly dimensions: number;
  public readonly model: string;
  private batchSize: number;
  private client: OpenAI | null = null;
  private disposed = false;

  constructor(private readonly config: EmbeddingProviderConfig) {
    this.dimensions = config.dimensions;
    this.model = config.model;
    this.batchSize = config.batchSize;
  }

  async initialize(): Promise<void> {
    if (this.disposed) {
      throw new Error("Provider has been disposed");
    }
    if (this.client) {
      return;
    }

    const isOllama = this.config.provider === "ollama";
    const apiKey = this.config.apiKey ?? (isOllama ? "ollama" : undefined);
    if (!apiKey) {
      throw new Error("No embedding API key configured. Set OPENAI_API_KEY or ai.embedding.apiKey");
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: this.config.baseUrl ?? (isOllama ? OLLAMA_DEFAULT_URL : undefined),
      maxRetries: 0,
    });
    info(() => `[EmbeddingProvider] ${this.config.provider} client ready (${this.model})`);
  }

  private getClient(): OpenAI {
    if (!this.client || this.disposed) {
      throw new Error("Provider not initialized. Call initialize() first.");
    }
    return this.client;
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [first] = await this.request([text], options);
    if (!first) {
      throw new Error("Embedding response contained no vectors");
    }
    return first;
  }

  async embedBatch(requests: EmbedRequest[], options: EmbedOptions = {}): Promise<EmbedResult[]> {
    const results: EmbedResult[] = [];

    for (let i = 0; i < requests.length; i += this.batchSize) {
      const batch = requests.slice(i, i + this.batchSize);
      debug(() => `[EmbeddingProvider] Batch ${Math.floor(i / this.batchSize) + 1}/${Math.ceil(requests.length / this.batchSize)}`);

      const vectors = await this.request(batch.map((req) => req.text), options);
      batch.forEach((req, index) => {
        const embedding = vectors[index];
        if (!embedding) {
          throw new Error(`Embedding response missing vector for ${req.id}`);
        }
        results.push({ id: req.id, embedding, dimensions: embedding.length });
      });
    }

    return results;
  }

  private async request(input: string[], options: EmbedOptions): Promise<number[][]> {
    const response = await this.getClient().embeddings.create(
      {
        model: this.model,
        input,
        // Ollama rejects the dimensions parameter
        ...(this.config.provider === "openai" ? { dimensions: this.dimensions } : {}),
      },
      { signal: options.signal }
    );

    const vectors = response.data
      .slice()
      .sort((a, b) => a.index - b.index)
      .map((entry) => entry.embedding);
    for (const vector of vectors) {
      checkDimensions(vector, this.dimensions, this.model);
    }
    return vectors;
  }

  async healthCheck(): Promise<boolean> {
    if (this.disposed) {
      return false;
    }

    try {
      await this.initialize();
      await this.embed("health check");
      return true;
    } catch (err) {
      if (err instanceof EmbeddingDimensionError) {
        error(`[EmbeddingProvider] Configuration error: ${err.message}`);
      } else {
        debug(() => `[EmbeddingProvider] Health check failed: ${err instanceof Error ? err.message : String(err)}`);
      }
      return false;
    }
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    this.client = null;
  }
}
