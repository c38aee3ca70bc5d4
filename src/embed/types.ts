export interface EmbedRequest {
  id: string;
  text: string;
}

export interface EmbedResult {
  id: string;
  embedding: number[];
  dimensions: number;
}

export interface EmbedOptions {
  /** Aborts the in-flight request (used for retrieval timeouts). */
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  readonly dimensions: number;
  readonly model: string;

  /**
   * Initialize the provider (open clients, warm caches)
   */
  initialize(): Promise<void>;

  /**
   * Generate embedding for a single text
   */
  embed(text: string, options?: EmbedOptions): Promise<number[]>;

  /**
   * Generate embeddings for multiple texts in batch
   */
  embedBatch(texts: EmbedRequest[], options?: EmbedOptions): Promise<EmbedResult[]>;

  /**
   * Check if the provider is healthy and ready
   */
  healthCheck(): Promise<boolean>;

  /**
   * Clean up resources
   */
  dispose(): Promise<void>;
}

export type EmbeddingProviderKind = "hashing" | "openai" | "ollama";

export interface EmbeddingProviderConfig {
  provider: EmbeddingProviderKind;
  model: string;
  dimensions: number;
  batchSize: number;
  baseUrl?: string;
  apiKey?: string;
}
