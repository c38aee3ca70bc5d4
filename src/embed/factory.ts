import type { EmbeddingProvider, EmbeddingProviderConfig } from "./types.js";
import { HashingEmbeddingProvider } from "./hashing-provider.js";
import { OpenAICompatibleEmbeddingProvider } from "./openai-provider.js";

export function createEmbeddingProvider(config: EmbeddingProviderConfig): EmbeddingProvider {
  switch (config.provider) {
    case "hashing":
      return new HashingEmbeddingProvider(config);
    case "openai":
    case "ollama":
      return new OpenAICompatibleEmbeddingProvider(config);
  }
}
