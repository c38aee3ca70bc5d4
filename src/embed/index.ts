export type {
  EmbedOptions,
  EmbedRequest,
  EmbedResult,
  EmbeddingProvider,
  EmbeddingProviderConfig,
  EmbeddingProviderKind
} from "./types.js";

export { createEmbeddingProvider } from "./factory.js";
export { HashingEmbeddingProvider } from "./hashing-provider.js";
export { OpenAICompatibleEmbeddingProvider } from "./openai-provider.js";
export { checkDimensions, embedWithDeadline, EmbeddingDimensionError, withDeadline } from "./deadline.js";
