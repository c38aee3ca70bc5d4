export {
  ContextRetriever,
  type ContextRetrieverOptions,
  type RetrievalResult,
  type RetrievedHit,
  type RetrievalMode,
} from "./context-retriever.js";
export { searchLexical, tokenizeForFts, type LexicalHit, type LexicalSearchOptions } from "./lexical.js";
export { searchVector, type VectorSearchHit, type VectorSearchOptions } from "./vector.js";
export { rrfFusion, type FusedHit, type FusionOptions, type HitSource, type RankedHit } from "./fusion.js";
export { formatContext, countTokens, type ContextStyle, type FormatContextOptions } from "./format.js";
