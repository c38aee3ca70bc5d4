export type { ModelClassifier, ModelClassifierConfig, ModelClassifyOptions, ModelLabel } from "./types.js";
export { OpenAICompatibleModelClassifier, buildClassificationPrompt, parseLabelResponse } from "./openai-classifier.js";
