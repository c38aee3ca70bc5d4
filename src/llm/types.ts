export interface ModelLabel {
  label: string;
  confidence: number;
}

export interface ModelClassifyOptions {
  signal?: AbortSignal;
}

/**
 * Text classifier backed by a language model. Implementations return `null`
 * when the model is unreachable or answers with a label outside `labels`.
 */
export interface ModelClassifier {
  readonly model: string;
  classify(text: string, labels: readonly string[], options?: ModelClassifyOptions): Promise<ModelLabel | null>;
}

export interface ModelClassifierConfig {
  provider: "openai" | "ollama";
  model: string;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs: number;
}
