import OpenAI from "openai";
import { z } from "zod";
import type { ModelClassifier, ModelClassifierConfig, ModelClassifyOptions, ModelLabel } from "./types.js";
import { debug, warn } from "../utils/logger.js";

const OLLAMA_DEFAULT_URL = "http://localhost:11434/v1";
const DEFAULT_MODEL_CONFIDENCE = 0.7;

const labelResponseSchema = z.object({
  label: z.string(),
  confidence: z.number().min(0).max(1).optional(),
});

export function buildClassificationPrompt(text: string, labels: readonly string[]): string {
  return [
    `Classify the following text into exactly one of these labels: ${labels.join(", ")}`,
    "",
    `Text: ${JSON.stringify(text)}`,
    "",
    'Respond with JSON in this format: {"label": "<one label>", "confidence": <0.0-1.0>}',
  ].join("\n");
}

/**
 * Parses a model reply into a label from the closed set. Anything else is
 * treated as no answer.
 */
export function parseLabelResponse(raw: string, labels: readonly string[]): ModelLabel | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    debug(() => `[ModelClassifier] Non-JSON reply: ${raw.slice(0, 80)}`);
    return null;
  }

  const parsed = labelResponseSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  const label = parsed.data.label.trim().toLowerCase();
  if (!labels.includes(label)) {
    debug(() => `[ModelClassifier] Label outside the closed set: ${label}`);
    return null;
  }

  return { label, confidence: parsed.data.confidence ?? DEFAULT_MODEL_CONFIDENCE };
}

/**
 * Chat-completion classifier over an OpenAI-compatible API (OpenAI or a local
 * Ollama server).
 */
export class OpenAICompatibleModelClassifier implements ModelClassifier {
  public readonly model: string;
  private client: OpenAI;

  constructor(private readonly config: ModelClassifierConfig) {
    const isOllama = config.provider === "ollama";
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey ?? (isOllama ? "ollama" : ""),
      baseURL: config.baseUrl ?? (isOllama ? OLLAMA_DEFAULT_URL : undefined),
      maxRetries: 0,
    });
  }

  async classify(
    text: string,
    labels: readonly string[],
    options: ModelClassifyOptions = {}
  ): Promise<ModelLabel | null> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: buildClassificationPrompt(text, labels) }],
          response_format: { type: "json_object" },
          temperature: 0.3,
          max_tokens: 100,
        },
        { signal: options.signal ?? AbortSignal.timeout(this.config.timeoutMs) }
      );

      const content = completion.choices[0]?.message.content;
      if (!content) {
        return null;
      }
      return parseLabelResponse(content, labels);
    } catch (err) {
      warn(`Model classification failed: ${err instanceof Error ? err.message : String(err)}; using rule result`);
      return null;
    }
  }
}
