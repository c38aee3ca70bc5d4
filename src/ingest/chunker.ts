import { decode, encode } from "gpt-tokenizer";
import type { Chunk, ChunkingOptions } from "./types.js";

/** Memory items are short notes, so chunks are much smaller than page-sized RAG chunks. */
export const DEFAULT_CHUNK_SIZE_TOKENS = 200;

interface Block {
  text: string;
  tokens: number;
}

/**
 * Splits content into blocks: fenced code stays whole, every heading starts
 * a new block, blank lines separate paragraphs.
 */
function splitBlocks(content: string): string[] {
  const blocks: string[] = [];
  let current: string[] = [];
  let inFence = false;

  const flush = (): void => {
    const text = current.join("\n").trim();
    if (text) blocks.push(text);
    current = [];
  };

  for (const line of content.split("\n")) {
    if (line.trimStart().startsWith("```")) {
      if (!inFence) flush();
      current.push(line);
      inFence = !inFence;
      if (!inFence) flush();
      continue;
    }
    if (inFence) {
      current.push(line);
      continue;
    }
    if (/^#{1,6}\s/.test(line)) {
      flush();
      current.push(line);
      continue;
    }
    if (line.trim() === "") {
      flush();
      continue;
    }
    current.push(line);
  }
  flush();
  return blocks;
}

/** Sentence split first; a single sentence over the limit is cut by tokens. */
function splitOversized(text: string, maxTokens: number): string[] {
  const sentences = text.match(/[^.!?。！？\n]+[.!?。！？]*\s*/gu) ?? [text];
  const pieces: string[] = [];

  for (const sentence of sentences) {
    const tokens = encode(sentence);
    if (tokens.length <= maxTokens) {
      pieces.push(sentence.trim());
      continue;
    }
    for (let i = 0; i < tokens.length; i += maxTokens) {
      pieces.push(decode(tokens.slice(i, i + maxTokens)).trim());
    }
  }
  return pieces.filter(Boolean);
}

/**
 * Packs consecutive blocks into chunks of at most `maxTokens` tokens
 * (counted with gpt-tokenizer). Blocks are never reordered.
 */
export function chunkDocument(content: string, options: Partial<ChunkingOptions> = {}): Chunk[] {
  const maxTokens = options.maxTokens ?? DEFAULT_CHUNK_SIZE_TOKENS;
  if (!content.trim()) {
    return [];
  }

  const blocks: Block[] = splitBlocks(content).flatMap((text) => {
    const tokens = encode(text).length;
    if (tokens <= maxTokens) {
      return [{ text, tokens }];
    }
    return splitOversized(text, maxTokens).map((piece) => ({ text: piece, tokens: encode(piece).length }));
  });

  const chunks: Chunk[] = [];
  let pending: Block[] = [];
  let pendingTokens = 0;

  const emit = (): void => {
    if (pending.length === 0) return;
    const text = pending.map((block) => block.text).join("\n\n");
    chunks.push({ seq: chunks.length, tokenCount: encode(text).length, text });
    pending = [];
    pendingTokens = 0;
  };

  for (const block of blocks) {
    // Joining adds a separator token or two; leave room for it
    if (pending.length > 0 && pendingTokens + block.tokens + 2 > maxTokens) {
      emit();
    }
    pending.push(block);
    pendingTokens += block.tokens + (pending.length > 1 ? 2 : 0);
  }
  emit();

  return chunks;
}
