import type { ConflictConfig } from "../config/schema.js";
import type { Category, MemoryItem, MemoryMetadata } from "../types/memory.js";
import { cosineSimilarity } from "../vectors/index.js";
import { findContradiction, jaccard, profileText, type Contradiction } from "./signals.js";
import { debug } from "../utils/logger.js";

/** The parts of a not-yet-stored item the resolver looks at. */
export interface IncomingItem {
  userId: string;
  category: Category;
  content: string;
  embedding: number[] | null;
}

export interface ConflictCandidate {
  item: MemoryItem;
  similarity: number;
}

export type ConflictDecision =
  | { action: "insert_new"; confidence: number; reason: string }
  | { action: "merge_into"; targetId: string; confidence: number; reason: string }
  | { action: "supersede"; targetId: string; confidence: number; reason: string; contradiction: Contradiction };

export interface MergedContent {
  content: string;
  metadata: MemoryMetadata;
}

function describeContradiction(contradiction: Contradiction): string {
  if (contradiction.kind === "negation") {
    return `negation changed (${contradiction.before[0]} -> ${contradiction.after[0]})`;
  }
  return `${contradiction.kind} changed (${contradiction.before.join(", ")} -> ${contradiction.after.join(", ")})`;
}

function mergedFromList(metadata: MemoryMetadata): unknown[] {
  const existing = metadata.mergedFrom;
  return Array.isArray(existing) ? existing : [];
}

/**
 * Decides whether a new item duplicates, contradicts, or is independent of
 * the active items already in its partition. Pure: it never touches storage.
 */
export class ConflictResolver {
  constructor(private readonly config: ConflictConfig) {}

  /**
   * Partition items similar enough to be compared, best match first. An
   * item's similarity is the larger of embedding cosine and subject overlap.
   */
  findCandidates(incoming: IncomingItem, partitionItems: readonly MemoryItem[]): ConflictCandidate[] {
    const subject = profileText(incoming.content).subject;

    return partitionItems
      .filter(
        (item) =>
          item.status === "active" && item.userId === incoming.userId && item.category === incoming.category
      )
      .map((item) => {
        const cosine =
          incoming.embedding && item.embedding ? cosineSimilarity(incoming.embedding, item.embedding) : 0;
        const overlap = jaccard(subject, profileText(item.content).subject);
        return { item, similarity: Math.max(cosine, overlap) };
      })
      .filter((candidate) => candidate.similarity >= this.config.candidateThreshold)
      .sort(
        (a, b) =>
          b.similarity - a.similarity ||
          b.item.createdAt.localeCompare(a.item.createdAt) ||
          a.item.id.localeCompare(b.item.id)
      );
  }

  resolve(incoming: IncomingItem, candidates: readonly ConflictCandidate[]): ConflictDecision {
    if (candidates.length === 0) {
      return { action: "insert_new", confidence: 1, reason: "no similar items in partition" };
    }

    const profile = profileText(incoming.content);
    let strongestSignal = 0;

    for (const candidate of candidates) {
      const existing = profileText(candidate.item.content);
      const subjectOverlap = jaccard(existing.subject, profile.subject);
      const tokenOverlap = jaccard(existing.tokens, profile.tokens);
      const contradiction = findContradiction(existing, profile);
      strongestSignal = Math.max(strongestSignal, subjectOverlap, tokenOverlap);

      debug(
        () =>
          `[Conflict] ${candidate.item.id}: similarity=${candidate.similarity.toFixed(2)} subject=${subjectOverlap.toFixed(2)} tokens=${tokenOverlap.toFixed(2)} contradiction=${contradiction ? contradiction.kind : "none"}`
      );

      if (contradiction && subjectOverlap >= this.config.subjectThreshold) {
        return {
          action: "supersede",
          targetId: candidate.item.id,
          confidence: subjectOverlap,
          reason: describeContradiction(contradiction),
          contradiction,
        };
      }

      if (!contradiction && tokenOverlap >= this.config.mergeThreshold) {
        return {
          action: "merge_into",
          targetId: candidate.item.id,
          confidence: tokenOverlap,
          reason: `near duplicate (token overlap ${tokenOverlap.toFixed(2)})`,
        };
      }
    }

    if (strongestSignal >= this.config.ambiguityFloor) {
      return {
        action: "insert_new",
        confidence: 1 - strongestSignal,
        reason: `ambiguous overlap ${strongestSignal.toFixed(2)}, keeping both`,
      };
    }
    return { action: "insert_new", confidence: 1 - strongestSignal, reason: "no duplicate or contradiction" };
  }

  /**
   * Combines an incoming item into an existing one. The result contains both
   * texts; existing metadata keys win over incoming ones.
   */
  merge(existing: MemoryItem, incoming: { id: string; content: string; metadata: MemoryMetadata }): MergedContent {
    let content: string;
    if (existing.content.includes(incoming.content)) {
      content = existing.content;
    } else if (incoming.content.includes(existing.content)) {
      content = incoming.content;
    } else {
      content = `${existing.content}\n${incoming.content}`;
    }

    const { mergedFrom: _ignored, ...incomingRest } = incoming.metadata;
    const metadata: MemoryMetadata = {
      ...incomingRest,
      ...existing.metadata,
      mergedFrom: [...mergedFromList(existing.metadata), incoming.id],
    };

    return { content, metadata };
  }
}
