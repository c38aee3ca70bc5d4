export {
  ConflictResolver,
  type ConflictCandidate,
  type ConflictDecision,
  type IncomingItem,
  type MergedContent,
} from "./resolver.js";
export { profileText, jaccard, findContradiction, type TextProfile, type Contradiction, type ValueKind } from "./signals.js";
