export {
  InputClassifier,
  UNMATCHED_CONFIDENCE,
  type Classification,
  type ClassificationSource,
  type IntentClassification,
  type InputClassifierOptions,
} from "./input-classifier.js";
export { compileRules, loadRules, type RuleTables, type RuleFile, type NamedRule } from "./rules.js";
export { INTENT_ROUTES, CATEGORY_PRIORITY, INTENT_PRIORITY, routeIntent } from "./routing.js";
export { LruCache } from "./lru-cache.js";
