export { FactStore, factIdentity } from './fact-store.js';
export type { FactChangeType, FactChangeEvent, FactChangeListener, FactStoreConfig, FactPredicate } from './fact-store.js';
export { RuleLibrary } from './rule-library.js';
export type { RuleLibraryOptions } from './rule-library.js';
export { Matcher, findActivations, referencedKinds, unify } from './matcher.js';
export { ConflictResolver, compareActivations } from './conflict-resolver.js';
export { collectConclusions } from './conclusion-collector.js';
export { InferenceSession } from './session.js';
export { InferenceEngine } from './inference-engine.js';
export {
  InferenceError,
  DuplicateFactError,
  InvalidFactError,
  UnknownFactError,
  CycleLimitExceededError,
  SessionStateError,
  SessionAbortedError
} from './errors.js';
