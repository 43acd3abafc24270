export { advise, loadDefaultRuleLibrary, DEFAULT_RULES_PATH } from './advise.js';
export { toObservations } from './observations.js';
export { SYMPTOM_FLAGS, PEST_FLAGS } from './types.js';
export type { AdvisoryInput, AdviseOptions, AdvisoryResult, CropStage, SymptomFlag, PestFlag } from './types.js';
