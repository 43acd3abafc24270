import type { Conclusion } from '../types/fact.js';
import type { InferenceEngineConfig } from '../types/index.js';
import type { RuleLibrary } from '../core/rule-library.js';

export type CropStage = 'vegetative' | 'flowering' | 'fruiting';

export const SYMPTOM_FLAGS = [
  'leafSpots',
  'yellowing',
  'wilting',
  'stemLesions',
  'mosaic',
  'powderyWhite',
  'blackSooty',
] as const;

export type SymptomFlag = (typeof SYMPTOM_FLAGS)[number];

export const PEST_FLAGS = ['aphids', 'mites', 'caterpillars', 'whiteflies'] as const;

export type PestFlag = (typeof PEST_FLAGS)[number];

/**
 * Strukturované pozorování jednoho pole. Chybějící sekce se do session
 * nevkládají, chybějící příznaky a škůdci se berou jako `false`.
 */
export interface AdvisoryInput {
  crop?: { name: string; stage: CropStage };
  soil?: { type: string; moisture: string; ph: number };
  lab?: { n: number; p: number; k: number; ph?: number };
  symptoms?: Partial<Record<SymptomFlag, boolean>>;
  weather?: { temp: number; humidity: number; recentRainDays: number };
  pests?: Partial<Record<PestFlag, boolean>>;
}

export interface AdviseOptions {
  /** Knihovna pravidel, výchozí je vestavěná `rules/crop-advisory.yaml` */
  library?: RuleLibrary;
  engine?: InferenceEngineConfig;
  signal?: AbortSignal;
}

export interface AdvisoryResult {
  diagnoses: Conclusion[];
  recommendations: Conclusion[];
  /** Všechny závěry v pořadí vložení */
  conclusions: Conclusion[];
}
