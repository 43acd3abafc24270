import { fileURLToPath } from 'node:url';
import { InferenceEngine } from '../core/inference-engine.js';
import type { RuleLibrary } from '../core/rule-library.js';
import { loadRuleLibraryFromFile } from '../dsl/yaml/loader.js';
import { toObservations } from './observations.js';
import type { AdviseOptions, AdvisoryInput, AdvisoryResult } from './types.js';

/** Cesta k vestavěné knihovně pravidel (platí pro `src/` i `dist/`). */
export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../rules/crop-advisory.yaml', import.meta.url));

/**
 * Načte vestavěnou knihovnu pravidel pro poradenství k plodinám.
 */
export async function loadDefaultRuleLibrary(): Promise<RuleLibrary> {
  return loadRuleLibraryFromFile(DEFAULT_RULES_PATH);
}

/**
 * Jednorázové poradenství: založí session, vloží pozorování, spustí
 * inferenci a rozdělí závěry na diagnózy a doporučení.
 */
export async function advise(input: AdvisoryInput, options: AdviseOptions = {}): Promise<AdvisoryResult> {
  const library = options.library ?? (await loadDefaultRuleLibrary());
  const engine = await InferenceEngine.start(library, options.engine);
  const session = engine.startSession();

  try {
    for (const observation of toObservations(input)) {
      engine.assertObservation(session, observation.kind, observation.attributes);
    }

    const conclusions = await engine.run(session, options.signal ? { signal: options.signal } : {});

    return {
      diagnoses: conclusions.filter((c) => c.kind === 'diagnosis'),
      recommendations: conclusions.filter((c) => c.kind === 'recommendation'),
      conclusions
    };
  } finally {
    engine.endSession(session);
  }
}
