import type { Conclusion } from '../types/fact.js';
import type { FactStore } from './fact-store.js';

/**
 * Vybere ze store živé fakty výstupních druhů v pořadí vložení.
 *
 * Duplicity nevzniknou - store identické fakty odmítá. Store se nemění.
 */
export function collectConclusions(store: FactStore, outputKinds: Iterable<string>): Conclusion[] {
  const kinds = new Set(outputKinds);
  const conclusions: Conclusion[] = [];

  for (const fact of store.getAll()) {
    if (!kinds.has(fact.kind)) continue;
    conclusions.push(
      Object.freeze({
        id: fact.id,
        kind: fact.kind,
        attributes: fact.attributes
      })
    );
  }

  return conclusions;
}
