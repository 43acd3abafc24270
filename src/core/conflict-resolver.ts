import type { Activation } from '../types/activation.js';

/**
 * Porovná dvě aktivace podle pořadí vystřelení (záporné = `a` dříve).
 *
 * 1. vyšší priorita pravidla
 * 2. menší nejvyšší id vázaného faktu (starší pozorování mají přednost)
 * 3. jméno pravidla vzestupně
 * 4. id vázaných faktů lexikograficky, nakonec klíč aktivace
 */
export function compareActivations(a: Activation, b: Activation): number {
  if (a.rule.priority !== b.rule.priority) {
    return b.rule.priority - a.rule.priority;
  }

  if (a.recency !== b.recency) {
    return a.recency - b.recency;
  }

  if (a.rule.name !== b.rule.name) {
    return a.rule.name < b.rule.name ? -1 : 1;
  }

  const length = Math.min(a.facts.length, b.facts.length);
  for (let i = 0; i < length; i++) {
    const diff = (a.facts[i]?.id ?? 0) - (b.facts[i]?.id ?? 0);
    if (diff !== 0) return diff;
  }
  if (a.facts.length !== b.facts.length) {
    return a.facts.length - b.facts.length;
  }

  if (a.key === b.key) return 0;
  return a.key < b.key ? -1 : 1;
}

/**
 * Výběr jedné aktivace z množiny kandidátů.
 *
 * Deterministické - pro stejné kandidáty vždy stejný výsledek
 * nezávisle na jejich pořadí na vstupu.
 */
export class ConflictResolver {
  /**
   * Vybere aktivaci, která vystřelí jako další.
   */
  select(candidates: readonly Activation[]): Activation | undefined {
    let selected: Activation | undefined;
    for (const candidate of candidates) {
      if (selected === undefined || compareActivations(candidate, selected) < 0) {
        selected = candidate;
      }
    }
    return selected;
  }

  /**
   * Seřadí kandidáty do agendy (pořadí, v jakém by vystřelily bez dalších změn).
   */
  agenda(candidates: readonly Activation[]): Activation[] {
    return [...candidates].sort(compareActivations);
  }
}
