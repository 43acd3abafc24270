import type { RuleCondition } from './condition.js';
import type { RuleAction } from './action.js';

/** Pravidlo knihovny - po načtení neměnné */
export interface Rule {
  readonly name: string;             // Unikátní v knihovně, tie-break
  readonly description?: string;
  readonly priority: number;         // Vyšší = dříve
  readonly tags: readonly string[];

  // Podmínky (všechny musí platit)
  readonly conditions: readonly RuleCondition[];

  // Akce při vystřelení
  readonly actions: readonly RuleAction[];
}

/** Pravidlo tak, jak přichází z konfigurace */
export interface RuleInput {
  name: string;
  description?: string;
  priority?: number;
  tags?: string[];
  conditions: RuleCondition[];
  actions: RuleAction[];
}

/** Definice celé knihovny pravidel */
export interface RuleLibraryDefinition {
  /** Druhy faktů, které jsou výstupem (diagnosis, recommendation, ...) */
  outputKinds: string[];
  rules: RuleInput[];
}
