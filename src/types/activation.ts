import type { AttributeValue, Fact } from './fact.js';
import type { Rule } from './rule.js';

/** Vazby proměnných aktivace */
export type Bindings = Readonly<Record<string, AttributeValue>>;

/** Aktivace - pravidlo s konkrétní vazbou, která aktuálně splňuje podmínky */
export interface Activation {
  readonly rule: Rule;
  readonly bindings: Bindings;
  readonly facts: readonly Fact[];                         // Fakty pozitivních vzorů v pořadí podmínek
  readonly factBindings: Readonly<Record<string, number>>; // `as` jméno → id faktu
  readonly branches: readonly number[];                    // Cesta větvemi `any` podmínek
  readonly key: string;
  readonly recency: number;                                // Nejvyšší id vázaného faktu (0 = žádný)
}

/** Záznam o vystřelení aktivace */
export interface FiringRecord {
  cycle: number;
  ruleName: string;
  priority: number;
  factIds: number[];
  bindings: Bindings;
  assertedIds: number[];
  retractedIds: number[];
  skipped: number;
}
