import type { AttributeValue } from './fact.js';
import type { VariableRef } from './condition.js';

/**
 * Hodnota v akci: literál, reference na proměnnou, nebo string
 * s placeholdery `${name}`.
 */
export type ActionValue = AttributeValue | VariableRef;

/** Akce pravidla */
export type RuleAction =
  | { type: 'assert'; kind: string; attributes: Readonly<Record<string, ActionValue>> }
  | { type: 'retract'; fact: string };

/** Výsledek akce */
export interface ActionResult {
  action: RuleAction;
  success: boolean;
  skipped?: boolean;        // Zotavitelná chyba (duplicitní / neznámý fakt)
  factId?: number;
  error?: string;
}
