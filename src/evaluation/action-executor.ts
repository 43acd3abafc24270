import type { RuleAction, ActionResult } from '../types/action.js';
import type { Activation } from '../types/activation.js';
import type { FactStore } from '../core/fact-store.js';
import { DuplicateFactError, UnknownFactError } from '../core/errors.js';
import { resolveAttributes } from '../utils/interpolation.js';

/** Informace o dokončené akci pro tracing */
export interface ActionCompletedInfo {
  actionIndex: number;
  actionType: RuleAction['type'];
  factId: number;
}

/** Informace o přeskočené akci pro tracing */
export interface ActionSkippedInfo {
  actionIndex: number;
  actionType: RuleAction['type'];
  error: DuplicateFactError | UnknownFactError;
}

/** Options for action execution with optional tracing callbacks */
export interface ExecutionOptions {
  /** Callback invoked when an action changes the fact store */
  onActionCompleted?: (info: ActionCompletedInfo) => void;

  /** Callback invoked when an action is skipped with a recoverable error */
  onActionSkipped?: (info: ActionSkippedInfo) => void;
}

/**
 * Spouštění akcí vystřelené aktivace.
 *
 * Akce běží v deklarovaném pořadí a best-effort: duplicitní assert
 * nebo retract už odebraného faktu se zaznamená jako přeskočená akce
 * a zbývající akce se provedou. Vystřelení není transakční.
 */
export class ActionExecutor {
  constructor(private readonly factStore: FactStore) {}

  /**
   * Spustí všechny akce aktivace.
   */
  execute(activation: Activation, options?: ExecutionOptions): ActionResult[] {
    const results: ActionResult[] = [];
    const actions = activation.rule.actions;

    for (let i = 0; i < actions.length; i++) {
      const action = actions[i];
      if (!action) continue;

      try {
        const factId = this.executeAction(action, activation);
        options?.onActionCompleted?.({ actionIndex: i, actionType: action.type, factId });
        results.push({ action, success: true, factId });
      } catch (error) {
        if (!(error instanceof DuplicateFactError || error instanceof UnknownFactError)) {
          throw error;
        }
        options?.onActionSkipped?.({ actionIndex: i, actionType: action.type, error });
        results.push({
          action,
          success: false,
          skipped: true,
          factId: error instanceof DuplicateFactError ? error.existingId : error.factId,
          error: error.message
        });
      }
    }

    return results;
  }

  private executeAction(action: RuleAction, activation: Activation): number {
    switch (action.type) {
      case 'assert':
        return this.factStore.assert(action.kind, resolveAttributes(action.attributes, activation.bindings));

      case 'retract': {
        const factId = activation.factBindings[action.fact];
        if (factId === undefined) {
          // Knihovna tohle odmítne při načtení
          throw new Error(`Fact binding "${action.fact}" is not bound in rule "${activation.rule.name}"`);
        }
        return this.factStore.retract(factId).id;
      }
    }
  }
}
