/**
 * Validation types and internal utilities.
 *
 * @module
 */

import type { AttributeValue, Scalar } from '../types/fact.js';

/** Single validation issue (error or warning). */
export interface ValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}

/** Result of a validation run. */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Internal helper for accumulating validation issues.
 *
 * Sub-validators receive an instance and call {@link addError}/{@link addWarning}.
 * Variable tracking (`boundVariables` / `usedVariables`) is filled by the
 * condition and action validators so the orchestrator can detect variables
 * that are bound but never read.
 */
export class IssueCollector {
  private readonly _errors: ValidationIssue[] = [];
  private readonly _warnings: ValidationIssue[] = [];

  readonly boundVariables = new Set<string>();
  readonly usedVariables = new Set<string>();

  addError(path: string, message: string): void {
    this._errors.push({ path: path || '(root)', message, severity: 'error' });
  }

  addWarning(path: string, message: string): void {
    this._warnings.push({ path: path || '(root)', message, severity: 'warning' });
  }

  get errorCount(): number {
    return this._errors.length;
  }

  clearVariables(): void {
    this.boundVariables.clear();
    this.usedVariables.clear();
  }

  toResult(): ValidationResult {
    return {
      valid: this._errors.length === 0,
      errors: [...this._errors],
      warnings: [...this._warnings],
    };
  }
}

/**
 * Names visible at a point of a rule's condition list.
 *
 * Conditions are evaluated in order, so a variable is usable only after the
 * condition that binds it.
 */
export interface VariableScope {
  variables: Set<string>;
  facts: Set<string>;
}

export function cloneScope(scope: VariableScope): VariableScope {
  return { variables: new Set(scope.variables), facts: new Set(scope.facts) };
}

/** Type guard: value is a non-null, non-array object. */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Checks whether `obj` has a given property (non-null, non-array object check included). */
export function hasProperty(obj: unknown, prop: string): boolean {
  return isObject(obj) && prop in obj;
}

/** Type guard: string, finite number, boolean or null. */
export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/** Type guard: scalar or array of scalars. */
export function isAttributeValue(value: unknown): value is AttributeValue {
  return isScalar(value) || (Array.isArray(value) && value.every(isScalar));
}
