/**
 * Shared validation constants.
 *
 * Single source of truth for allowed condition types, operators and action
 * types.  Used by the rule library validator and the YAML loader.
 *
 * @module
 */

export const CONDITION_TYPES = ['pattern', 'not', 'test', 'any'] as const;
export type ConditionType = (typeof CONDITION_TYPES)[number];

export const CONDITION_OPERATORS = [
  'eq', 'neq', 'gt', 'gte', 'lt', 'lte',
  'in', 'not_in', 'contains', 'not_contains',
  'matches', 'exists', 'not_exists',
] as const;
export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

export const UNARY_OPERATORS = ['exists', 'not_exists'] as const;
export type UnaryOperator = (typeof UNARY_OPERATORS)[number];

export const LIST_OPERATORS = ['in', 'not_in'] as const;

export const ACTION_TYPES = ['assert', 'retract'] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

/** Variable and fact-binding names: identifier-like. */
export const VARIABLE_NAME_RE = /^[A-Za-z_][A-Za-z0-9_-]*$/;
