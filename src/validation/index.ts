/**
 * Rule library validation module.
 *
 * @module
 */

// Types
export type { ValidationIssue, ValidationResult, VariableScope } from './types.js';

// Constants
export {
  CONDITION_TYPES,
  CONDITION_OPERATORS,
  UNARY_OPERATORS,
  ACTION_TYPES,
} from './constants.js';
export type {
  ConditionType,
  ConditionOperator,
  UnaryOperator,
  ActionType,
} from './constants.js';

// Validator
export { RuleLibraryValidator } from './rule-validator.js';
export type { ValidatorOptions, ParsedRuleLibrary } from './rule-validator.js';

// Error
export { RuleLibraryError } from './rule-library-error.js';
