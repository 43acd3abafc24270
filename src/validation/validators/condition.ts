/**
 * Condition validation.
 *
 * Validates the ordered condition list of one rule and builds its typed form.
 * Variables are tracked in a {@link VariableScope}: a variable must be bound
 * by an earlier condition (or earlier in the same pattern) before it is
 * compared against.
 *
 * @module
 */

import type {
  AttributeTest,
  ConstraintOperator,
  Operand,
  RuleCondition,
} from '../../types/condition.js';
import {
  CONDITION_OPERATORS,
  CONDITION_TYPES,
  LIST_OPERATORS,
  UNARY_OPERATORS,
  VARIABLE_NAME_RE,
} from '../constants.js';
import type { IssueCollector, VariableScope } from '../types.js';
import { cloneScope, hasProperty, isAttributeValue, isObject } from '../types.js';

export function validateConditions(
  conditions: unknown,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleCondition[] | undefined {
  if (!Array.isArray(conditions)) {
    collector.addError(path, 'Conditions must be an array');
    return undefined;
  }

  const result: RuleCondition[] = [];
  let valid = true;

  for (let i = 0; i < conditions.length; i++) {
    const condition = validateCondition(conditions[i], `${path}[${i}]`, collector, scope);
    if (condition) {
      result.push(condition);
    } else {
      valid = false;
    }
  }

  return valid ? result : undefined;
}

export function validateCondition(
  condition: unknown,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleCondition | undefined {
  if (!isObject(condition)) {
    collector.addError(path, 'Condition must be an object');
    return undefined;
  }

  const type = condition['type'] ?? 'pattern';
  if (typeof type !== 'string' || !(CONDITION_TYPES as readonly string[]).includes(type)) {
    collector.addError(
      `${path}.type`,
      `Invalid condition type: ${String(type)}. Valid types: ${CONDITION_TYPES.join(', ')}`,
    );
    return undefined;
  }

  switch (type) {
    case 'pattern':
      return validatePattern(condition, path, collector, scope);
    case 'not':
      return validateNot(condition, path, collector, scope);
    case 'test':
      return validateTest(condition, path, collector, scope);
    default:
      return validateAny(condition, path, collector, scope);
  }
}

// ---------------------------------------------------------------------------
// Condition types
// ---------------------------------------------------------------------------

function validatePattern(
  condition: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleCondition | undefined {
  const kind = validateKind(condition, path, collector);
  const attributes = validateAttributeTests(condition['attributes'], `${path}.attributes`, collector, scope);

  let as: string | undefined;
  if (hasProperty(condition, 'as')) {
    const name = validateName(condition['as'], `${path}.as`, collector);
    if (name !== undefined) {
      if (scope.facts.has(name)) {
        collector.addError(`${path}.as`, `Fact binding "${name}" is already defined`);
        return undefined;
      }
      scope.facts.add(name);
      as = name;
    }
  }

  if (kind === undefined || attributes === undefined) return undefined;
  if (hasProperty(condition, 'as') && as === undefined) return undefined;

  return {
    type: 'pattern',
    kind,
    attributes,
    ...(as !== undefined && { as }),
  };
}

function validateNot(
  condition: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleCondition | undefined {
  const kind = validateKind(condition, path, collector);
  // Variables first seen inside a negation stay local to it
  const local = cloneScope(scope);
  const attributes = validateAttributeTests(condition['attributes'], `${path}.attributes`, collector, local);

  if (hasProperty(condition, 'as')) {
    collector.addError(`${path}.as`, 'A negated condition cannot bind a fact');
    return undefined;
  }

  if (kind === undefined || attributes === undefined) return undefined;
  return { type: 'not', kind, attributes };
}

function validateTest(
  condition: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleCondition | undefined {
  const operator = validateOperator(condition['operator'], `${path}.operator`, collector);

  if (!hasProperty(condition, 'left')) {
    collector.addError(`${path}.left`, 'Test condition must have a "left" operand');
    return undefined;
  }
  const left = validateOperand(condition['left'], `${path}.left`, collector, scope);

  const unary = operator !== undefined && (UNARY_OPERATORS as readonly string[]).includes(operator);
  let right: Operand | undefined;
  if (hasProperty(condition, 'right')) {
    right = validateOperand(condition['right'], `${path}.right`, collector, scope);
    if (right === undefined) return undefined;
  } else if (!unary) {
    collector.addError(`${path}.right`, 'Test condition must have a "right" operand');
    return undefined;
  }

  if (operator === undefined || left === undefined) return undefined;
  return {
    type: 'test',
    left,
    operator,
    ...(right !== undefined && { right }),
  };
}

function validateAny(
  condition: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleCondition | undefined {
  const branches = condition['branches'];
  if (!Array.isArray(branches) || branches.length === 0) {
    collector.addError(`${path}.branches`, 'Branches must be a non-empty array of condition lists');
    return undefined;
  }

  const built: RuleCondition[][] = [];
  const branchScopes: VariableScope[] = [];
  let valid = true;

  for (let i = 0; i < branches.length; i++) {
    const branchScope = cloneScope(scope);
    const branch = validateConditions(branches[i], `${path}.branches[${i}]`, collector, branchScope);
    if (branch === undefined) {
      valid = false;
      continue;
    }
    built.push(branch);
    branchScopes.push(branchScope);
  }

  // Only names bound in every branch are visible after the disjunction
  const [first, ...rest] = branchScopes;
  if (first) {
    for (const name of first.variables) {
      if (rest.every((s) => s.variables.has(name))) scope.variables.add(name);
    }
    for (const name of first.facts) {
      if (rest.every((s) => s.facts.has(name))) scope.facts.add(name);
    }
  }

  return valid ? { type: 'any', branches: built } : undefined;
}

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

function validateKind(
  condition: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
): string | undefined {
  const kind = condition['kind'];
  if (kind === undefined) {
    collector.addError(`${path}.kind`, 'Condition must have a "kind" field');
    return undefined;
  }
  if (typeof kind !== 'string' || kind.trim() === '') {
    collector.addError(`${path}.kind`, 'Condition kind must be a non-empty string');
    return undefined;
  }
  return kind;
}

/**
 * Validates attribute tests of a pattern.
 *
 * Newly bound variables go to `scope`; for a negation that is a local copy.
 */
function validateAttributeTests(
  value: unknown,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): Record<string, AttributeTest> | undefined {
  if (value === undefined) return {};
  if (!isObject(value)) {
    collector.addError(path, 'Attributes must be an object');
    return undefined;
  }

  const result: Record<string, AttributeTest> = {};
  let valid = true;

  for (const [attribute, test] of Object.entries(value)) {
    const built = validateAttributeTest(test, `${path}.${attribute}`, collector, scope);
    if (built === undefined) {
      valid = false;
    } else {
      result[attribute] = built;
    }
  }

  return valid ? result : undefined;
}

function validateAttributeTest(
  test: unknown,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): AttributeTest | undefined {
  if (isAttributeValue(test)) {
    return test;
  }

  if (!isObject(test)) {
    collector.addError(path, 'Attribute test must be a literal, a { var } reference or an operator test');
    return undefined;
  }

  if (hasProperty(test, 'var')) {
    const name = validateName(test['var'], `${path}.var`, collector);
    if (name === undefined) return undefined;
    if (scope.variables.has(name)) {
      collector.usedVariables.add(name);
    } else {
      scope.variables.add(name);
      collector.boundVariables.add(name);
    }
    return { var: name };
  }

  if (!hasProperty(test, 'operator')) {
    collector.addError(path, 'Attribute test must be a literal, a { var } reference or an operator test');
    return undefined;
  }

  const operator = validateOperator(test['operator'], `${path}.operator`, collector);
  if (operator === undefined) return undefined;

  const unary = (UNARY_OPERATORS as readonly string[]).includes(operator);
  let compareValue: Operand | undefined;
  if (hasProperty(test, 'value')) {
    compareValue = validateOperand(test['value'], `${path}.value`, collector, scope);
    if (compareValue === undefined) return undefined;
    if (!validateOperatorValue(operator, compareValue, `${path}.value`, collector)) return undefined;
  } else if (!unary) {
    collector.addError(`${path}.value`, `Operator "${operator}" requires a "value"`);
    return undefined;
  }

  let bind: string | undefined;
  if (hasProperty(test, 'bind')) {
    bind = validateName(test['bind'], `${path}.bind`, collector);
    if (bind === undefined) return undefined;
    if (scope.variables.has(bind)) {
      collector.usedVariables.add(bind);
    } else {
      scope.variables.add(bind);
      collector.boundVariables.add(bind);
    }
  }

  return {
    operator,
    ...(compareValue !== undefined && { value: compareValue }),
    ...(bind !== undefined && { bind }),
  };
}

function validateOperator(
  operator: unknown,
  path: string,
  collector: IssueCollector,
): ConstraintOperator | undefined {
  if (typeof operator !== 'string') {
    collector.addError(path, 'Operator must be a string');
    return undefined;
  }
  const match = CONDITION_OPERATORS.find((op) => op === operator);
  if (match === undefined) {
    collector.addError(
      path,
      `Invalid operator: ${operator}. Valid operators: ${CONDITION_OPERATORS.join(', ')}`,
    );
  }
  return match;
}

function validateOperatorValue(
  operator: ConstraintOperator,
  value: Operand,
  path: string,
  collector: IssueCollector,
): boolean {
  if (isObject(value)) {
    // Variable reference - checked at match time
    return true;
  }

  if ((LIST_OPERATORS as readonly string[]).includes(operator) && !Array.isArray(value)) {
    collector.addError(path, `Operator "${operator}" requires an array value`);
    return false;
  }

  if (operator === 'matches') {
    if (typeof value !== 'string') {
      collector.addError(path, 'Operator "matches" requires a string pattern');
      return false;
    }
    try {
      new RegExp(value);
    } catch {
      collector.addError(path, `Invalid regular expression: ${value}`);
      return false;
    }
  }

  return true;
}

/**
 * Validates an operand: a literal value or a `{ var }` reference to a bound variable.
 */
export function validateOperand(
  operand: unknown,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): Operand | undefined {
  if (isAttributeValue(operand)) {
    return operand;
  }

  if (isObject(operand) && hasProperty(operand, 'var')) {
    const name = validateName(operand['var'], `${path}.var`, collector);
    if (name === undefined) return undefined;
    if (!scope.variables.has(name)) {
      collector.addError(`${path}.var`, `Variable "${name}" is used before it is bound`);
      return undefined;
    }
    collector.usedVariables.add(name);
    return { var: name };
  }

  collector.addError(path, 'Operand must be a literal value or a { var } reference');
  return undefined;
}

export function validateName(value: unknown, path: string, collector: IssueCollector): string | undefined {
  if (typeof value !== 'string' || !VARIABLE_NAME_RE.test(value)) {
    collector.addError(path, 'Name must be an identifier (letters, digits, "_" or "-", not starting with a digit)');
    return undefined;
  }
  return value;
}
