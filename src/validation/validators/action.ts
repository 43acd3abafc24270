/**
 * Action validation.
 *
 * @module
 */

import type { ActionValue, RuleAction } from '../../types/action.js';
import { ACTION_TYPES } from '../constants.js';
import type { IssueCollector, VariableScope } from '../types.js';
import { hasProperty, isAttributeValue, isObject } from '../types.js';
import { templateVariables } from '../../utils/interpolation.js';
import { validateName } from './condition.js';

export function validateActions(
  actions: unknown,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleAction[] | undefined {
  if (!Array.isArray(actions)) {
    collector.addError(path, 'Actions must be an array');
    return undefined;
  }

  if (actions.length === 0) {
    collector.addWarning(path, 'Rule has no actions');
  }

  const result: RuleAction[] = [];
  let valid = true;

  for (let i = 0; i < actions.length; i++) {
    const action = validateAction(actions[i], `${path}[${i}]`, collector, scope);
    if (action) {
      result.push(action);
    } else {
      valid = false;
    }
  }

  return valid ? result : undefined;
}

export function validateAction(
  action: unknown,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleAction | undefined {
  if (!isObject(action)) {
    collector.addError(path, 'Action must be an object');
    return undefined;
  }

  if (!hasProperty(action, 'type')) {
    collector.addError(`${path}.type`, 'Action must have a "type" field');
    return undefined;
  }

  const type = action['type'];
  if (typeof type !== 'string') {
    collector.addError(`${path}.type`, 'Action type must be a string');
    return undefined;
  }

  switch (type) {
    case 'assert':
      return validateAssertAction(action, path, collector, scope);
    case 'retract':
      return validateRetractAction(action, path, collector, scope);
    default:
      collector.addError(
        `${path}.type`,
        `Invalid action type: ${type}. Valid types: ${ACTION_TYPES.join(', ')}`,
      );
      return undefined;
  }
}

function validateAssertAction(
  action: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleAction | undefined {
  const kind = action['kind'];
  let valid = true;

  if (typeof kind !== 'string' || kind.trim() === '') {
    collector.addError(`${path}.kind`, 'Assert action must have a non-empty "kind"');
    valid = false;
  }

  const attributes = action['attributes'] ?? {};
  if (!isObject(attributes)) {
    collector.addError(`${path}.attributes`, 'Attributes must be an object');
    return undefined;
  }

  const built: Record<string, ActionValue> = {};
  for (const [name, value] of Object.entries(attributes)) {
    const resolved = validateActionValue(value, `${path}.attributes.${name}`, collector, scope);
    if (resolved === undefined) {
      valid = false;
    } else {
      built[name] = resolved;
    }
  }

  if (!valid || typeof kind !== 'string') return undefined;
  return { type: 'assert', kind, attributes: built };
}

function validateRetractAction(
  action: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): RuleAction | undefined {
  const fact = validateName(action['fact'], `${path}.fact`, collector);
  if (fact === undefined) return undefined;

  if (!scope.facts.has(fact)) {
    collector.addError(`${path}.fact`, `Fact binding "${fact}" is not bound by any condition`);
    return undefined;
  }

  return { type: 'retract', fact };
}

function validateActionValue(
  value: unknown,
  path: string,
  collector: IssueCollector,
  scope: VariableScope,
): ActionValue | undefined {
  if (isObject(value) && hasProperty(value, 'var')) {
    const name = value['var'];
    if (typeof name !== 'string' || !scope.variables.has(name)) {
      collector.addError(`${path}.var`, `Variable "${String(name)}" is not bound by any condition`);
      return undefined;
    }
    collector.usedVariables.add(name);
    return { var: name };
  }

  if (!isAttributeValue(value)) {
    collector.addError(path, 'Value must be a literal, a list of literals or a { var } reference');
    return undefined;
  }

  const strings = Array.isArray(value) ? value.filter((item) => typeof item === 'string') : [value];
  for (const item of strings) {
    if (typeof item !== 'string') continue;
    for (const name of templateVariables(item)) {
      if (!scope.variables.has(name)) {
        collector.addError(path, `Placeholder "\${${name}}" refers to a variable not bound by any condition`);
        return undefined;
      }
      collector.usedVariables.add(name);
    }
  }

  return value;
}
