/**
 * Rule library validator.
 *
 * Validates a whole library definition and returns all issues (errors +
 * warnings) rather than stopping at the first problem.  {@link parse} also
 * builds the typed definition, so configuration read from YAML or JSON never
 * needs to be cast.
 *
 * @module
 */

import type { RuleInput, RuleLibraryDefinition } from '../types/rule.js';
import type { RuleAction } from '../types/action.js';
import type { RuleCondition } from '../types/condition.js';
import { IssueCollector, isObject, hasProperty } from './types.js';
import type { ValidationIssue, ValidationResult, VariableScope } from './types.js';
import { validateConditions } from './validators/condition.js';
import { validateActions } from './validators/action.js';
import { RuleLibraryError } from './rule-library-error.js';

/** Options for {@link RuleLibraryValidator}. */
export interface ValidatorOptions {
  /** When true, reports variables that are bound but never used as warnings. */
  strict?: boolean;
}

type RuleRecord = Record<string, unknown>;

interface ParseOutcome {
  result: ValidationResult;
  definition: RuleLibraryDefinition | undefined;
}

/** A successfully parsed library with the warnings found on the way. */
export interface ParsedRuleLibrary {
  definition: RuleLibraryDefinition;
  warnings: ValidationIssue[];
}

/**
 * Validates rule library definitions against the expected schema.
 *
 * ```ts
 * const v = new RuleLibraryValidator();
 * const result = v.validate(unknownInput);
 * if (!result.valid) { … }
 * ```
 */
export class RuleLibraryValidator {
  private readonly strict: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.strict = options.strict ?? false;
  }

  /** Validates a library definition `{ outputKinds, rules }`. */
  validate(input: unknown): ValidationResult {
    return this.run(input).result;
  }

  /**
   * Validates and returns the typed definition.
   *
   * @throws {RuleLibraryError} When any error is found
   */
  parse(input: unknown): ParsedRuleLibrary {
    const { result, definition } = this.run(input);
    if (!result.valid || definition === undefined) {
      const first = result.errors[0];
      const summary = first ? `${first.path}: ${first.message}` : 'invalid input';
      const more = result.errors.length > 1 ? ` (and ${result.errors.length - 1} more)` : '';
      throw new RuleLibraryError(`Rule library is invalid: ${summary}${more}`, result.errors);
    }
    return { definition, warnings: result.warnings };
  }

  /** Validates one rule in isolation (no duplicate-name check). */
  validateRule(input: unknown): ValidationResult {
    const collector = new IssueCollector();
    if (!isObject(input)) {
      collector.addError('', 'Rule must be an object');
      return collector.toResult();
    }
    this.buildRule(input, '', collector);
    return collector.toResult();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private run(input: unknown): ParseOutcome {
    const collector = new IssueCollector();

    if (!isObject(input)) {
      collector.addError('', 'Rule library must be an object with "outputKinds" and "rules"');
      return { result: collector.toResult(), definition: undefined };
    }

    const outputKinds = this.buildOutputKinds(input, collector);
    const rules = this.buildRules(input, collector);

    if (outputKinds !== undefined && rules !== undefined) {
      this.checkOutputKindsAsserted(outputKinds, rules, collector);
    }

    const result = collector.toResult();
    const definition = result.valid && outputKinds !== undefined && rules !== undefined
      ? { outputKinds, rules }
      : undefined;

    return { result, definition };
  }

  private buildOutputKinds(input: RuleRecord, collector: IssueCollector): string[] | undefined {
    if (!hasProperty(input, 'outputKinds')) {
      collector.addError('outputKinds', 'Required field "outputKinds" is missing');
      return undefined;
    }

    const value = input['outputKinds'];
    if (!Array.isArray(value)) {
      collector.addError('outputKinds', 'Field "outputKinds" must be an array');
      return undefined;
    }
    if (value.length === 0) {
      collector.addError('outputKinds', 'Field "outputKinds" must name at least one fact kind');
      return undefined;
    }

    const kinds: string[] = [];
    let valid = true;
    for (let i = 0; i < value.length; i++) {
      const kind: unknown = value[i];
      if (typeof kind !== 'string' || kind.trim() === '') {
        collector.addError(`outputKinds[${i}]`, 'Output kind must be a non-empty string');
        valid = false;
      } else if (kinds.includes(kind)) {
        collector.addWarning(`outputKinds[${i}]`, `Output kind "${kind}" is listed twice`);
      } else {
        kinds.push(kind);
      }
    }
    return valid ? kinds : undefined;
  }

  private buildRules(input: RuleRecord, collector: IssueCollector): RuleInput[] | undefined {
    if (!hasProperty(input, 'rules')) {
      collector.addError('rules', 'Required field "rules" is missing');
      return undefined;
    }

    const rules = input['rules'];
    if (!Array.isArray(rules)) {
      collector.addError('rules', 'Field "rules" must be an array');
      return undefined;
    }
    if (rules.length === 0) {
      collector.addWarning('rules', 'Rule library contains no rules');
    }

    const names = new Set<string>();
    const built: RuleInput[] = [];
    let valid = true;

    for (let i = 0; i < rules.length; i++) {
      const rule: unknown = rules[i];
      const prefix = `rules[${i}]`;

      if (!isObject(rule)) {
        collector.addError(prefix, 'Rule must be an object');
        valid = false;
        continue;
      }

      const name = rule['name'];
      if (typeof name === 'string') {
        if (names.has(name)) {
          collector.addError(`${prefix}.name`, `Duplicate rule name: ${name}`);
          valid = false;
        } else {
          names.add(name);
        }
      }

      collector.clearVariables();
      const ruleInput = this.buildRule(rule, prefix, collector);
      if (ruleInput === undefined) {
        valid = false;
      } else {
        built.push(ruleInput);
      }
    }

    return valid ? built : undefined;
  }

  private buildRule(rule: RuleRecord, prefix: string, collector: IssueCollector): RuleInput | undefined {
    const errorsBefore = collector.errorCount;

    const name = this.buildName(rule, prefix, collector);
    this.validateOptionalFields(rule, prefix, collector);

    const scope: VariableScope = { variables: new Set(), facts: new Set() };

    let conditions: RuleCondition[] | undefined;
    if (!hasProperty(rule, 'conditions')) {
      collector.addError(this.fieldPath(prefix, 'conditions'), 'Required field "conditions" is missing');
    } else {
      conditions = validateConditions(rule['conditions'], this.fieldPath(prefix, 'conditions'), collector, scope);
    }

    let actions: RuleAction[] | undefined;
    if (!hasProperty(rule, 'actions')) {
      collector.addError(this.fieldPath(prefix, 'actions'), 'Required field "actions" is missing');
    } else {
      actions = validateActions(rule['actions'], this.fieldPath(prefix, 'actions'), collector, scope);
    }

    if (this.strict) {
      this.checkUnusedVariables(prefix, collector);
    }

    if (collector.errorCount > errorsBefore || name === undefined || conditions === undefined || actions === undefined) {
      return undefined;
    }

    const description = rule['description'];
    const priority = rule['priority'];
    const tags = rule['tags'];

    return {
      name,
      ...(typeof description === 'string' && { description }),
      priority: typeof priority === 'number' ? priority : 0,
      tags: Array.isArray(tags) ? tags.filter((tag): tag is string => typeof tag === 'string') : [],
      conditions,
      actions,
    };
  }

  private buildName(rule: RuleRecord, prefix: string, collector: IssueCollector): string | undefined {
    if (!hasProperty(rule, 'name')) {
      collector.addError(this.fieldPath(prefix, 'name'), 'Required field "name" is missing');
      return undefined;
    }
    const name = rule['name'];
    if (typeof name !== 'string') {
      collector.addError(this.fieldPath(prefix, 'name'), 'Field "name" must be a string');
      return undefined;
    }
    if (name.trim() === '') {
      collector.addError(this.fieldPath(prefix, 'name'), 'Field "name" cannot be empty');
      return undefined;
    }
    return name;
  }

  private validateOptionalFields(
    rule: RuleRecord,
    prefix: string,
    collector: IssueCollector,
  ): void {
    if (hasProperty(rule, 'description') && typeof rule['description'] !== 'string') {
      collector.addError(
        this.fieldPath(prefix, 'description'),
        'Field "description" must be a string',
      );
    }

    if (hasProperty(rule, 'priority')) {
      const priority = rule['priority'];
      if (typeof priority !== 'number' || !Number.isFinite(priority)) {
        collector.addError(
          this.fieldPath(prefix, 'priority'),
          'Field "priority" must be a number',
        );
      } else if (!Number.isInteger(priority)) {
        collector.addWarning(
          this.fieldPath(prefix, 'priority'),
          'Field "priority" should be an integer',
        );
      }
    }

    if (hasProperty(rule, 'tags')) {
      const tags = rule['tags'];
      if (!Array.isArray(tags)) {
        collector.addError(this.fieldPath(prefix, 'tags'), 'Field "tags" must be an array');
      } else {
        for (let i = 0; i < tags.length; i++) {
          if (typeof tags[i] !== 'string') {
            collector.addError(this.fieldPath(prefix, `tags[${i}]`), 'Tag must be a string');
          }
        }
      }
    }
  }

  private checkOutputKindsAsserted(
    outputKinds: string[],
    rules: RuleInput[],
    collector: IssueCollector,
  ): void {
    const asserted = new Set<string>();
    for (const rule of rules) {
      for (const action of rule.actions) {
        if (action.type === 'assert') asserted.add(action.kind);
      }
    }
    outputKinds.forEach((kind, i) => {
      if (!asserted.has(kind)) {
        collector.addWarning(`outputKinds[${i}]`, `No rule asserts output kind "${kind}"`);
      }
    });
  }

  private checkUnusedVariables(prefix: string, collector: IssueCollector): void {
    for (const name of collector.boundVariables) {
      if (!collector.usedVariables.has(name)) {
        collector.addWarning(
          this.fieldPath(prefix, 'conditions'),
          `Variable "${name}" is bound but never used`,
        );
      }
    }
  }

  private fieldPath(prefix: string, field: string): string {
    return prefix ? `${prefix}.${field}` : field;
  }
}
