import type { AttributeValue, Fact, FactAttributes } from '../types/fact.js';
import type { AnyCondition, AttributeTest, Operand, RuleCondition } from '../types/condition.js';
import type { Activation, Bindings } from '../types/activation.js';
import type { Rule } from '../types/rule.js';
import type { FactStore } from './fact-store.js';
import type { RuleLibrary } from './rule-library.js';
import { evaluateOperator, valuesEqual } from '../utils/operators.js';
import { isOperatorTest, isVariableRef } from '../utils/terms.js';

/** Rozpracovaná shoda během backtrackingu */
interface PartialMatch {
  bindings: Bindings;
  facts: readonly Fact[];
  factBindings: Readonly<Record<string, number>>;
  branches: readonly number[];
}

const EMPTY_MATCH: PartialMatch = { bindings: {}, facts: [], factBindings: {}, branches: [] };

/** Jména, která disjunkce zpřístupní dalším podmínkám */
interface BranchExports {
  variables: ReadonlySet<string>;
  facts: ReadonlySet<string>;
}

const exportsCache = new WeakMap<AnyCondition, BranchExports>();

function collectBoundNames(conditions: readonly RuleCondition[], variables: Set<string>, facts: Set<string>): void {
  for (const condition of conditions) {
    switch (condition.type) {
      case 'pattern':
        for (const test of Object.values(condition.attributes)) {
          if (isVariableRef(test)) variables.add(test.var);
          else if (isOperatorTest(test) && test.bind !== undefined) variables.add(test.bind);
        }
        if (condition.as !== undefined) facts.add(condition.as);
        break;
      case 'any': {
        const nested = anyExports(condition);
        for (const name of nested.variables) variables.add(name);
        for (const name of nested.facts) facts.add(name);
        break;
      }
      case 'not':
      case 'test':
        break;
    }
  }
}

/**
 * Proměnné a pojmenované fakty vázané ve všech větvích `any`.
 * Jen ty jsou viditelné za disjunkcí, ostatní zůstávají lokální větvi.
 */
function anyExports(condition: AnyCondition): BranchExports {
  const cached = exportsCache.get(condition);
  if (cached) return cached;

  const perBranch = condition.branches.map((branch) => {
    const variables = new Set<string>();
    const facts = new Set<string>();
    collectBoundNames(branch, variables, facts);
    return { variables, facts };
  });
  const [first, ...rest] = perBranch;
  const exported: BranchExports = {
    variables: new Set([...(first?.variables ?? [])].filter((name) => rest.every((b) => b.variables.has(name)))),
    facts: new Set([...(first?.facts ?? [])].filter((name) => rest.every((b) => b.facts.has(name))))
  };
  exportsCache.set(condition, exported);
  return exported;
}

function pickNames<T>(
  base: Readonly<Record<string, T>>,
  source: Readonly<Record<string, T>>,
  names: ReadonlySet<string>
): Record<string, T> {
  const result: Record<string, T> = { ...base };
  for (const name of names) {
    const value = source[name];
    if (Object.hasOwn(source, name) && value !== undefined) result[name] = value;
  }
  return result;
}

/**
 * Druhy faktů, na kterých závisí splnění podmínek (včetně negací a větví `any`).
 */
export function referencedKinds(conditions: readonly RuleCondition[]): Set<string> {
  const kinds = new Set<string>();
  const visit = (list: readonly RuleCondition[]): void => {
    for (const condition of list) {
      switch (condition.type) {
        case 'pattern':
        case 'not':
          kinds.add(condition.kind);
          break;
        case 'any':
          for (const branch of condition.branches) visit(branch);
          break;
        case 'test':
          break;
      }
    }
  };
  visit(conditions);
  return kinds;
}

/**
 * Naváže proměnnou, nebo ověří shodu s již vázanou hodnotou (join).
 */
function bindVariable(bindings: Record<string, AttributeValue>, name: string, value: AttributeValue | undefined): boolean {
  if (value === undefined) return false;
  if (Object.hasOwn(bindings, name)) {
    return valuesEqual(bindings[name], value);
  }
  bindings[name] = value;
  return true;
}

/**
 * Unifikuje testy atributů vzoru s atributy faktu.
 * Vrací rozšířené vazby, nebo `null` pokud fakt vzoru neodpovídá.
 */
export function unify(
  tests: Readonly<Record<string, AttributeTest>>,
  attributes: FactAttributes,
  bindings: Bindings
): Bindings | null {
  const next: Record<string, AttributeValue> = { ...bindings };

  for (const [attribute, test] of Object.entries(tests)) {
    const value = Object.hasOwn(attributes, attribute) ? attributes[attribute] : undefined;

    if (isVariableRef(test)) {
      if (!bindVariable(next, test.var, value)) return null;
      continue;
    }

    if (isOperatorTest(test)) {
      let compareValue: unknown = test.value;
      if (isVariableRef(test.value)) {
        if (!Object.hasOwn(next, test.value.var)) return null;
        compareValue = next[test.value.var];
      }
      if (!evaluateOperator(test.operator, value, compareValue)) return null;
      if (test.bind !== undefined && !bindVariable(next, test.bind, value)) return null;
      continue;
    }

    if (!valuesEqual(value, test)) return null;
  }

  return next;
}

function resolveOperand(operand: Operand | undefined, bindings: Bindings): unknown {
  if (isVariableRef(operand)) {
    return Object.hasOwn(bindings, operand.var) ? bindings[operand.var] : undefined;
  }
  return operand;
}

function* solveSequence(
  conditions: readonly RuleCondition[],
  index: number,
  state: PartialMatch,
  store: FactStore
): Generator<PartialMatch> {
  const condition = conditions[index];
  if (condition === undefined) {
    yield state;
    return;
  }

  for (const next of solveCondition(condition, state, store)) {
    yield* solveSequence(conditions, index + 1, next, store);
  }
}

function* solveCondition(condition: RuleCondition, state: PartialMatch, store: FactStore): Generator<PartialMatch> {
  switch (condition.type) {
    case 'pattern': {
      for (const fact of store.query(condition.kind)) {
        const bindings = unify(condition.attributes, fact.attributes, state.bindings);
        if (!bindings) continue;
        yield {
          bindings,
          facts: [...state.facts, fact],
          factBindings: condition.as !== undefined
            ? { ...state.factBindings, [condition.as]: fact.id }
            : state.factBindings,
          branches: state.branches
        };
      }
      return;
    }

    case 'not': {
      // Negace jako selhání - nevázané proměnné jsou lokální wildcardy
      for (const fact of store.query(condition.kind)) {
        if (unify(condition.attributes, fact.attributes, state.bindings)) return;
      }
      yield state;
      return;
    }

    case 'test': {
      const left = resolveOperand(condition.left, state.bindings);
      const right = resolveOperand(condition.right, state.bindings);
      if (evaluateOperator(condition.operator, left, right)) {
        yield state;
      }
      return;
    }

    case 'any': {
      const exported = anyExports(condition);
      for (let i = 0; i < condition.branches.length; i++) {
        const branch = condition.branches[i];
        if (!branch) continue;
        for (const match of solveSequence(branch, 0, { ...state, branches: [...state.branches, i] }, store)) {
          yield {
            bindings: pickNames(state.bindings, match.bindings, exported.variables),
            facts: match.facts,
            factBindings: pickNames(state.factBindings, match.factBindings, exported.facts),
            branches: match.branches
          };
        }
      }
      return;
    }
  }
}

function toActivation(rule: Rule, match: PartialMatch): Activation {
  const factIds = match.facts.map((fact) => fact.id);
  return Object.freeze({
    rule,
    bindings: Object.freeze({ ...match.bindings }),
    facts: Object.freeze([...match.facts]),
    factBindings: Object.freeze({ ...match.factBindings }),
    branches: Object.freeze([...match.branches]),
    key: `${rule.name}|${factIds.join(',')}|${match.branches.join('.')}`,
    recency: factIds.length > 0 ? Math.max(...factIds) : 0
  });
}

/**
 * Najde všechny aktivace jednoho pravidla nad aktuálním stavem store.
 *
 * Backtracking přes uspořádaný seznam podmínek: každý vzor prochází
 * živé fakty svého druhu a vazby se přenášejí do dalších podmínek.
 */
export function findActivations(rule: Rule, store: FactStore): Activation[] {
  const activations: Activation[] = [];
  for (const match of solveSequence(rule.conditions, 0, EMPTY_MATCH, store)) {
    activations.push(toActivation(rule, match));
  }
  return activations;
}

/**
 * Matcher jedné session.
 *
 * Drží aktivace každého pravidla v cache a po změně faktů přepočítá
 * jen pravidla, která odkazují na změněný druh faktu.
 */
export class Matcher {
  private readonly library: RuleLibrary;
  private readonly store: FactStore;
  private readonly cache: Map<string, Activation[]> = new Map();
  private readonly dirtyKinds: Set<string> = new Set();
  private primed = false;
  private recomputedRules = 0;

  constructor(library: RuleLibrary, store: FactStore) {
    this.library = library;
    this.store = store;
  }

  /**
   * Označí druh faktu jako změněný.
   */
  invalidate(kind: string): void {
    this.dirtyKinds.add(kind);
  }

  /**
   * Zahodí cache - další `match()` přepočítá vše.
   */
  reset(): void {
    this.cache.clear();
    this.dirtyKinds.clear();
    this.primed = false;
  }

  /**
   * Všechny aktuálně splněné aktivace v pořadí pravidel knihovny.
   */
  match(): Activation[] {
    if (!this.primed) {
      for (const rule of this.library.getAll()) {
        this.recompute(rule);
      }
      this.primed = true;
    } else {
      const stale = new Set<Rule>();
      for (const kind of this.dirtyKinds) {
        for (const rule of this.library.getByKind(kind)) {
          stale.add(rule);
        }
      }
      for (const rule of stale) {
        this.recompute(rule);
      }
    }
    this.dirtyKinds.clear();

    const activations: Activation[] = [];
    for (const rule of this.library.getAll()) {
      const cached = this.cache.get(rule.name);
      if (cached) activations.push(...cached);
    }
    return activations;
  }

  /** Kolikrát bylo pravidlo přepočítáno (pro diagnostiku cache) */
  get recomputations(): number {
    return this.recomputedRules;
  }

  private recompute(rule: Rule): void {
    this.cache.set(rule.name, findActivations(rule, this.store));
    this.recomputedRules++;
  }
}
