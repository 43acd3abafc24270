import { describe, it, expect, beforeEach } from 'vitest';
import { FactStore } from '../../../src/core/fact-store.js';
import { RuleLibrary } from '../../../src/core/rule-library.js';
import { Matcher, findActivations, referencedKinds, unify } from '../../../src/core/matcher.js';
import type { Rule } from '../../../src/types/rule.js';

function ruleOf(definition: Record<string, unknown>): Rule {
  const library = RuleLibrary.load({
    outputKinds: ['diagnosis'],
    rules: [{ actions: [{ type: 'assert', kind: 'diagnosis', attributes: { disease: 'x' } }], ...definition }]
  });
  const rule = library.getAll()[0];
  if (!rule) throw new Error('rule not loaded');
  return rule;
}

describe('unify', () => {
  it('accepts equal literals without new bindings', () => {
    expect(unify({ name: 'tomato' }, { name: 'tomato', stage: 'flowering' }, {})).toEqual({});
  });

  it('rejects a different literal', () => {
    expect(unify({ name: 'tomato' }, { name: 'maize' }, {})).toBeNull();
  });

  it('rejects a fact without the tested attribute', () => {
    expect(unify({ ph: { var: 'ph' } }, { type: 'loam' }, {})).toBeNull();
  });

  it('binds a variable on first occurrence', () => {
    expect(unify({ ph: { var: 'ph' } }, { ph: 5.2 }, { crop: 'tomato' })).toEqual({ crop: 'tomato', ph: 5.2 });
  });

  it('joins on an already bound variable', () => {
    expect(unify({ crop: { var: 'c' } }, { crop: 'tomato' }, { c: 'tomato' })).toEqual({ c: 'tomato' });
    expect(unify({ crop: { var: 'c' } }, { crop: 'maize' }, { c: 'tomato' })).toBeNull();
  });

  it('evaluates operator tests and binds the tested value', () => {
    expect(unify({ n: { operator: 'lt', value: 50, bind: 'n' } }, { n: 30 }, {})).toEqual({ n: 30 });
    expect(unify({ n: { operator: 'lt', value: 50 } }, { n: 70 }, {})).toBeNull();
  });

  it('compares against a bound variable in an operator test', () => {
    expect(unify({ temp: { operator: 'gt', value: { var: 'min' } } }, { temp: 25 }, { min: 20 })).toEqual({ min: 20 });
    expect(unify({ temp: { operator: 'gt', value: { var: 'min' } } }, { temp: 25 }, {})).toBeNull();
  });

  it('compares lists structurally', () => {
    expect(unify({ tags: ['a', 'b'] }, { tags: ['a', 'b'] }, {})).toEqual({});
    expect(unify({ tags: ['a', 'b'] }, { tags: ['b', 'a'] }, {})).toBeNull();
  });
});

describe('referencedKinds', () => {
  it('collects kinds of patterns, negations and branches', () => {
    const rule = ruleOf({
      name: 'r',
      conditions: [
        { kind: 'soil', attributes: { ph: { var: 'ph' } } },
        { type: 'test', left: { var: 'ph' }, operator: 'lt', right: 6 },
        { type: 'not', kind: 'diagnosis' },
        { type: 'any', branches: [[{ kind: 'pests', attributes: { aphids: true } }], [{ kind: 'weather' }]] }
      ]
    });

    expect([...referencedKinds(rule.conditions)].sort()).toEqual(['diagnosis', 'pests', 'soil', 'weather']);
  });
});

describe('findActivations', () => {
  let store: FactStore;

  beforeEach(() => {
    store = new FactStore();
  });

  it('joins patterns through a shared variable', () => {
    const rule = ruleOf({
      name: 'join',
      conditions: [
        { kind: 'symptom', attributes: { crop: { var: 'c' } } },
        { kind: 'crop', attributes: { name: { var: 'c' } } }
      ]
    });
    store.assert('crop', { name: 'tomato' });
    store.assert('crop', { name: 'maize' });
    store.assert('symptom', { crop: 'tomato' });

    const activations = findActivations(rule, store);

    expect(activations).toHaveLength(1);
    const [activation] = activations;
    expect(activation?.bindings).toEqual({ c: 'tomato' });
    expect(activation?.facts.map((f) => f.id)).toEqual([3, 1]);
    expect(activation?.key).toBe('join|3,1|');
    expect(activation?.recency).toBe(3);
  });

  it('produces one activation per matching combination in fact order', () => {
    const rule = ruleOf({
      name: 'pairs',
      conditions: [{ kind: 'crop', attributes: { name: { var: 'name' } } }]
    });
    store.assert('crop', { name: 'tomato' });
    store.assert('crop', { name: 'maize' });

    expect(findActivations(rule, store).map((a) => a.key)).toEqual(['pairs|1|', 'pairs|2|']);
  });

  it('treats a negation as satisfied when no fact matches', () => {
    const rule = ruleOf({
      name: 'fallback',
      conditions: [{ type: 'not', kind: 'diagnosis' }]
    });

    const [activation] = findActivations(rule, store);
    expect(activation?.key).toBe('fallback||');
    expect(activation?.recency).toBe(0);
    expect(activation?.facts).toEqual([]);

    store.assert('diagnosis', { disease: 'x' });
    expect(findActivations(rule, store)).toEqual([]);
  });

  it('uses bound variables inside a negation', () => {
    const rule = ruleOf({
      name: 'no-advice',
      conditions: [
        { kind: 'crop', attributes: { name: { var: 'c' } } },
        { type: 'not', kind: 'advice', attributes: { crop: { var: 'c' } } }
      ]
    });
    store.assert('crop', { name: 'tomato' });
    store.assert('crop', { name: 'maize' });
    store.assert('advice', { crop: 'tomato' });

    expect(findActivations(rule, store).map((a) => a.bindings)).toEqual([{ c: 'maize' }]);
  });

  it('filters combinations with a test condition', () => {
    const rule = ruleOf({
      name: 'acidic',
      conditions: [
        { kind: 'soil', attributes: { ph: { var: 'ph' } } },
        { type: 'test', left: { var: 'ph' }, operator: 'lt', right: 5.5 }
      ]
    });
    store.assert('soil', { ph: 6.3 });
    store.assert('soil', { ph: 5.1 });

    expect(findActivations(rule, store).map((a) => a.bindings)).toEqual([{ ph: 5.1 }]);
  });

  it('yields a separate activation for every satisfied branch', () => {
    const rule = ruleOf({
      name: 'vectors',
      conditions: [
        {
          type: 'any',
          branches: [
            [{ kind: 'pests', attributes: { aphids: true } }],
            [{ kind: 'pests', attributes: { whiteflies: true } }]
          ]
        }
      ]
    });
    store.assert('pests', { aphids: true, whiteflies: true });

    const activations = findActivations(rule, store);
    expect(activations.map((a) => a.key)).toEqual(['vectors|1|0', 'vectors|1|1']);
    expect(activations.map((a) => a.branches)).toEqual([[0], [1]]);
  });

  it('keeps variables bound in only one branch local to that branch', () => {
    const rule = ruleOf({
      name: 'branch-local',
      conditions: [
        {
          type: 'any',
          branches: [[{ kind: 'pests', attributes: { crop: { var: 'x' } } }], [{ kind: 'weather' }]]
        },
        { kind: 'crop', attributes: { name: { var: 'x' } } }
      ]
    });
    store.assert('pests', { crop: 'maize' });
    store.assert('crop', { name: 'tomato' });

    const activations = findActivations(rule, store);
    expect(activations).toHaveLength(1);
    expect(activations[0]?.key).toBe('branch-local|1,2|0');
    expect(activations[0]?.bindings).toEqual({ x: 'tomato' });
  });

  it('exports variables bound in every branch', () => {
    const rule = ruleOf({
      name: 'shared',
      conditions: [
        {
          type: 'any',
          branches: [
            [{ kind: 'pests', attributes: { crop: { var: 'c' } } }],
            [{ kind: 'symptoms', attributes: { crop: { var: 'c' } } }]
          ]
        },
        { kind: 'crop', attributes: { name: { var: 'c' } } }
      ]
    });
    store.assert('pests', { crop: 'maize' });
    store.assert('symptoms', { crop: 'tomato' });
    store.assert('crop', { name: 'tomato' });

    const activations = findActivations(rule, store);
    expect(activations.map((a) => a.key)).toEqual(['shared|2,3|1']);
    expect(activations[0]?.bindings).toEqual({ c: 'tomato' });
  });

  it('records fact bindings for named patterns', () => {
    const rule = ruleOf({
      name: 'named',
      conditions: [{ kind: 'crop', as: 'crop' }]
    });
    store.assert('soil', { ph: 6 });
    store.assert('crop', { name: 'tomato' });

    const [activation] = findActivations(rule, store);
    expect(activation?.factBindings).toEqual({ crop: 2 });
  });

  it('returns frozen activations', () => {
    const rule = ruleOf({ name: 'any-crop', conditions: [{ kind: 'crop' }] });
    store.assert('crop', { name: 'tomato' });

    const [activation] = findActivations(rule, store);
    expect(Object.isFrozen(activation)).toBe(true);
    expect(Object.isFrozen(activation?.bindings)).toBe(true);
  });
});

describe('Matcher', () => {
  let library: RuleLibrary;
  let store: FactStore;
  let matcher: Matcher;

  beforeEach(() => {
    library = RuleLibrary.load({
      outputKinds: ['diagnosis'],
      rules: [
        {
          name: 'crop-rule',
          conditions: [{ kind: 'crop', attributes: { name: { var: 'c' } } }],
          actions: [{ type: 'assert', kind: 'diagnosis', attributes: { crop: { var: 'c' } } }]
        },
        {
          name: 'soil-rule',
          conditions: [{ kind: 'soil' }],
          actions: [{ type: 'assert', kind: 'diagnosis', attributes: { soil: true } }]
        }
      ]
    });
    store = new FactStore({ onFactChange: (event) => matcher.invalidate(event.fact.kind) });
    matcher = new Matcher(library, store);
  });

  it('computes every rule on the first match', () => {
    store.assert('soil', { ph: 6 });
    store.assert('crop', { name: 'tomato' });

    expect(matcher.match().map((a) => a.key)).toEqual(['crop-rule|2|', 'soil-rule|1|']);
    expect(matcher.recomputations).toBe(2);
  });

  it('recomputes only rules depending on a changed kind', () => {
    matcher.match();
    store.assert('crop', { name: 'tomato' });

    expect(matcher.match().map((a) => a.key)).toEqual(['crop-rule|1|']);
    expect(matcher.recomputations).toBe(3);
  });

  it('skips recomputation when nothing changed', () => {
    matcher.match();
    matcher.match();

    expect(matcher.recomputations).toBe(2);
  });

  it('ignores changes of kinds no rule refers to', () => {
    matcher.match();
    store.assert('weather', { temp: 20 });
    matcher.match();

    expect(matcher.recomputations).toBe(2);
  });

  it('sees retractions after invalidation', () => {
    const id = store.assert('soil', { ph: 6 });
    expect(matcher.match()).toHaveLength(1);

    store.retract(id);
    expect(matcher.match()).toEqual([]);
  });

  it('recomputes everything after reset', () => {
    matcher.match();
    matcher.reset();
    matcher.match();

    expect(matcher.recomputations).toBe(4);
  });
});
