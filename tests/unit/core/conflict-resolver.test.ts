import { describe, it, expect } from 'vitest';
import { ConflictResolver, compareActivations } from '../../../src/core/conflict-resolver.js';
import type { Activation } from '../../../src/types/activation.js';
import type { Fact } from '../../../src/types/fact.js';

function fact(id: number): Fact {
  return { id, kind: 'obs', attributes: {}, assertedAt: 0 };
}

function activation(name: string, priority: number, factIds: number[], branches: number[] = []): Activation {
  return {
    rule: { name, priority, tags: [], conditions: [], actions: [] },
    bindings: {},
    facts: factIds.map(fact),
    factBindings: {},
    branches,
    key: `${name}|${factIds.join(',')}|${branches.join('.')}`,
    recency: factIds.length > 0 ? Math.max(...factIds) : 0
  };
}

describe('compareActivations', () => {
  it('prefers higher priority', () => {
    expect(compareActivations(activation('a', 10, [5]), activation('b', 1, [1]))).toBeLessThan(0);
    expect(compareActivations(activation('a', -5, [1]), activation('b', 0, [5]))).toBeGreaterThan(0);
  });

  it('prefers older facts at equal priority', () => {
    expect(compareActivations(activation('z', 5, [1, 2]), activation('a', 5, [3]))).toBeLessThan(0);
  });

  it('ranks activations without facts before any with facts', () => {
    expect(compareActivations(activation('z', 0, []), activation('a', 0, [1]))).toBeLessThan(0);
  });

  it('falls back to rule name', () => {
    expect(compareActivations(activation('alpha', 5, [2]), activation('beta', 5, [2]))).toBeLessThan(0);
    expect(compareActivations(activation('beta', 5, [2]), activation('alpha', 5, [2]))).toBeGreaterThan(0);
  });

  it('compares fact ids in condition order for the same rule', () => {
    expect(compareActivations(activation('r', 5, [1, 3]), activation('r', 5, [3, 2]))).toBeLessThan(0);
    expect(compareActivations(activation('r', 5, [2, 3]), activation('r', 5, [1, 3]))).toBeGreaterThan(0);
  });

  it('uses the branch path as the last tie-break', () => {
    expect(compareActivations(activation('r', 5, [1], [0]), activation('r', 5, [1], [1]))).toBeLessThan(0);
  });

  it('returns 0 for the same activation', () => {
    const a = activation('r', 5, [1]);
    expect(compareActivations(a, a)).toBe(0);
  });
});

describe('ConflictResolver', () => {
  const resolver = new ConflictResolver();

  it('returns undefined without candidates', () => {
    expect(resolver.select([])).toBeUndefined();
  });

  it('selects the same activation regardless of input order', () => {
    const candidates = [
      activation('low', 1, [1]),
      activation('late', 10, [4]),
      activation('early', 10, [2]),
      activation('early-b', 10, [2])
    ];

    expect(resolver.select(candidates)?.key).toBe('early|2|');
    expect(resolver.select([...candidates].reverse())?.key).toBe('early|2|');
  });

  it('orders the agenda without modifying the input', () => {
    const candidates = [activation('c', 0, [3]), activation('a', 5, [1]), activation('b', 0, [2])];

    expect(resolver.agenda(candidates).map((a) => a.rule.name)).toEqual(['a', 'b', 'c']);
    expect(candidates.map((a) => a.rule.name)).toEqual(['c', 'a', 'b']);
  });
});
