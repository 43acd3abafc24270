import type { AttributeValue, Fact, FactAttributes } from '../types/fact.js';
import { isAttributeValue } from '../validation/types.js';
import { DuplicateFactError, InvalidFactError, UnknownFactError } from './errors.js';

/**
 * Typy změn faktů pro notifikace.
 */
export type FactChangeType = 'asserted' | 'retracted';

/**
 * Událost změny faktu.
 */
export interface FactChangeEvent {
  type: FactChangeType;
  fact: Fact;
}

/**
 * Callback pro notifikace o změnách faktů.
 */
export type FactChangeListener = (event: FactChangeEvent) => void;

export interface FactStoreConfig {
  name?: string;
  onFactChange?: FactChangeListener;
}

/** Predikát pro filtrování dotazu */
export type FactPredicate = (fact: Fact) => boolean;

/**
 * Kanonický klíč identity faktu: druh + atributy se seřazenými klíči.
 */
export function factIdentity(kind: string, attributes: Readonly<Record<string, AttributeValue>>): string {
  const sorted = Object.keys(attributes)
    .sort()
    .map((key) => [key, attributes[key]]);
  return `${kind}|${JSON.stringify(sorted)}`;
}

/**
 * Pracovní paměť jedné session.
 *
 * Fakty jsou po vložení zmražené, id rostou v pořadí vkládání.
 * "Úprava" faktu = retract + assert nového faktu.
 *
 * Podporuje notifikace o změnách pomocí callbacku `onFactChange`.
 */
export class FactStore {
  private facts: Map<number, Fact> = new Map();
  private readonly name: string;
  private readonly changeListener: FactChangeListener | undefined;
  private nextId = 1;

  /**
   * Index podle druhu faktu. Map zachovává pořadí vložení,
   * takže iterace jde vzestupně podle id.
   */
  private byKind: Map<string, Map<number, Fact>> = new Map();

  /** Identita (druh + atributy) → id živého faktu */
  private identities: Map<string, number> = new Map();

  constructor(config: FactStoreConfig = {}) {
    this.name = config.name ?? 'facts';
    this.changeListener = config.onFactChange;
  }

  /**
   * Vloží nový fakt a vrátí jeho id.
   *
   * @throws {InvalidFactError} Pokud atribut není konečné číslo, řetězec, boolean, null nebo jejich seznam
   * @throws {DuplicateFactError} Pokud identický fakt už je živý
   */
  assert(kind: string, attributes: Readonly<Record<string, AttributeValue>>): number {
    for (const [attribute, value] of Object.entries(attributes)) {
      if (!isAttributeValue(value)) {
        throw new InvalidFactError(kind, attribute);
      }
    }

    const identity = factIdentity(kind, attributes);
    const existingId = this.identities.get(identity);
    if (existingId !== undefined) {
      throw new DuplicateFactError(kind, attributes, existingId);
    }

    const fact: Fact = Object.freeze({
      id: this.nextId++,
      kind,
      attributes: freezeAttributes(attributes),
      assertedAt: Date.now()
    });

    this.facts.set(fact.id, fact);
    this.identities.set(identity, fact.id);

    let kindFacts = this.byKind.get(kind);
    if (!kindFacts) {
      kindFacts = new Map();
      this.byKind.set(kind, kindFacts);
    }
    kindFacts.set(fact.id, fact);

    this.notifyChange({ type: 'asserted', fact });

    return fact.id;
  }

  /**
   * Odebere živý fakt.
   *
   * @throws {UnknownFactError} Pokud fakt s daným id není živý
   */
  retract(factId: number): Fact {
    const existing = this.facts.get(factId);
    if (!existing) {
      throw new UnknownFactError(factId);
    }

    this.facts.delete(factId);
    this.identities.delete(factIdentity(existing.kind, existing.attributes));

    const kindFacts = this.byKind.get(existing.kind);
    if (kindFacts) {
      kindFacts.delete(factId);
      if (kindFacts.size === 0) {
        this.byKind.delete(existing.kind);
      }
    }

    this.notifyChange({ type: 'retracted', fact: existing });

    return existing;
  }

  get(factId: number): Fact | undefined {
    return this.facts.get(factId);
  }

  has(factId: number): boolean {
    return this.facts.has(factId);
  }

  /**
   * Živé fakty daného druhu v pořadí vložení.
   *
   * Vrací líný iterable - každá iterace začíná znovu a vidí stav
   * store v okamžiku, kdy iterace probíhá.
   */
  query(kind: string, predicate?: FactPredicate): Iterable<Fact> {
    const byKind = this.byKind;
    return {
      *[Symbol.iterator](): Iterator<Fact> {
        const kindFacts = byKind.get(kind);
        if (!kindFacts) return;
        for (const fact of kindFacts.values()) {
          if (!predicate || predicate(fact)) {
            yield fact;
          }
        }
      }
    };
  }

  /**
   * Filtrování pomocí predikátu napříč druhy.
   */
  filter(predicate: FactPredicate): Fact[] {
    return [...this.facts.values()].filter(predicate);
  }

  /**
   * Počet živých faktů.
   */
  get size(): number {
    return this.facts.size;
  }

  /**
   * Všechny živé fakty v pořadí vložení.
   */
  getAll(): Fact[] {
    return [...this.facts.values()];
  }

  /**
   * Druhy, které mají alespoň jeden živý fakt.
   */
  kinds(): string[] {
    return [...this.byKind.keys()];
  }

  /**
   * Vymaže všechny fakty. Čítač id se neresetuje.
   */
  clear(): void {
    this.facts.clear();
    this.byKind.clear();
    this.identities.clear();
  }

  /**
   * Notifikuje listener o změně faktu.
   */
  private notifyChange(event: FactChangeEvent): void {
    if (this.changeListener) {
      try {
        this.changeListener(event);
      } catch (error) {
        console.error(`[${this.name}] Error in fact change listener:`, error);
      }
    }
  }
}

function freezeAttributes(attributes: Readonly<Record<string, AttributeValue>>): FactAttributes {
  const copy: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(attributes)) {
    copy[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
  }
  return Object.freeze(copy);
}
