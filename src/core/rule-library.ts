import type { Rule, RuleInput, RuleLibraryDefinition } from '../types/rule.js';
import { RuleLibraryValidator, type ValidationIssue } from '../validation/index.js';
import { referencedKinds } from './matcher.js';

export interface RuleLibraryOptions {
  /** Hlásit nepoužité proměnné jako varování */
  strict?: boolean;
}

/**
 * Rekurzivně zmrazí objekt - knihovna se sdílí mezi sessions jen pro čtení.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function toRule(input: RuleInput): Rule {
  return deepFreeze({
    name: input.name,
    ...(input.description !== undefined && { description: input.description }),
    priority: input.priority ?? 0,
    tags: [...(input.tags ?? [])],
    conditions: structuredClone(input.conditions),
    actions: structuredClone(input.actions)
  });
}

/**
 * Neměnná knihovna pravidel s indexací podle druhů faktů.
 *
 * Načítá se jednou a sdílí se mezi všemi sessions. Po načtení
 * se nic nemění - pravidla i indexy jsou zmražené.
 */
export class RuleLibrary {
  private readonly rules: readonly Rule[];
  private readonly byName: ReadonlyMap<string, Rule>;
  private readonly byKind: ReadonlyMap<string, readonly Rule[]>;
  private readonly kindsByRule: ReadonlyMap<string, ReadonlySet<string>>;
  private readonly byTags: ReadonlyMap<string, readonly Rule[]>;
  private readonly outputKindSet: ReadonlySet<string>;

  readonly outputKinds: readonly string[];
  readonly warnings: readonly ValidationIssue[];

  private constructor(definition: RuleLibraryDefinition, warnings: ValidationIssue[]) {
    this.rules = Object.freeze(definition.rules.map(toRule));
    this.outputKinds = Object.freeze([...definition.outputKinds]);
    this.outputKindSet = new Set(this.outputKinds);
    this.warnings = Object.freeze(warnings);

    const byName = new Map<string, Rule>();
    const byKind = new Map<string, Rule[]>();
    const kindsByRule = new Map<string, ReadonlySet<string>>();
    const byTags = new Map<string, Rule[]>();

    for (const rule of this.rules) {
      byName.set(rule.name, rule);

      const kinds = referencedKinds(rule.conditions);
      kindsByRule.set(rule.name, kinds);
      for (const kind of kinds) {
        let rules = byKind.get(kind);
        if (!rules) {
          rules = [];
          byKind.set(kind, rules);
        }
        rules.push(rule);
      }

      for (const tag of rule.tags) {
        let rules = byTags.get(tag);
        if (!rules) {
          rules = [];
          byTags.set(tag, rules);
        }
        rules.push(rule);
      }
    }

    this.byName = byName;
    this.byKind = byKind;
    this.kindsByRule = kindsByRule;
    this.byTags = byTags;
  }

  /**
   * Validuje a načte knihovnu pravidel.
   *
   * @throws {RuleLibraryError} Při duplicitních jménech pravidel nebo
   *   chybných podmínkách/akcích - knihovna se nenačte ani částečně
   */
  static load(definition: unknown, options: RuleLibraryOptions = {}): RuleLibrary {
    const validator = new RuleLibraryValidator({ strict: options.strict ?? false });
    const parsed = validator.parse(definition);
    return new RuleLibrary(parsed.definition, parsed.warnings);
  }

  /**
   * Získá pravidlo podle jména.
   */
  get(name: string): Rule | undefined {
    return this.byName.get(name);
  }

  /**
   * Všechna pravidla v pořadí deklarace.
   */
  getAll(): readonly Rule[] {
    return this.rules;
  }

  /**
   * Pravidla, jejichž podmínky závisí na daném druhu faktu.
   */
  getByKind(kind: string): readonly Rule[] {
    return this.byKind.get(kind) ?? [];
  }

  /**
   * Druhy faktů, na které odkazují podmínky pravidla.
   */
  getReferencedKinds(name: string): ReadonlySet<string> {
    return this.kindsByRule.get(name) ?? new Set();
  }

  /**
   * Pravidla s daným tagem.
   */
  getByTag(tag: string): readonly Rule[] {
    return this.byTags.get(tag) ?? [];
  }

  isOutputKind(kind: string): boolean {
    return this.outputKindSet.has(kind);
  }

  /**
   * Počet pravidel.
   */
  get size(): number {
    return this.rules.length;
  }

  /**
   * Serializovatelná podoba knihovny (pro export / CLI výstup).
   */
  toDefinition(): RuleLibraryDefinition {
    return {
      outputKinds: [...this.outputKinds],
      rules: this.rules.map((rule) => ({
        name: rule.name,
        ...(rule.description !== undefined && { description: rule.description }),
        priority: rule.priority,
        tags: [...rule.tags],
        conditions: structuredClone([...rule.conditions]),
        actions: structuredClone([...rule.actions])
      }))
    };
  }
}
