import type { AttributeValue, Scalar } from './fact.js';

/** Porovnávací operátory */
export type ConstraintOperator =
  | 'eq' | 'neq'                              // Rovnost
  | 'gt' | 'gte' | 'lt' | 'lte'               // Porovnání
  | 'in' | 'not_in'                           // Seznam
  | 'contains' | 'not_contains'               // Řetězce/pole
  | 'matches'                                 // Regex
  | 'exists' | 'not_exists';                  // Existence

/** Reference na proměnnou vázanou v podmínkách pravidla */
export interface VariableRef {
  var: string;
}

/** Test atributu s operátorem, volitelně s navázáním hodnoty do proměnné */
export interface OperatorTest {
  operator: ConstraintOperator;
  value?: AttributeValue | VariableRef;
  bind?: string;
}

/**
 * Test jednoho atributu vzoru:
 * - literál → rovnost
 * - `{ var }` → vazba (první výskyt) nebo join (další výskyty)
 * - `{ operator, value?, bind? }` → porovnání
 */
export type AttributeTest = Scalar | readonly Scalar[] | VariableRef | OperatorTest;

/** Operand test podmínky - proměnná nebo literál */
export type Operand = VariableRef | AttributeValue;

/** Vzor nad fakty jednoho druhu */
export interface PatternCondition {
  type: 'pattern';
  kind: string;
  attributes: Readonly<Record<string, AttributeTest>>;
  as?: string;                                // Jméno pro navázání celého faktu (retract)
}

/** Negace - splněno, pokud žádný živý fakt vzoru neodpovídá */
export interface NotCondition {
  type: 'not';
  kind: string;
  attributes: Readonly<Record<string, AttributeTest>>;
}

/** Test nad vázanými proměnnými */
export interface TestCondition {
  type: 'test';
  left: Operand;
  operator: ConstraintOperator;
  right?: Operand;
}

/** Disjunkce - každá splněná větev dává vlastní aktivace */
export interface AnyCondition {
  type: 'any';
  branches: ReadonlyArray<readonly RuleCondition[]>;
}

/** Podmínka pravidla */
export type RuleCondition = PatternCondition | NotCondition | TestCondition | AnyCondition;
