/** Skalární hodnota atributu */
export type Scalar = string | number | boolean | null;

/** Hodnota atributu - skalár nebo seznam skalárů (např. více doporučení) */
export type AttributeValue = Scalar | readonly Scalar[];

/** Atributy faktu: název → hodnota */
export type FactAttributes = Readonly<Record<string, AttributeValue>>;

/** Fakt - neměnný záznam v pracovní paměti session */
export interface Fact {
  readonly id: number;               // Monotónně rostoucí v rámci session
  readonly kind: string;             // "symptom", "soil", "diagnosis", ...
  readonly attributes: FactAttributes;
  readonly assertedAt: number;       // Kdy byl vložen (ms)
}

/** Závěr - snapshot faktu výstupního druhu */
export interface Conclusion {
  readonly id: number;
  readonly kind: string;
  readonly attributes: FactAttributes;
}

/** Vstupní pozorování pro session */
export interface ObservationInput {
  kind: string;
  attributes: Record<string, AttributeValue>;
}
