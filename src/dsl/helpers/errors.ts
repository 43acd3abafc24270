/**
 * Hierarchie chybových tříd pro DSL modul.
 *
 * Všechny chyby z DSL dědí z {@link DslError}, což umožňuje
 * jednoduché odchycení všech DSL chyb najednou:
 *
 * ```typescript
 * try {
 *   await loadObservationsFromFile('./field-17.yaml');
 * } catch (err) {
 *   if (err instanceof DslError) {
 *     // Chyba čtení, YAML syntaxe nebo struktury souboru
 *   }
 * }
 * ```
 */

/**
 * Základní chybová třída pro všechny DSL operace.
 */
export class DslError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DslError';
  }
}

/**
 * Chyba načítání YAML: nečitelný soubor, syntaktická chyba,
 * prázdný vstup nebo neplatná struktura pozorování.
 */
export class YamlLoadError extends DslError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'YamlLoadError';
  }
}
