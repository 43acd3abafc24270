/**
 * YAML loader pro knihovny pravidel.
 *
 * Dokument má tvar `{ outputKinds: [...], rules: [...] }`. JSON je
 * podmnožina YAML, takže stejně se načítají i `.json` soubory.
 *
 * @example
 * ```typescript
 * const library = loadRuleLibraryFromYAML(`
 *   outputKinds: [recommendation]
 *   rules:
 *     - name: low-nitrogen
 *       conditions:
 *         - kind: lab
 *           attributes: { n: { operator: lt, value: 50 } }
 *       actions:
 *         - type: assert
 *           kind: recommendation
 *           attributes: { fertilizer: urea }
 * `);
 *
 * const fromFile = await loadRuleLibraryFromFile('./rules/crop-advisory.yaml');
 * ```
 */

import { RuleLibrary, type RuleLibraryOptions } from '../../core/rule-library.js';
import { parseYamlDocument, readYamlFile, withFilePath } from './parse.js';

/**
 * Parsuje YAML řetězec a vrací validovanou, zmraženou knihovnu pravidel.
 *
 * @throws {YamlLoadError} Při YAML syntaktické chybě nebo prázdném vstupu
 * @throws {RuleLibraryError} Při validační chybě knihovny
 */
export function loadRuleLibraryFromYAML(yamlContent: string, options: RuleLibraryOptions = {}): RuleLibrary {
  return RuleLibrary.load(parseYamlDocument(yamlContent), options);
}

/**
 * Načte knihovnu pravidel ze souboru.
 *
 * @throws {YamlLoadError} Při chybě čtení souboru, YAML syntaxi nebo prázdném souboru
 * @throws {RuleLibraryError} Při validační chybě knihovny
 */
export async function loadRuleLibraryFromFile(filePath: string, options: RuleLibraryOptions = {}): Promise<RuleLibrary> {
  const content = await readYamlFile(filePath);

  try {
    return loadRuleLibraryFromYAML(content, options);
  } catch (err) {
    throw withFilePath(err, filePath);
  }
}
