/**
 * Načítání knihoven pravidel a pozorování z YAML / JSON.
 *
 * @example
 * ```typescript
 * import { loadRuleLibraryFromFile, loadObservationsFromFile } from 'agri-advisor/dsl';
 *
 * const library = await loadRuleLibraryFromFile('./rules/crop-advisory.yaml');
 * const observations = await loadObservationsFromFile('./field-17.yaml');
 * ```
 *
 * @module dsl
 */

export {
  loadRuleLibraryFromYAML,
  loadRuleLibraryFromFile,
  loadObservationsFromYAML,
  loadObservationsFromFile,
  parseYamlDocument,
} from './yaml/index.js';

export { DslError, YamlLoadError } from './helpers/errors.js';
