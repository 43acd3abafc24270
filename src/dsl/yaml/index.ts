export { loadRuleLibraryFromYAML, loadRuleLibraryFromFile } from './loader.js';
export { loadObservationsFromYAML, loadObservationsFromFile } from './observations.js';
export { parseYamlDocument } from './parse.js';
