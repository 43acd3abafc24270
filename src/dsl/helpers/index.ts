export { DslError, YamlLoadError } from './errors.js';
