export { evaluateOperator, valuesEqual, clearMatchesCache } from './operators.js';
export { interpolate, templateVariables, resolveValue, resolveAttributes } from './interpolation.js';
export { isVariableRef, isOperatorTest } from './terms.js';
export { generateId } from './id-generator.js';
