import type { ConstraintOperator } from '../types/condition.js';

/** Cache pro RegExp objekty v matches operátoru */
const matchesRegexCache = new Map<string, RegExp>();

/**
 * Vyčistí cache regex objektů. Užitečné pro testy.
 */
export function clearMatchesCache(): void {
  matchesRegexCache.clear();
}

/**
 * Strukturální rovnost hodnot atributů (skaláry a seznamy skalárů).
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return false;
}

/**
 * Vyhodnotí operátor nad hodnotou atributu a porovnávanou hodnotou.
 */
export function evaluateOperator(
  operator: ConstraintOperator,
  value: unknown,
  compareValue: unknown
): boolean {
  switch (operator) {
    case 'eq':
      return valuesEqual(value, compareValue);

    case 'neq':
      return !valuesEqual(value, compareValue);

    case 'gt':
      return typeof value === 'number' && typeof compareValue === 'number' && value > compareValue;

    case 'gte':
      return typeof value === 'number' && typeof compareValue === 'number' && value >= compareValue;

    case 'lt':
      return typeof value === 'number' && typeof compareValue === 'number' && value < compareValue;

    case 'lte':
      return typeof value === 'number' && typeof compareValue === 'number' && value <= compareValue;

    case 'in':
      return Array.isArray(compareValue) && compareValue.includes(value);

    case 'not_in':
      return Array.isArray(compareValue) && !compareValue.includes(value);

    case 'contains':
      if (typeof value === 'string' && typeof compareValue === 'string') {
        return value.includes(compareValue);
      }
      if (Array.isArray(value)) {
        return value.includes(compareValue);
      }
      return false;

    case 'not_contains':
      if (typeof value === 'string' && typeof compareValue === 'string') {
        return !value.includes(compareValue);
      }
      if (Array.isArray(value)) {
        return !value.includes(compareValue);
      }
      return true;

    case 'matches':
      if (typeof value === 'string' && typeof compareValue === 'string') {
        let regex = matchesRegexCache.get(compareValue);
        if (!regex) {
          try {
            regex = new RegExp(compareValue);
            matchesRegexCache.set(compareValue, regex);
          } catch {
            return false;
          }
        }
        return regex.test(value);
      }
      return false;

    case 'exists':
      return value !== undefined && value !== null;

    case 'not_exists':
      return value === undefined || value === null;

    default:
      return false;
  }
}
