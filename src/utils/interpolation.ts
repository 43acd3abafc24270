import type { AttributeValue, Scalar } from '../types/fact.js';
import type { ActionValue } from '../types/action.js';
import type { Bindings } from '../types/activation.js';
import { isVariableRef } from './terms.js';

const PLACEHOLDER_RE = /\$\{([^}]+)\}/g;
const DECIMALS_RE = /^(.*?)\s*:\s*(\d{1,2})$/;

interface Placeholder {
  name: string;
  decimals?: number;
}

/** "ph" nebo "ph:2" (čísla na 2 desetinná místa) */
function parsePlaceholder(raw: string): Placeholder {
  const match = DECIMALS_RE.exec(raw.trim());
  if (!match) return { name: raw.trim() };
  return { name: (match[1] ?? '').trim(), decimals: Number(match[2]) };
}

function stringify(value: AttributeValue | undefined, decimals?: number): string {
  if (value === undefined || value === null) return '';
  if (Array.isArray(value)) return value.map((item) => stringify(item, decimals)).join(', ');
  if (typeof value === 'number' && decimals !== undefined) return value.toFixed(decimals);
  return String(value);
}

/**
 * Interpoluje string template: "Soil is acidic (pH=${ph:2})"
 */
export function interpolate(template: string, bindings: Bindings): string {
  // Fast path - no interpolation needed for static strings
  if (!template.includes('${')) {
    return template;
  }

  return template.replace(PLACEHOLDER_RE, (_, raw: string) => {
    const { name, decimals } = parsePlaceholder(raw);
    return stringify(bindings[name], decimals);
  });
}

/**
 * Vrátí jména proměnných použitých v placeholderech templatu.
 */
export function templateVariables(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    const name = match[1] !== undefined ? parsePlaceholder(match[1]).name : '';
    if (name) names.push(name);
  }
  return names;
}

/**
 * Resolvuje hodnotu akce: { var: "ph" } → vázaná hodnota, stringy se interpolují.
 */
export function resolveValue(value: ActionValue, bindings: Bindings): AttributeValue {
  if (isVariableRef(value)) {
    return bindings[value.var] ?? null;
  }
  if (typeof value === 'string') {
    return interpolate(value, bindings);
  }
  if (Array.isArray(value)) {
    return value.map((item: Scalar) => (typeof item === 'string' ? interpolate(item, bindings) : item));
  }
  return value;
}

/**
 * Resolvuje atributy akce s možnými referencemi.
 */
export function resolveAttributes(
  attributes: Readonly<Record<string, ActionValue>>,
  bindings: Bindings
): Record<string, AttributeValue> {
  const result: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(attributes)) {
    result[key] = resolveValue(value, bindings);
  }
  return result;
}
