/**
 * Loader souborů s pozorováním (vstup CLI příkazu `run`).
 *
 * Podporované tvary:
 * - YAML pole `[{ kind, attributes }, ...]`
 * - Objekt s klíčem `observations` obsahující takové pole
 */

import type { ObservationInput } from '../../types/fact.js';
import { isAttributeValue, isObject } from '../../validation/types.js';
import { YamlLoadError } from '../helpers/errors.js';
import { parseYamlDocument, readYamlFile, withFilePath } from './parse.js';

function toObservation(item: unknown, path: string): ObservationInput {
  if (!isObject(item)) {
    throw new YamlLoadError(`${path}: expected an object with "kind" and "attributes"`);
  }

  const kind = item['kind'];
  if (typeof kind !== 'string' || kind.length === 0) {
    throw new YamlLoadError(`${path}.kind: must be a non-empty string`);
  }

  const rawAttributes = item['attributes'] ?? {};
  if (!isObject(rawAttributes)) {
    throw new YamlLoadError(`${path}.attributes: must be an object`);
  }

  const attributes: ObservationInput['attributes'] = {};
  for (const [key, value] of Object.entries(rawAttributes)) {
    if (!isAttributeValue(value)) {
      throw new YamlLoadError(`${path}.attributes.${key}: must be a scalar or a list of scalars`);
    }
    attributes[key] = value;
  }

  return { kind, attributes };
}

/**
 * Parsuje YAML řetězec se seznamem pozorování.
 *
 * @throws {YamlLoadError} Při syntaktické chybě, prázdném vstupu nebo neplatné položce
 */
export function loadObservationsFromYAML(yamlContent: string): ObservationInput[] {
  const parsed = parseYamlDocument(yamlContent);

  let items: unknown[];
  if (Array.isArray(parsed)) {
    items = parsed;
  } else if (isObject(parsed) && parsed['observations'] !== undefined) {
    const observations = parsed['observations'];
    if (!Array.isArray(observations)) {
      throw new YamlLoadError('"observations" must be an array');
    }
    items = observations;
  } else {
    throw new YamlLoadError('Expected a YAML array of observations or an object with "observations"');
  }

  return items.map((item: unknown, i: number) => toObservation(item, `observations[${i}]`));
}

/**
 * Načte pozorování ze souboru.
 *
 * @throws {YamlLoadError}
 */
export async function loadObservationsFromFile(filePath: string): Promise<ObservationInput[]> {
  const content = await readYamlFile(filePath);

  try {
    return loadObservationsFromYAML(content);
  } catch (err) {
    throw withFilePath(err, filePath);
  }
}
