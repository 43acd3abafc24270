/**
 * Utility pro načítání vstupních souborů CLI.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseYamlDocument } from '../../dsl/yaml/parse.js';
import { YamlLoadError } from '../../dsl/helpers/errors.js';
import { FileNotFoundError, ValidationError } from './errors.js';

/** Výsledek načtení souboru */
export interface LoadResult<T = unknown> {
  data: T;
  path: string;
}

/**
 * Ověří existenci souboru a vrátí absolutní cestu.
 * @throws FileNotFoundError pokud soubor neexistuje
 */
export function requireFile(filePath: string): string {
  const absolutePath = resolve(filePath);
  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(filePath);
  }
  return absolutePath;
}

/**
 * Načte a parsuje YAML nebo JSON soubor.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud soubor není validní YAML
 */
export function loadYamlFile(filePath: string): LoadResult {
  const absolutePath = requireFile(filePath);
  const content = readFileSync(absolutePath, 'utf-8');

  try {
    return { data: parseYamlDocument(content), path: absolutePath };
  } catch (err) {
    if (err instanceof YamlLoadError) {
      throw new ValidationError(`Invalid YAML in file: ${err.message}`, [], err);
    }
    throw err;
  }
}
