import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { YamlLoadError } from '../helpers/errors.js';

/**
 * Parsuje YAML (nebo JSON) obsah. Prázdný dokument je chyba.
 *
 * @throws {YamlLoadError}
 */
export function parseYamlDocument(content: string): unknown {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new YamlLoadError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }

  return parsed;
}

/**
 * @throws {YamlLoadError} Při chybě čtení souboru
 */
export async function readYamlFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }
}

/** Doplní cestu k souboru do YamlLoadError, ostatní chyby propustí. */
export function withFilePath(err: unknown, filePath: string): unknown {
  if (err instanceof YamlLoadError && err.filePath === undefined) {
    return new YamlLoadError(err.message, filePath);
  }
  return err;
}
