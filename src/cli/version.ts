/**
 * CLI verze - načtená z package.json.
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isObject } from '../validation/types.js';

function loadVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // src/cli i dist/cli leží 2 úrovně pod kořenem balíčku
    const packagePath = resolve(__dirname, '../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    const version = isObject(packageJson) ? packageJson['version'] : undefined;
    return typeof version === 'string' ? version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const version = loadVersion();
