/**
 * CLI konfigurace - načítání a správa konfiguračního souboru.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { CliConfig, OutputFormat } from '../types.js';
import { DEFAULT_CLI_CONFIG, OUTPUT_FORMATS } from '../types.js';
import { isObject } from '../../validation/types.js';

const CONFIG_FILENAME = '.agri-advisor.json';

/** Částečná konfigurace ze souboru */
interface PartialCliConfig {
  rules?: Partial<CliConfig['rules']>;
  engine?: Partial<CliConfig['engine']>;
  output?: Partial<CliConfig['output']>;
}

/** Hledá konfigurační soubor v hierarchii adresářů */
function findConfigFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  // Zkus home adresář
  const homeConfig = join(homedir(), CONFIG_FILENAME);
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

/** Sekce konfigurace, chybějící sekce je prázdný objekt */
function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = parsed[name];
  if (value === undefined) return {};
  if (!isObject(value)) {
    throw new Error(`"${name}" must be an object`);
  }
  return value;
}

/** Parsuje JSON konfiguraci s validací */
export function parseConfig(content: string, filePath: string): PartialCliConfig {
  try {
    const parsed: unknown = JSON.parse(content);
    if (!isObject(parsed)) {
      throw new Error('Configuration must be an object');
    }

    const result: PartialCliConfig = {};

    const rules = section(parsed, 'rules');
    const rulesPath = rules['path'];
    if (rulesPath !== undefined) {
      if (typeof rulesPath !== 'string') throw new Error('"rules.path" must be a string');
      // Relativně k adresáři konfiguračního souboru
      result.rules = { path: resolve(filePath, '..', rulesPath) };
    }

    const engine = section(parsed, 'engine');
    const maxCycles = engine['maxCycles'];
    if (maxCycles !== undefined) {
      if (typeof maxCycles !== 'number' || !Number.isInteger(maxCycles) || maxCycles < 0) {
        throw new Error('"engine.maxCycles" must be a non-negative integer');
      }
      result.engine = { maxCycles };
    }

    const output = section(parsed, 'output');
    const format = output['format'];
    const colors = output['colors'];
    if (format !== undefined && !isOutputFormat(format)) {
      throw new Error(`"output.format" must be one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
    if (colors !== undefined && typeof colors !== 'boolean') {
      throw new Error('"output.colors" must be a boolean');
    }
    result.output = {
      ...(format !== undefined && { format }),
      ...(colors !== undefined && { colors })
    };

    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration in ${filePath}: ${message}`);
  }
}

/** Merge konfigurace s defaulty */
function mergeConfig(base: CliConfig, override: PartialCliConfig): CliConfig {
  return {
    rules: {
      ...base.rules,
      ...override.rules
    },
    engine: {
      ...base.engine,
      ...override.engine
    },
    output: {
      ...base.output,
      ...override.output
    }
  };
}

/** Cache pro načtenou konfiguraci */
let cachedConfig: CliConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Načte CLI konfiguraci.
 *
 * Priorita:
 * 1. Explicitně zadaná cesta
 * 2. Konfigurační soubor v aktuálním adresáři nebo jeho rodičích
 * 3. Konfigurační soubor v home adresáři
 * 4. Výchozí konfigurace
 */
export function loadConfig(explicitPath?: string): CliConfig {
  const pathToLoad = explicitPath ? resolve(explicitPath) : findConfigFile(process.cwd());

  // Vrať cached konfiguraci pokud je stejná cesta
  if (cachedConfig && cachedConfigPath === pathToLoad) {
    return cachedConfig;
  }

  if (!pathToLoad) {
    cachedConfig = { ...DEFAULT_CLI_CONFIG };
    cachedConfigPath = null;
    return cachedConfig;
  }

  if (!existsSync(pathToLoad)) {
    if (explicitPath) {
      throw new Error(`Configuration file not found: ${pathToLoad}`);
    }
    cachedConfig = { ...DEFAULT_CLI_CONFIG };
    cachedConfigPath = null;
    return cachedConfig;
  }

  const content = readFileSync(pathToLoad, 'utf-8');
  const parsed = parseConfig(content, pathToLoad);
  cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, parsed);
  cachedConfigPath = pathToLoad;

  return cachedConfig;
}

/** Resetuje cache konfigurace (pro testování) */
export function resetConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/** Vrátí cestu k načtené konfiguraci */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}
