/**
 * Výstup CLI.
 *
 * Reporty (validace, doporučení) a chyby jdou přes formátter podle
 * `--format`. Varování k vstupním datům jdou vždy jako řádek na stderr,
 * aby nerozbila JSON report na stdout.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { createFormatter } from '../formatters/index.js';

interface OutputSettings {
  quiet: boolean;
  noColor: boolean;
  format: OutputFormat;
}

let settings: OutputSettings = {
  quiet: false,
  noColor: false,
  format: 'pretty'
};

/** Nastaví globální options (z `--format`, `--quiet`, `--no-color` a configu) */
export function setOutputOptions(options: Partial<OutputSettings>): void {
  settings = { ...settings, ...options };
}

function useColors(): boolean {
  if (settings.noColor || process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  return process.env['FORCE_COLOR'] !== undefined || process.stdout.isTTY === true;
}

/** Report na stdout, chyba na stderr. Quiet potlačí vše kromě chyb. */
export function printData(data: FormattableData): void {
  if (data.type === 'error') {
    console.error(createFormatter(settings.format, useColors()).format(data));
    return;
  }
  if (!settings.quiet) {
    console.log(createFormatter(settings.format, useColors()).format(data));
  }
}

/** Varování (přeskočené pozorování, strict režim) na stderr */
export function printWarning(message: string): void {
  console.error(useColors() ? `\x1b[33m⚠ ${message}\x1b[0m` : `⚠ ${message}`);
}
