/**
 * Hlavní CLI setup pomocí CAC.
 */

import { cac } from 'cac';
import { version } from './version.js';
import { OUTPUT_FORMATS, type GlobalOptions, type OutputFormat } from './types.js';
import { loadConfig } from './utils/config.js';
import { setOutputOptions, printData } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { validateCommand, type ValidateOptions } from './commands/validate.js';
import { runCommand, type RunCommandOptions } from './commands/run.js';
import { DEFAULT_RULES_PATH } from '../advisory/advise.js';

/** CLI instance */
const cli = cac('agri-advisor');

/**
 * Promise z běžící async akce.
 * CAC neawaituje async action handlery, musíme to udělat sami.
 */
let _actionPromise: Promise<void> | undefined;

/** Obalí async action handler tak, aby se jeho Promise dala awaitovat v run(). */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args);
  };
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidArgumentsError(`--${key} expects a value`);
  }
  return value;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Parsuje nezáporné celé číslo z argumentu (cac předává čísla i stringy) */
function countOption(options: Record<string, unknown>, key: string, flag: string): number | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  const count = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentsError(`${flag} must be a non-negative integer, got ${String(value)}`);
  }
  return count;
}

/** Zpracuje globální options */
function processGlobalOptions(options: Record<string, unknown>): GlobalOptions {
  const configPath = stringOption(options, 'config');
  const config = loadConfig(configPath);

  const rawFormat = stringOption(options, 'format');
  if (rawFormat !== undefined && !isOutputFormat(rawFormat)) {
    throw new InvalidArgumentsError(`Unknown format "${rawFormat}". Valid formats: ${OUTPUT_FORMATS.join(', ')}`);
  }
  const format = rawFormat ?? config.output.format;
  const quiet = options['quiet'] === true;
  // cac mapuje --no-color na color: false
  const noColor = options['color'] === false || !config.output.colors;

  setOutputOptions({ format, quiet, noColor });

  return {
    format,
    quiet,
    noColor,
    config: configPath
  };
}

/** Spustí akci příkazu a převede chybu na exit kód */
async function execute(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (err) {
    printData({ type: 'error', data: formatError(err), meta: { exitCode: getExitCode(err) } });
    process.exit(getExitCode(err));
  }
}

/** Registruje globální options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, pretty', {
      default: undefined
    })
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file');
}

/** Registruje příkaz version */
function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    console.log(`agri-advisor v${version}`);
  });
}

/** Registruje příkaz validate */
function registerValidateCommand(): void {
  cli
    .command('validate <file>', 'Validate a rule library file (YAML or JSON)')
    .option('-s, --strict', 'Enable strict validation mode')
    .action(tracked((file: string, options: Record<string, unknown>) =>
      execute(async () => {
        const validateOptions: ValidateOptions = {
          ...processGlobalOptions(options),
          strict: options['strict'] === true
        };
        await validateCommand(file, validateOptions);
      })
    ));
}

/** Registruje příkaz run */
function registerRunCommand(): void {
  cli
    .command('run <observations>', 'Run an advisory session over an observations file')
    .option('-r, --rules <file>', 'Rule library file (default: bundled crop advisory rules)')
    .option('--max-cycles <n>', 'Maximum number of rule firings')
    .option('-t, --trace', 'Include the firing history in the output')
    .action(tracked((observations: string, options: Record<string, unknown>) =>
      execute(async () => {
        const globalOptions = processGlobalOptions(options);
        const config = loadConfig(globalOptions.config);
        const runOptions: RunCommandOptions = {
          ...globalOptions,
          rules: stringOption(options, 'rules') ?? config.rules.path ?? DEFAULT_RULES_PATH,
          maxCycles: countOption(options, 'maxCycles', '--max-cycles') ?? config.engine.maxCycles,
          trace: options['trace'] === true
        };
        await runCommand(observations, runOptions);
      })
    ));
}

/** Inicializuje a spustí CLI */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerValidateCommand();
  registerRunCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    printData({ type: 'error', data: formatError(err), meta: { exitCode: getExitCode(err) } });
    process.exit(getExitCode(err));
  }
}

export { cli };
