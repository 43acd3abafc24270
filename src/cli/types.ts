/**
 * CLI typy pro agri-advisor.
 */

import type { Conclusion } from '../types/fact.js';
import type { FiringRecord } from '../types/activation.js';
import type { SessionState } from '../types/session.js';
import type { ValidationIssue } from '../validation/types.js';

/** Podporované výstupní formáty */
export type OutputFormat = 'json' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'pretty'];

/** Exit kódy CLI */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4,
  InferenceFailed: 5
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Globální CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  config: string | undefined;
}

/** CLI konfigurace (z konfiguračního souboru) */
export interface CliConfig {
  rules: {
    /** Knihovna pravidel pro `run`, jinak vestavěná */
    path?: string;
  };
  engine: {
    maxCycles: number;
  };
  output: {
    format: OutputFormat;
    colors: boolean;
  };
}

/** Výchozí CLI konfigurace */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  rules: {},
  engine: {
    maxCycles: 10_000
  },
  output: {
    format: 'pretty',
    colors: true
  }
};

/** Výsledek příkazu validate */
export interface ValidationReport {
  file: string;
  valid: boolean;
  ruleCount: number;
  errorCount: number;
  warningCount: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/** Výsledek příkazu run */
export interface AdviceReport {
  rules: string;
  observations: string;
  state: SessionState;
  cycles: number;
  factsCount: number;
  conclusions: Conclusion[];
  /** Jen s `--trace` */
  firings?: FiringRecord[];
}

/** Formátovatelná data pro výstup */
export type FormattableData =
  | { type: 'validation'; data: ValidationReport; meta?: Record<string, unknown> }
  | { type: 'advice'; data: AdviceReport; meta?: Record<string, unknown> }
  | { type: 'message'; data: string; meta?: Record<string, unknown> }
  | { type: 'error'; data: string; meta?: Record<string, unknown> };
