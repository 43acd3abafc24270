/**
 * Příkaz validate pro CLI.
 * Validuje knihovnu pravidel ze souboru (YAML nebo JSON).
 */

import type { GlobalOptions, ValidationReport } from '../types.js';
import { RuleLibraryValidator } from '../../validation/rule-validator.js';
import { isObject } from '../../validation/types.js';
import { ValidationError } from '../utils/errors.js';
import { loadYamlFile } from '../utils/file-loader.js';
import { printData, printWarning } from '../utils/output.js';

/** Options pro příkaz validate */
export interface ValidateOptions extends GlobalOptions {
  strict: boolean;
}

function countRules(data: unknown): number {
  const rules = isObject(data) ? data['rules'] : undefined;
  return Array.isArray(rules) ? rules.length : 0;
}

/**
 * Akce příkazu validate.
 */
export async function validateCommand(file: string, options: ValidateOptions): Promise<ValidationReport> {
  const { data, path } = loadYamlFile(file);
  const result = new RuleLibraryValidator({ strict: options.strict }).validate(data);

  const report: ValidationReport = {
    file: path,
    valid: result.valid,
    ruleCount: countRules(data),
    errorCount: result.errors.length,
    warningCount: result.warnings.length,
    errors: result.errors,
    warnings: result.warnings
  };

  printData({ type: 'validation', data: report });

  if (!result.valid) {
    throw new ValidationError(`Validation failed with ${result.errors.length} error(s)`, result.errors);
  }

  // In strict mode, warnings also cause non-zero exit
  if (options.strict && result.warnings.length > 0) {
    printWarning('Strict mode: warnings treated as errors');
    throw new ValidationError(
      `Strict validation failed with ${result.warnings.length} warning(s)`,
      result.warnings
    );
  }

  return report;
}
