/**
 * Error thrown when a rule library fails to load.
 *
 * Carries every issue found so a broken rule file can be fixed in one pass.
 *
 * @module
 */

import { InferenceError } from '../core/errors.js';
import type { ValidationIssue } from './types.js';

export class RuleLibraryError extends InferenceError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message, 'RULE_LIBRARY_ERROR');
    this.name = 'RuleLibraryError';
    this.issues = issues;
  }

  /** Exposes issues as `details`, like the other structured errors. */
  get details(): ValidationIssue[] {
    return this.issues;
  }
}
