/**
 * Příkaz run pro CLI.
 * Spustí poradenskou session nad souborem s pozorováními.
 */

import type { AdviceReport, GlobalOptions } from '../types.js';
import { InferenceEngine } from '../../core/inference-engine.js';
import type { RuleLibrary } from '../../core/rule-library.js';
import type { Conclusion, ObservationInput } from '../../types/fact.js';
import { CycleLimitExceededError, DuplicateFactError, SessionAbortedError } from '../../core/errors.js';
import { loadRuleLibraryFromFile } from '../../dsl/yaml/loader.js';
import { loadObservationsFromFile } from '../../dsl/yaml/observations.js';
import { YamlLoadError } from '../../dsl/helpers/errors.js';
import { RuleLibraryError } from '../../validation/rule-library-error.js';
import { InferenceFailedError, ValidationError } from '../utils/errors.js';
import { requireFile } from '../utils/file-loader.js';
import { printData, printWarning } from '../utils/output.js';

/** Options pro příkaz run */
export interface RunCommandOptions extends GlobalOptions {
  rules: string;
  maxCycles: number;
  trace: boolean;
}

/** Převede chyby načítání na CLI chyby s exit kódem validace */
function asValidationError(err: unknown): unknown {
  if (err instanceof RuleLibraryError) {
    return new ValidationError(err.message, err.issues, err);
  }
  if (err instanceof YamlLoadError) {
    return new ValidationError(err.message, [], err);
  }
  return err;
}

/**
 * Akce příkazu run.
 */
export async function runCommand(observationsFile: string, options: RunCommandOptions): Promise<AdviceReport> {
  const rulesPath = requireFile(options.rules);
  const observationsPath = requireFile(observationsFile);

  let library: RuleLibrary;
  let observations: ObservationInput[];
  try {
    library = await loadRuleLibraryFromFile(rulesPath);
    observations = await loadObservationsFromFile(observationsPath);
  } catch (err) {
    throw asValidationError(err);
  }

  const engine = await InferenceEngine.start(library, { maxCycles: options.maxCycles });
  const session = engine.startSession();

  try {
    for (const observation of observations) {
      try {
        engine.assertObservation(session, observation.kind, observation.attributes);
      } catch (err) {
        if (!(err instanceof DuplicateFactError)) throw err;
        printWarning(`Skipping duplicate observation: ${err.message}`);
      }
    }

    let conclusions: Conclusion[];
    try {
      conclusions = await engine.run(session);
    } catch (err) {
      if (err instanceof CycleLimitExceededError) {
        throw new InferenceFailedError(err.message, err.recentFirings, err);
      }
      if (err instanceof SessionAbortedError) {
        throw new InferenceFailedError(err.message, [], err);
      }
      throw err;
    }

    const summary = session.toSummary();
    const report: AdviceReport = {
      rules: rulesPath,
      observations: observationsPath,
      state: summary.state,
      cycles: summary.lastRunCycles,
      factsCount: summary.factsCount,
      conclusions,
      ...(options.trace && { firings: session.getFiringHistory() })
    };

    printData({ type: 'advice', data: report });
    return report;
  } finally {
    engine.endSession(session);
  }
}
