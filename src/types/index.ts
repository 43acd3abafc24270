export * from './fact.js';
export * from './condition.js';
export * from './action.js';
export * from './rule.js';
export * from './activation.js';
export * from './session.js';

/** Statistiky tracingu */
export interface TracingStats {
  enabled: boolean;
  entriesCount: number;
  maxEntries: number;
}

/** Statistiky enginu */
export interface EngineStats {
  rulesCount: number;
  outputKinds: string[];
  activeSessions: number;
  sessionsStarted: number;
  runsCompleted: number;
  runsFailed: number;
  totalCycles: number;
  avgRunTimeMs: number;
  tracing?: TracingStats;
}

/** Konfigurace tracingu */
export interface TracingConfig {
  /** Povolit tracing při startu enginu (default: false) */
  enabled?: boolean;

  /** Maximální počet trace entries v ring bufferu (default: 10000) */
  maxEntries?: number;
}

/** Konfigurace inferenčního enginu */
export interface InferenceEngineConfig {
  name?: string;
  maxCycles?: number;              // Strop vystřelení v jednom běhu (default: 10000)
  recentFiringsOnLimit?: number;   // Kolik posledních vystřelení přiložit k CycleLimitExceededError (default: 10)
  historySize?: number;            // Max. záznamů historie vystřelení na session (default: 1000)
  yieldEvery?: number;             // Po kolika cyklech předat řízení event loopu (default: 100)
  tracing?: TracingConfig;         // Konfigurace debugging tracingu
}
