/** Stavy session (stavový automat inference) */
export type SessionState =
  | 'idle'
  | 'matching'
  | 'firing'
  | 'quiescent'
  | 'cycle_limit_exceeded'
  | 'aborted'
  | 'ended';

/** Volby jednoho běhu inference */
export interface RunOptions {
  /** Zrušení běhu - kontrolováno na začátku každé fáze matching */
  signal?: AbortSignal;

  /** Přepíše `maxCycles` enginu pro tento běh */
  maxCycles?: number;
}

/** Souhrn session pro diagnostiku */
export interface SessionSummary {
  id: string;
  state: SessionState;
  factsCount: number;
  runs: number;
  totalCycles: number;
  lastRunCycles: number;
}
