import type { Activation, FiringRecord } from '../types/activation.js';
import type { Fact } from '../types/fact.js';
import type { SessionState, SessionSummary } from '../types/session.js';
import { FactStore, type FactChangeListener } from './fact-store.js';
import { Matcher } from './matcher.js';
import type { RuleLibrary } from './rule-library.js';
import { SessionStateError } from './errors.js';

export interface InferenceSessionConfig {
  id: string;
  library: RuleLibrary;
  historySize: number;
  onFactChange?: FactChangeListener;
}

/** Stavy, ze kterých už session nelze spustit ani do ní vkládat fakty */
const FAILED_STATES: ReadonlySet<SessionState> = new Set(['cycle_limit_exceeded', 'aborted']);

/**
 * Jedna inferenční session: vlastní pracovní paměť, matcher s cache
 * aktivací, refrakční paměť a historii vystřelení.
 *
 * Stavové přechody řídí InferenceEngine, session jen hlídá, které
 * operace jsou v daném stavu povolené.
 */
export class InferenceSession {
  readonly id: string;
  readonly startedAt: number;

  private readonly store: FactStore;
  private readonly matcher: Matcher;
  private readonly historySize: number;

  private currentState: SessionState = 'idle';
  private readonly fired = new Set<string>();
  private readonly history: FiringRecord[] = [];
  private runs = 0;
  private totalCycles = 0;
  private lastRunCycles = 0;

  constructor(config: InferenceSessionConfig) {
    this.id = config.id;
    this.startedAt = Date.now();
    this.historySize = config.historySize;

    const listener = config.onFactChange;
    this.store = new FactStore({
      name: `${config.id}-facts`,
      onFactChange: (event) => {
        this.matcher.invalidate(event.fact.kind);
        listener?.(event);
      }
    });
    this.matcher = new Matcher(config.library, this.store);
  }

  get state(): SessionState {
    return this.currentState;
  }

  get facts(): FactStore {
    return this.store;
  }

  get firedCount(): number {
    return this.fired.size;
  }

  /** Vrátí živé fakty v pořadí vložení. */
  getFacts(): Fact[] {
    return this.store.getAll();
  }

  /** Historie vystřelení, nejstarší první (omezená na `historySize`). */
  getFiringHistory(): FiringRecord[] {
    return [...this.history];
  }

  /** Posledních `count` vystřelení. */
  getRecentFirings(count: number): FiringRecord[] {
    return count > 0 ? this.history.slice(-count) : [];
  }

  toSummary(): SessionSummary {
    return {
      id: this.id,
      state: this.currentState,
      factsCount: this.store.size,
      runs: this.runs,
      totalCycles: this.totalCycles,
      lastRunCycles: this.lastRunCycles
    };
  }

  /**
   * Ověří, že session přijímá nová pozorování (před během nebo mezi běhy).
   */
  ensureWritable(operation: string): void {
    if (this.currentState !== 'idle' && this.currentState !== 'quiescent') {
      throw new SessionStateError(this.id, this.currentState, operation);
    }
  }

  ensureRunnable(): void {
    this.ensureWritable('run');
  }

  ensureQuiescent(operation: string): void {
    if (this.currentState !== 'quiescent') {
      throw new SessionStateError(this.id, this.currentState, operation);
    }
  }

  /** Session, která právě neběží a ještě neskončila. */
  ensureSettled(operation: string): void {
    if (this.running || this.currentState === 'ended') {
      throw new SessionStateError(this.id, this.currentState, operation);
    }
  }

  get running(): boolean {
    return this.currentState === 'matching' || this.currentState === 'firing';
  }

  get failed(): boolean {
    return FAILED_STATES.has(this.currentState);
  }

  transition(state: SessionState): void {
    this.currentState = state;
  }

  beginRun(): void {
    this.runs++;
    this.lastRunCycles = 0;
  }

  /**
   * Spočítá aktivace a vrátí ty, které ještě nevystřelily.
   *
   * Refrakční záznamy aktivací, které už nejsou splněné, se zahodí,
   * takže aktivace může vystřelit znovu, až bude opět splněna.
   */
  eligibleActivations(): Activation[] {
    const activations = this.matcher.match();
    const current = new Set(activations.map((a) => a.key));

    for (const key of this.fired) {
      if (!current.has(key)) {
        this.fired.delete(key);
      }
    }

    return activations.filter((a) => !this.fired.has(a.key));
  }

  markFired(activation: Activation): void {
    this.fired.add(activation.key);
  }

  recordFiring(record: FiringRecord): void {
    this.lastRunCycles = record.cycle;
    this.totalCycles++;
    this.history.push(record);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
  }

  /** Uvolní pracovní paměť a převede session do stavu `ended`. */
  release(): void {
    this.store.clear();
    this.matcher.reset();
    this.fired.clear();
    this.currentState = 'ended';
  }
}
