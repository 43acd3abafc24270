import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { Activation, FiringRecord } from '../types/activation.js';
import type { Conclusion, FactAttributes } from '../types/fact.js';
import type { RunOptions } from '../types/session.js';
import type { EngineStats, InferenceEngineConfig } from '../types/index.js';
import { TraceCollector } from '../debugging/trace-collector.js';
import { ActionExecutor } from '../evaluation/action-executor.js';
import { collectConclusions } from './conclusion-collector.js';
import { ConflictResolver } from './conflict-resolver.js';
import { CycleLimitExceededError, SessionAbortedError, SessionStateError } from './errors.js';
import type { RuleLibrary } from './rule-library.js';
import { InferenceSession } from './session.js';

type ResolvedConfig = Required<Omit<InferenceEngineConfig, 'tracing'>>;

/**
 * Inferenční engine - dopředné řetězení nad sdílenou, zmraženou knihovnou pravidel.
 *
 * Každá session má vlastní pracovní paměť a běží sekvenčně:
 * matching → výběr aktivace → firing → matching … až do klidového stavu
 * (`quiescent`) nebo překročení stropu cyklů. Více session se může
 * prokládat, `run` pravidelně předává řízení event loopu.
 */
export class InferenceEngine {
  private readonly ruleLibrary: RuleLibrary;
  private readonly config: ResolvedConfig;
  private readonly traceCollector: TraceCollector;
  private readonly resolver = new ConflictResolver();

  private readonly sessions = new Map<string, InferenceSession>();
  private sessionCounter = 0;

  private readonly internals = {
    sessionsStarted: 0,
    runsCompleted: 0,
    runsFailed: 0,
    totalCycles: 0,
    totalRunTimeMs: 0
  };

  private constructor(library: RuleLibrary, traceCollector: TraceCollector, config: InferenceEngineConfig) {
    this.ruleLibrary = library;
    this.traceCollector = traceCollector;

    this.config = {
      name: config.name ?? 'inference-engine',
      maxCycles: requireCount('maxCycles', config.maxCycles ?? 10_000, 0),
      recentFiringsOnLimit: requireCount('recentFiringsOnLimit', config.recentFiringsOnLimit ?? 10, 0),
      historySize: requireCount('historySize', config.historySize ?? 1_000, 0),
      yieldEvery: requireCount('yieldEvery', config.yieldEvery ?? 100, 1)
    };
  }

  /**
   * Vytvoří engine nad načtenou knihovnou pravidel.
   */
  static async start(library: RuleLibrary, config: InferenceEngineConfig = {}): Promise<InferenceEngine> {
    const traceCollector = new TraceCollector({
      enabled: config.tracing?.enabled ?? false,
      maxEntries: config.tracing?.maxEntries ?? 10_000
    });

    return new InferenceEngine(library, traceCollector, config);
  }

  get library(): RuleLibrary {
    return this.ruleLibrary;
  }

  get name(): string {
    return this.config.name;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                              SESSIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Založí novou session s prázdnou pracovní pamětí.
   */
  startSession(): InferenceSession {
    const id = `session-${++this.sessionCounter}`;

    const session = new InferenceSession({
      id,
      library: this.ruleLibrary,
      historySize: Math.max(this.config.historySize, this.config.recentFiringsOnLimit),
      onFactChange: (event) => {
        this.traceCollector.record(
          event.type === 'asserted' ? 'fact_asserted' : 'fact_retracted',
          { factId: event.fact.id, kind: event.fact.kind, attributes: event.fact.attributes },
          { sessionId: id }
        );
      }
    });

    this.sessions.set(id, session);
    this.internals.sessionsStarted++;
    this.traceCollector.record('session_started', { rulesCount: this.ruleLibrary.size }, { sessionId: id });

    return session;
  }

  getSession(id: string): InferenceSession | undefined {
    return this.sessions.get(id);
  }

  getSessions(): InferenceSession[] {
    return [...this.sessions.values()];
  }

  /**
   * Vloží pozorování do session. Povoleno jen před během nebo mezi běhy.
   *
   * @throws {DuplicateFactError} Pokud identický fakt už je živý
   */
  assertObservation(session: InferenceSession, kind: string, attributes: FactAttributes): number {
    session.ensureWritable('assert observations into');
    this.ensureOwned(session, 'assert observations into');
    const factId = session.facts.assert(kind, attributes);
    session.transition('idle');
    return factId;
  }

  /**
   * Odebere fakt ze session. Povoleno jen před během nebo mezi běhy.
   *
   * @throws {UnknownFactError} Pokud fakt není živý
   */
  retractObservation(session: InferenceSession, factId: number): void {
    session.ensureWritable('retract observations from');
    this.ensureOwned(session, 'retract observations from');
    session.facts.retract(factId);
    session.transition('idle');
  }

  /**
   * Dopředné řetězení až do klidového stavu. Vrací závěry v pořadí vložení.
   *
   * @throws {CycleLimitExceededError} Pokud po `maxCycles` vystřeleních zbývá aktivace
   * @throws {SessionAbortedError} Pokud byl běh zrušen přes `signal`
   * @throws {SessionStateError} Pokud session nelze spustit
   */
  async run(session: InferenceSession, options: RunOptions = {}): Promise<Conclusion[]> {
    session.ensureRunnable();
    this.ensureOwned(session, 'run');

    const maxCycles = requireCount('maxCycles', options.maxCycles ?? this.config.maxCycles, 0);
    const startedAt = performance.now();
    let cycles = 0;

    session.beginRun();

    try {
      for (;;) {
        if (options.signal?.aborted) {
          session.transition('aborted');
          this.traceCollector.record('session_aborted', { cycles }, { sessionId: session.id, cycle: cycles });
          throw new SessionAbortedError(session.id, cycles);
        }

        session.transition('matching');
        const next = this.resolver.select(session.eligibleActivations());

        if (!next) {
          session.transition('quiescent');
          this.traceCollector.record(
            'quiescent',
            { cycles, factsCount: session.facts.size },
            { sessionId: session.id, cycle: cycles, durationMs: performance.now() - startedAt }
          );
          this.internals.runsCompleted++;
          return collectConclusions(session.facts, this.ruleLibrary.outputKinds);
        }

        if (cycles >= maxCycles) {
          const recentFirings = session.getRecentFirings(this.config.recentFiringsOnLimit);
          session.transition('cycle_limit_exceeded');
          this.traceCollector.record(
            'cycle_limit_exceeded',
            { limit: maxCycles, pending: next.rule.name, recentFirings: recentFirings.map((f) => f.ruleName) },
            { sessionId: session.id, cycle: cycles }
          );
          throw new CycleLimitExceededError(session.id, maxCycles, recentFirings);
        }

        session.transition('firing');
        this.fire(session, next, ++cycles);

        if (cycles % this.config.yieldEvery === 0) {
          await yieldToEventLoop();
        }
      }
    } catch (error) {
      if (!session.failed) {
        session.transition('aborted');
      }
      this.internals.runsFailed++;
      throw error;
    } finally {
      this.internals.totalCycles += cycles;
      this.internals.totalRunTimeMs += performance.now() - startedAt;
    }
  }

  /**
   * Závěry session v klidovém stavu.
   */
  getConclusions(session: InferenceSession): Conclusion[] {
    session.ensureQuiescent('collect conclusions from');
    this.ensureOwned(session, 'collect conclusions from');
    return collectConclusions(session.facts, this.ruleLibrary.outputKinds);
  }

  /**
   * Ukončí session a uvolní její pracovní paměť.
   */
  endSession(session: InferenceSession): void {
    session.ensureSettled('end');
    this.ensureOwned(session, 'end');

    this.traceCollector.record(
      'session_ended',
      { ...session.toSummary() },
      { sessionId: session.id }
    );
    session.release();
    this.sessions.delete(session.id);
  }

  /** Session musí patřit tomuto enginu - jiný engine má jinou knihovnu i výstupní druhy. */
  private ensureOwned(session: InferenceSession, operation: string): void {
    if (this.sessions.get(session.id) !== session) {
      throw new SessionStateError(session.id, session.state, operation, 'session belongs to another engine');
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                          STATISTIKY A TRACING
  // ═══════════════════════════════════════════════════════════════════════════

  getStats(): EngineStats {
    const { sessionsStarted, runsCompleted, runsFailed, totalCycles, totalRunTimeMs } = this.internals;
    const runs = runsCompleted + runsFailed;
    const traceStats = this.traceCollector.getStats();

    return {
      rulesCount: this.ruleLibrary.size,
      outputKinds: [...this.ruleLibrary.outputKinds],
      activeSessions: this.sessions.size,
      sessionsStarted,
      runsCompleted,
      runsFailed,
      totalCycles,
      avgRunTimeMs: runs > 0 ? totalRunTimeMs / runs : 0,
      tracing: {
        enabled: this.traceCollector.isEnabled(),
        entriesCount: traceStats.entriesCount,
        maxEntries: traceStats.maxEntries
      }
    };
  }

  enableTracing(): void {
    this.traceCollector.enable();
  }

  disableTracing(): void {
    this.traceCollector.disable();
  }

  isTracingEnabled(): boolean {
    return this.traceCollector.isEnabled();
  }

  getTraceCollector(): TraceCollector {
    return this.traceCollector;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                         INTERNÍ METODY
  // ═══════════════════════════════════════════════════════════════════════════

  private fire(session: InferenceSession, activation: Activation, cycle: number): void {
    const startedAt = performance.now();
    const ruleName = activation.rule.name;

    session.markFired(activation);

    const executor = new ActionExecutor(session.facts);
    const results = executor.execute(activation, {
      onActionSkipped: (info) => {
        this.traceCollector.record(
          'action_skipped',
          { actionIndex: info.actionIndex, actionType: info.actionType, error: info.error.message },
          { sessionId: session.id, cycle, ruleName }
        );
      }
    });

    const idsOf = (type: 'assert' | 'retract'): number[] =>
      results.flatMap((r) => (r.success && r.action.type === type && r.factId !== undefined ? [r.factId] : []));

    const record: FiringRecord = {
      cycle,
      ruleName,
      priority: activation.rule.priority,
      factIds: activation.facts.map((f) => f.id),
      bindings: activation.bindings,
      assertedIds: idsOf('assert'),
      retractedIds: idsOf('retract'),
      skipped: results.filter((r) => r.skipped === true).length
    };

    session.recordFiring(record);

    this.traceCollector.record(
      'activation_fired',
      {
        priority: record.priority,
        factIds: record.factIds,
        bindings: record.bindings,
        assertedIds: record.assertedIds,
        retractedIds: record.retractedIds,
        skipped: record.skipped
      },
      { sessionId: session.id, cycle, ruleName, durationMs: performance.now() - startedAt }
    );
  }
}

function requireCount(option: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${option} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}
