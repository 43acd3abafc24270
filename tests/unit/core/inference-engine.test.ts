import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InferenceEngine } from '../../../src/core/inference-engine.js';
import { RuleLibrary } from '../../../src/core/rule-library.js';
import {
  CycleLimitExceededError,
  DuplicateFactError,
  SessionAbortedError,
  SessionStateError
} from '../../../src/core/errors.js';
import type { InferenceSession } from '../../../src/core/session.js';

const nitrogenLibrary = RuleLibrary.load({
  outputKinds: ['diagnosis'],
  rules: [
    {
      name: 'nitrogen-deficiency',
      priority: 10,
      conditions: [
        { kind: 'symptom', attributes: { crop: 'tomato', symptom: 'leaf-yellowing' } },
        { kind: 'soil', attributes: { ph: { operator: 'lt', value: 6.0 } } }
      ],
      actions: [{ type: 'assert', kind: 'diagnosis', attributes: { disease: 'nitrogen-deficiency' } }]
    }
  ]
});

// Asserts a flag when none exists and retracts it again - never settles
const toggleLibrary = RuleLibrary.load({
  outputKinds: ['flag'],
  rules: [
    {
      name: 'toggle-on',
      conditions: [{ type: 'not', kind: 'flag' }],
      actions: [{ type: 'assert', kind: 'flag', attributes: { on: true } }]
    },
    {
      name: 'toggle-off',
      conditions: [{ kind: 'flag', attributes: { on: true }, as: 'f' }],
      actions: [{ type: 'retract', fact: 'f' }]
    }
  ]
});

const chainLibrary = RuleLibrary.load({
  outputKinds: ['diagnosis'],
  rules: [
    {
      name: 'step-1',
      conditions: [{ kind: 'seed' }],
      actions: [{ type: 'assert', kind: 'marker', attributes: { step: 1 } }]
    },
    {
      name: 'step-2',
      conditions: [{ kind: 'marker', attributes: { step: 1 } }],
      actions: [{ type: 'assert', kind: 'marker', attributes: { step: 2 } }]
    },
    {
      name: 'step-3',
      conditions: [{ kind: 'marker', attributes: { step: 2 } }],
      actions: [{ type: 'assert', kind: 'diagnosis', attributes: { done: true } }]
    }
  ]
});

function seedNitrogen(engine: InferenceEngine, session: InferenceSession): void {
  engine.assertObservation(session, 'symptom', { crop: 'tomato', symptom: 'leaf-yellowing' });
  engine.assertObservation(session, 'soil', { ph: 5.5 });
}

describe('InferenceEngine', () => {
  let engine: InferenceEngine;

  beforeEach(async () => {
    engine = await InferenceEngine.start(nitrogenLibrary);
  });

  afterEach(() => {
    for (const session of engine.getSessions()) {
      if (!session.running) engine.endSession(session);
    }
  });

  describe('start()', () => {
    it('uses the default name', () => {
      expect(engine.name).toBe('inference-engine');
      expect(engine.library).toBe(nitrogenLibrary);
    });

    it('rejects invalid limits', async () => {
      await expect(InferenceEngine.start(nitrogenLibrary, { yieldEvery: 0 })).rejects.toThrow(
        'yieldEvery must be an integer >= 1, got 0'
      );
      await expect(InferenceEngine.start(nitrogenLibrary, { maxCycles: -1 })).rejects.toThrow(RangeError);
    });
  });

  describe('sessions', () => {
    it('numbers sessions and keeps them until ended', () => {
      const first = engine.startSession();
      const second = engine.startSession();

      expect(first.id).toBe('session-1');
      expect(second.id).toBe('session-2');
      expect(first.state).toBe('idle');
      expect(engine.getSession('session-2')).toBe(second);
      expect(engine.getSessions()).toHaveLength(2);
    });

    it('keeps working memory separate per session', () => {
      const first = engine.startSession();
      const second = engine.startSession();
      engine.assertObservation(first, 'soil', { ph: 5.5 });

      expect(first.getFacts()).toHaveLength(1);
      expect(second.getFacts()).toHaveLength(0);
    });

    it('rejects duplicate observations', () => {
      const session = engine.startSession();
      engine.assertObservation(session, 'soil', { ph: 5.5 });

      expect(() => engine.assertObservation(session, 'soil', { ph: 5.5 })).toThrow(DuplicateFactError);
    });

    it('retracts observations by id', () => {
      const session = engine.startSession();
      const id = engine.assertObservation(session, 'soil', { ph: 5.5 });
      engine.retractObservation(session, id);

      expect(session.getFacts()).toEqual([]);
    });

    it('ends a session and releases its facts', () => {
      const session = engine.startSession();
      seedNitrogen(engine, session);
      engine.endSession(session);

      expect(session.state).toBe('ended');
      expect(session.facts.size).toBe(0);
      expect(engine.getSession('session-1')).toBeUndefined();
      expect(() => engine.endSession(session)).toThrow('Cannot end session session-1 in state "ended"');
      expect(() => engine.assertObservation(session, 'soil', { ph: 5 })).toThrow(SessionStateError);
    });

    it('refuses to end a session owned by another engine', async () => {
      const other = await InferenceEngine.start(nitrogenLibrary);
      const foreign = other.startSession();
      engine.startSession();

      expect(() => engine.endSession(foreign)).toThrow(SessionStateError);
      other.endSession(foreign);
    });

    it('rejects every operation on a session owned by another engine', async () => {
      const adviceLibrary = RuleLibrary.load({
        outputKinds: ['advice'],
        rules: [
          {
            name: 'lime',
            conditions: [{ kind: 'soil', attributes: { ph: { operator: 'lt', value: 6.0 } } }],
            actions: [{ type: 'assert', kind: 'advice', attributes: { text: 'lime' } }]
          }
        ]
      });
      const other = await InferenceEngine.start(adviceLibrary);
      const foreign = other.startSession();
      const factId = other.assertObservation(foreign, 'soil', { ph: 5.5 });

      await expect(engine.run(foreign)).rejects.toThrow(
        'Cannot run session session-1 in state "idle": session belongs to another engine'
      );
      expect(() => engine.assertObservation(foreign, 'soil', { ph: 5.0 })).toThrow(SessionStateError);
      expect(() => engine.retractObservation(foreign, factId)).toThrow(SessionStateError);
      expect(foreign.state).toBe('idle');
      expect(foreign.facts.size).toBe(1);

      await expect(other.run(foreign)).resolves.toEqual([{ id: 2, kind: 'advice', attributes: { text: 'lime' } }]);
      expect(() => engine.getConclusions(foreign)).toThrow(
        'Cannot collect conclusions from session session-1 in state "quiescent": session belongs to another engine'
      );
      other.endSession(foreign);
    });
  });

  describe('run()', () => {
    it('fires until quiescence and returns conclusions', async () => {
      const session = engine.startSession();
      seedNitrogen(engine, session);

      const conclusions = await engine.run(session);

      expect(conclusions).toEqual([{ id: 3, kind: 'diagnosis', attributes: { disease: 'nitrogen-deficiency' } }]);
      expect(session.state).toBe('quiescent');
      expect(session.getFiringHistory()).toEqual([
        {
          cycle: 1,
          ruleName: 'nitrogen-deficiency',
          priority: 10,
          factIds: [1, 2],
          bindings: {},
          assertedIds: [3],
          retractedIds: [],
          skipped: 0
        }
      ]);
    });

    it('returns no conclusions when no rule fires', async () => {
      const session = engine.startSession();
      engine.assertObservation(session, 'soil', { ph: 7.2 });

      expect(await engine.run(session)).toEqual([]);
      expect(session.toSummary()).toEqual({
        id: 'session-1',
        state: 'quiescent',
        factsCount: 1,
        runs: 1,
        totalCycles: 0,
        lastRunCycles: 0
      });
    });

    it('does not fire the same activation twice', async () => {
      const session = engine.startSession();
      seedNitrogen(engine, session);
      await engine.run(session);

      expect(await engine.run(session)).toHaveLength(1);
      expect(session.getFiringHistory()).toHaveLength(1);
      expect(session.toSummary().lastRunCycles).toBe(0);
    });

    it('continues from the previous state after new observations', async () => {
      const session = engine.startSession();
      engine.assertObservation(session, 'symptom', { crop: 'tomato', symptom: 'leaf-yellowing' });
      expect(await engine.run(session)).toEqual([]);

      engine.assertObservation(session, 'soil', { ph: 5.5 });
      expect(session.state).toBe('idle');

      const conclusions = await engine.run(session);
      expect(conclusions.map((c) => c.id)).toEqual([3]);
      expect(session.toSummary()).toMatchObject({ runs: 2, totalCycles: 1, lastRunCycles: 1 });
    });

    it('fires higher priority rules first', async () => {
      const library = RuleLibrary.load({
        outputKinds: ['diagnosis'],
        rules: [
          {
            name: 'low',
            priority: 1,
            conditions: [{ kind: 'crop' }],
            actions: [{ type: 'assert', kind: 'diagnosis', attributes: { by: 'low' } }]
          },
          {
            name: 'high',
            priority: 10,
            conditions: [{ kind: 'crop' }],
            actions: [{ type: 'assert', kind: 'diagnosis', attributes: { by: 'high' } }]
          }
        ]
      });
      const priorityEngine = await InferenceEngine.start(library);
      const session = priorityEngine.startSession();
      priorityEngine.assertObservation(session, 'crop', { name: 'tomato' });

      const conclusions = await priorityEngine.run(session);

      expect(session.getFiringHistory().map((f) => f.ruleName)).toEqual(['high', 'low']);
      expect(conclusions.map((c) => c.attributes)).toEqual([{ by: 'high' }, { by: 'low' }]);
    });

    it('fires activations over older facts first', async () => {
      const library = RuleLibrary.load({
        outputKinds: ['diagnosis'],
        rules: [
          {
            name: 'per-crop',
            conditions: [{ kind: 'crop', attributes: { name: { var: 'name' } } }],
            actions: [{ type: 'assert', kind: 'diagnosis', attributes: { crop: { var: 'name' } } }]
          }
        ]
      });
      const orderEngine = await InferenceEngine.start(library);
      const session = orderEngine.startSession();
      orderEngine.assertObservation(session, 'crop', { name: 'maize' });
      orderEngine.assertObservation(session, 'crop', { name: 'tomato' });

      const conclusions = await orderEngine.run(session);

      expect(session.getFiringHistory().map((f) => f.factIds)).toEqual([[1], [2]]);
      expect(conclusions).toEqual([
        { id: 3, kind: 'diagnosis', attributes: { crop: 'maize' } },
        { id: 4, kind: 'diagnosis', attributes: { crop: 'tomato' } }
      ]);
    });

    it('skips duplicate conclusions and keeps firing', async () => {
      const library = RuleLibrary.load({
        outputKinds: ['diagnosis'],
        rules: [
          {
            name: 'first',
            conditions: [{ kind: 'crop' }],
            actions: [{ type: 'assert', kind: 'diagnosis', attributes: { disease: 'blight' } }]
          },
          {
            name: 'second',
            conditions: [{ kind: 'crop' }],
            actions: [{ type: 'assert', kind: 'diagnosis', attributes: { disease: 'blight' } }]
          }
        ]
      });
      const dupEngine = await InferenceEngine.start(library, { tracing: { enabled: true } });
      const session = dupEngine.startSession();
      dupEngine.assertObservation(session, 'crop', { name: 'tomato' });

      const conclusions = await dupEngine.run(session);

      expect(conclusions).toEqual([{ id: 2, kind: 'diagnosis', attributes: { disease: 'blight' } }]);
      expect(session.getFiringHistory().map((f) => [f.ruleName, f.assertedIds, f.skipped])).toEqual([
        ['first', [2], 0],
        ['second', [], 1]
      ]);

      const [skipped] = dupEngine.getTraceCollector().getByType('action_skipped');
      expect(skipped?.ruleName).toBe('second');
      expect(skipped?.details).toEqual({
        actionIndex: 0,
        actionType: 'assert',
        error: 'Fact diagnosis is already asserted as #2'
      });
    });

    it('throws when the cycle limit is reached with pending activations', async () => {
      const loopEngine = await InferenceEngine.start(toggleLibrary, { maxCycles: 5, recentFiringsOnLimit: 3 });
      const session = loopEngine.startSession();

      const error = await loopEngine.run(session).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CycleLimitExceededError);
      if (error instanceof CycleLimitExceededError) {
        expect(error.message).toBe(
          'Session session-1 exceeded 5 inference cycles (last fired: toggle-on → toggle-off → toggle-on)'
        );
        expect(error.recentFirings.map((f) => f.cycle)).toEqual([3, 4, 5]);
      }
      expect(session.state).toBe('cycle_limit_exceeded');
      await expect(loopEngine.run(session)).rejects.toThrow(
        'Cannot run session session-1 in state "cycle_limit_exceeded"'
      );
    });

    it('lets a run override maxCycles', async () => {
      const loopEngine = await InferenceEngine.start(toggleLibrary);
      const session = loopEngine.startSession();

      await expect(loopEngine.run(session, { maxCycles: 0 })).rejects.toThrow(
        'Session session-1 exceeded 0 inference cycles'
      );
      expect(session.getFiringHistory()).toEqual([]);
    });

    it('allows a rule to fire again once its activation was lost and regained', async () => {
      const loopEngine = await InferenceEngine.start(toggleLibrary, { maxCycles: 4 });
      const session = loopEngine.startSession();

      await expect(loopEngine.run(session)).rejects.toThrow(CycleLimitExceededError);
      expect(session.getFiringHistory().map((f) => f.ruleName)).toEqual([
        'toggle-on',
        'toggle-off',
        'toggle-on',
        'toggle-off'
      ]);
      expect(session.getFiringHistory().map((f) => f.assertedIds)).toEqual([[1], [], [2], []]);
    });

    it('stops before matching when the signal is already aborted', async () => {
      const session = engine.startSession();
      seedNitrogen(engine, session);
      const controller = new AbortController();
      controller.abort();

      await expect(engine.run(session, { signal: controller.signal })).rejects.toThrow(
        'Session session-1 was aborted after 0 cycle(s)'
      );
      expect(session.state).toBe('aborted');
      expect(session.facts.size).toBe(2);
    });

    it('stops at the next matching step when aborted mid-run', async () => {
      const loopEngine = await InferenceEngine.start(toggleLibrary, { tracing: { enabled: true } });
      const session = loopEngine.startSession();
      const controller = new AbortController();
      loopEngine.getTraceCollector().subscribe((entry) => {
        if (entry.type === 'activation_fired' && entry.cycle === 2) controller.abort();
      });

      const error = await loopEngine.run(session, { signal: controller.signal }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SessionAbortedError);
      if (error instanceof SessionAbortedError) {
        expect(error.cycles).toBe(2);
      }
      expect(session.getFiringHistory()).toHaveLength(2);
    });

    it('rejects observations while firing', async () => {
      const tracedEngine = await InferenceEngine.start(nitrogenLibrary, { tracing: { enabled: true } });
      const session = tracedEngine.startSession();
      seedNitrogen(tracedEngine, session);
      let rejection: unknown;
      tracedEngine.getTraceCollector().subscribe((entry) => {
        if (entry.type !== 'activation_fired') return;
        try {
          tracedEngine.assertObservation(session, 'soil', { ph: 4 });
        } catch (err) {
          rejection = err;
        }
      });

      await tracedEngine.run(session);

      expect(rejection).toBeInstanceOf(SessionStateError);
      expect(rejection).toHaveProperty('message', 'Cannot assert observations into session session-1 in state "firing"');
    });

    it('interleaves concurrent sessions at yield points', async () => {
      const chainEngine = await InferenceEngine.start(chainLibrary, { yieldEvery: 1, tracing: { enabled: true } });
      const first = chainEngine.startSession();
      const second = chainEngine.startSession();
      chainEngine.assertObservation(first, 'seed', {});
      chainEngine.assertObservation(second, 'seed', {});

      const [a, b] = await Promise.all([chainEngine.run(first), chainEngine.run(second)]);

      expect(a).toEqual(b);
      expect(chainEngine.getTraceCollector().getByType('activation_fired').map((e) => e.sessionId)).toEqual([
        'session-1',
        'session-2',
        'session-1',
        'session-2',
        'session-1',
        'session-2'
      ]);
    });
  });

  describe('getConclusions()', () => {
    it('requires a quiescent session', async () => {
      const session = engine.startSession();
      seedNitrogen(engine, session);

      expect(() => engine.getConclusions(session)).toThrow(
        'Cannot collect conclusions from session session-1 in state "idle"'
      );

      await engine.run(session);
      expect(engine.getConclusions(session).map((c) => c.kind)).toEqual(['diagnosis']);
    });
  });

  describe('stats and tracing', () => {
    it('counts sessions, runs and cycles', async () => {
      const session = engine.startSession();
      seedNitrogen(engine, session);
      await engine.run(session);

      expect(engine.getStats()).toEqual({
        rulesCount: 1,
        outputKinds: ['diagnosis'],
        activeSessions: 1,
        sessionsStarted: 1,
        runsCompleted: 1,
        runsFailed: 0,
        totalCycles: 1,
        avgRunTimeMs: expect.any(Number),
        tracing: { enabled: false, entriesCount: 0, maxEntries: 10000 }
      });
    });

    it('counts failed runs', async () => {
      const loopEngine = await InferenceEngine.start(toggleLibrary, { maxCycles: 2 });
      const session = loopEngine.startSession();
      await expect(loopEngine.run(session)).rejects.toThrow(CycleLimitExceededError);

      expect(loopEngine.getStats()).toMatchObject({ runsCompleted: 0, runsFailed: 1, totalCycles: 2 });
    });

    it('records a trace of the whole run when enabled', async () => {
      engine.enableTracing();
      const session = engine.startSession();
      seedNitrogen(engine, session);
      await engine.run(session);
      engine.endSession(session);

      const entries = engine.getTraceCollector().getBySession('session-1');
      expect(entries.map((e) => e.type)).toEqual([
        'session_started',
        'fact_asserted',
        'fact_asserted',
        'fact_asserted',
        'activation_fired',
        'quiescent',
        'session_ended'
      ]);
      expect(entries[3]?.details).toEqual({
        factId: 3,
        kind: 'diagnosis',
        attributes: { disease: 'nitrogen-deficiency' }
      });
      expect(entries[4]).toMatchObject({ cycle: 1, ruleName: 'nitrogen-deficiency' });
    });

    it('toggles tracing', () => {
      expect(engine.isTracingEnabled()).toBe(false);
      engine.enableTracing();
      expect(engine.isTracingEnabled()).toBe(true);
      engine.disableTracing();
      expect(engine.isTracingEnabled()).toBe(false);
    });
  });
});
