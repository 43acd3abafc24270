import type { AttributeValue, FactAttributes } from '../types/fact.js';
import type { FiringRecord } from '../types/activation.js';
import type { SessionState } from '../types/session.js';

/**
 * Společný předek všech chyb inferenčního jádra.
 *
 * Každá chyba nese stabilní `code`, podle kterého ji lze rozlišit
 * i po serializaci (CLI, logy).
 */
export class InferenceError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'InferenceError';
    this.code = code;
  }
}

/** Identický fakt (druh + atributy) už v pracovní paměti je. Zotavitelná. */
export class DuplicateFactError extends InferenceError {
  readonly kind: string;
  readonly attributes: FactAttributes;
  readonly existingId: number;

  constructor(kind: string, attributes: Readonly<Record<string, AttributeValue>>, existingId: number) {
    super(`Fact ${kind} is already asserted as #${existingId}`, 'DUPLICATE_FACT');
    this.name = 'DuplicateFactError';
    this.kind = kind;
    this.attributes = attributes;
    this.existingId = existingId;
  }
}

/** Atribut faktu nemá povolenou hodnotu (např. NaN nebo Infinity). */
export class InvalidFactError extends InferenceError {
  readonly kind: string;
  readonly attribute: string;

  constructor(kind: string, attribute: string) {
    super(
      `Attribute "${attribute}" of fact ${kind} must be a string, boolean, null, finite number or a list of them`,
      'INVALID_FACT'
    );
    this.name = 'InvalidFactError';
    this.kind = kind;
    this.attribute = attribute;
  }
}

/** Fakt s daným id není živý. Zotavitelná. */
export class UnknownFactError extends InferenceError {
  readonly factId: number;

  constructor(factId: number) {
    super(`Fact #${factId} is not asserted`, 'UNKNOWN_FACT');
    this.name = 'UnknownFactError';
    this.factId = factId;
  }
}

/** Běh překročil strop cyklů. Fatální pro session. */
export class CycleLimitExceededError extends InferenceError {
  readonly sessionId: string;
  readonly limit: number;
  readonly recentFirings: FiringRecord[];

  constructor(sessionId: string, limit: number, recentFirings: FiringRecord[]) {
    const last = recentFirings.map((f) => f.ruleName).join(' → ');
    super(
      `Session ${sessionId} exceeded ${limit} inference cycles` + (last ? ` (last fired: ${last})` : ''),
      'CYCLE_LIMIT_EXCEEDED'
    );
    this.name = 'CycleLimitExceededError';
    this.sessionId = sessionId;
    this.limit = limit;
    this.recentFirings = recentFirings;
  }
}

/** Operace není v aktuálním stavu session povolena. */
export class SessionStateError extends InferenceError {
  readonly sessionId: string;
  readonly state: SessionState;

  constructor(sessionId: string, state: SessionState, operation: string, reason?: string) {
    super(
      `Cannot ${operation} session ${sessionId} in state "${state}"${reason !== undefined ? `: ${reason}` : ''}`,
      'SESSION_STATE'
    );
    this.name = 'SessionStateError';
    this.sessionId = sessionId;
    this.state = state;
  }
}

/** Běh byl zrušen přes AbortSignal. */
export class SessionAbortedError extends InferenceError {
  readonly sessionId: string;
  readonly cycles: number;

  constructor(sessionId: string, cycles: number) {
    super(`Session ${sessionId} was aborted after ${cycles} cycle(s)`, 'SESSION_ABORTED');
    this.name = 'SessionAbortedError';
    this.sessionId = sessionId;
    this.cycles = cycles;
  }
}
