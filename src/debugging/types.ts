/**
 * Debugging types for inference tracing.
 */

/** Types of trace entries that can be recorded */
export type TraceEntryType =
  | 'session_started'
  | 'fact_asserted'
  | 'fact_retracted'
  | 'activation_fired'
  | 'action_skipped'
  | 'quiescent'
  | 'cycle_limit_exceeded'
  | 'session_aborted'
  | 'session_ended';

/** A single trace entry recording an inference step */
export interface DebugTraceEntry {
  /** Unique identifier for this trace entry */
  id: string;

  /** Monotonic sequence number, defines the order of entries */
  sequence: number;

  /** Unix timestamp in milliseconds when this occurred */
  timestamp: number;

  /** Type of activity being traced */
  type: TraceEntryType;

  /** ID of the session the entry belongs to */
  sessionId?: string;

  /** Inference cycle within the current run, if applicable */
  cycle?: number;

  /** Name of the rule involved, if applicable */
  ruleName?: string;

  /** Additional contextual information about the activity */
  details: Record<string, unknown>;

  /** Duration of the activity in milliseconds, if applicable */
  durationMs?: number;
}

/** Optional fields accepted by TraceCollector.record */
export type TraceEntryOptions = Partial<
  Pick<DebugTraceEntry, 'id' | 'timestamp' | 'sessionId' | 'cycle' | 'ruleName' | 'durationMs'>
>;

/** Filter options for querying trace entries */
export interface TraceFilter {
  /** Filter by session ID */
  sessionId?: string;

  /** Filter by rule name */
  ruleName?: string;

  /** Filter by entry types */
  types?: TraceEntryType[];

  /** Filter entries at or after this timestamp */
  fromTimestamp?: number;

  /** Filter entries at or before this timestamp */
  toTimestamp?: number;

  /** Maximum number of entries to return (the newest ones are kept) */
  limit?: number;
}

/** Callback type for trace entry subscriptions */
export type TraceSubscriber = (entry: DebugTraceEntry) => void;
