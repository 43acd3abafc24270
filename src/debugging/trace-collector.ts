import { generateId } from '../utils/id-generator.js';
import type {
  DebugTraceEntry,
  TraceEntryOptions,
  TraceEntryType,
  TraceFilter,
  TraceSubscriber,
} from './types.js';

/** Configuration options for TraceCollector */
export interface TraceCollectorConfig {
  /** Maximum number of entries to keep in the ring buffer (default: 10000) */
  maxEntries?: number;

  /** Whether tracing is initially enabled (default: false) */
  enabled?: boolean;
}

/**
 * Collects and indexes trace entries produced by inference sessions.
 *
 * Entries live in a ring buffer and are indexed by session, rule name
 * and entry type.
 */
export class TraceCollector {
  private readonly maxEntries: number;
  private enabled: boolean;
  private sequence = 0;

  private readonly entries: DebugTraceEntry[] = [];
  private readonly bySession = new Map<string, Set<string>>();
  private readonly byRule = new Map<string, Set<string>>();
  private readonly byType = new Map<TraceEntryType, Set<string>>();
  private readonly entriesById = new Map<string, DebugTraceEntry>();

  private readonly subscribers = new Set<TraceSubscriber>();

  constructor(config: TraceCollectorConfig = {}) {
    this.maxEntries = Math.max(1, config.maxEntries ?? 10_000);
    this.enabled = config.enabled ?? false;
  }

  /** Enable trace collection */
  enable(): void {
    this.enabled = true;
  }

  /** Disable trace collection */
  disable(): void {
    this.enabled = false;
  }

  /** Check if tracing is currently enabled */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record a new trace entry.
   *
   * If tracing is disabled, this is a no-op.
   */
  record(
    type: TraceEntryType,
    details: Record<string, unknown>,
    options: TraceEntryOptions = {}
  ): DebugTraceEntry | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const entry: DebugTraceEntry = {
      id: options.id ?? generateId(),
      sequence: ++this.sequence,
      timestamp: options.timestamp ?? Date.now(),
      type,
      details,
      ...(options.sessionId !== undefined && { sessionId: options.sessionId }),
      ...(options.cycle !== undefined && { cycle: options.cycle }),
      ...(options.ruleName !== undefined && { ruleName: options.ruleName }),
      ...(options.durationMs !== undefined && { durationMs: options.durationMs }),
    };

    this.addEntry(entry);
    this.notifySubscribers(entry);

    return entry;
  }

  /** All entries of a session, oldest first. */
  getBySession(sessionId: string): DebugTraceEntry[] {
    return this.resolveEntries(this.bySession.get(sessionId));
  }

  /** All entries mentioning a rule, oldest first. */
  getByRule(ruleName: string): DebugTraceEntry[] {
    return this.resolveEntries(this.byRule.get(ruleName));
  }

  /** All entries of a given type, oldest first. */
  getByType(type: TraceEntryType): DebugTraceEntry[] {
    return this.resolveEntries(this.byType.get(type));
  }

  /**
   * Get the most recent trace entries, newest first.
   */
  getRecent(limit = 100): DebugTraceEntry[] {
    const startIndex = Math.max(0, this.entries.length - limit);
    return this.entries.slice(startIndex).reverse();
  }

  /**
   * Query trace entries with flexible filtering.
   */
  query(filter: TraceFilter): DebugTraceEntry[] {
    let result: DebugTraceEntry[];

    // Start with the most selective index
    if (filter.sessionId !== undefined) {
      result = this.getBySession(filter.sessionId);
    } else if (filter.ruleName !== undefined) {
      result = this.getByRule(filter.ruleName);
    } else if (filter.types?.length === 1 && filter.types[0]) {
      result = this.getByType(filter.types[0]);
    } else {
      result = [...this.entries];
    }

    if (filter.types && filter.types.length > 0) {
      const typeSet = new Set(filter.types);
      result = result.filter(e => typeSet.has(e.type));
    }

    if (filter.sessionId !== undefined && filter.ruleName !== undefined) {
      const ruleName = filter.ruleName;
      result = result.filter(e => e.ruleName === ruleName);
    }

    const { fromTimestamp, toTimestamp } = filter;
    if (fromTimestamp !== undefined) {
      result = result.filter(e => e.timestamp >= fromTimestamp);
    }
    if (toTimestamp !== undefined) {
      result = result.filter(e => e.timestamp <= toTimestamp);
    }

    if (filter.limit !== undefined && result.length > filter.limit) {
      result = result.slice(result.length - filter.limit);
    }

    return result;
  }

  /**
   * Subscribe to new trace entries in real-time.
   * Returns an unsubscribe function.
   */
  subscribe(subscriber: TraceSubscriber): () => void {
    this.subscribers.add(subscriber);

    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  /** Get the current number of stored entries */
  get size(): number {
    return this.entries.length;
  }

  /** Get statistics about the trace collector */
  getStats(): { entriesCount: number; maxEntries: number; subscribersCount: number } {
    return {
      entriesCount: this.entries.length,
      maxEntries: this.maxEntries,
      subscribersCount: this.subscribers.size
    };
  }

  /** Clear all stored entries and indexes */
  clear(): void {
    this.entries.length = 0;
    this.entriesById.clear();
    this.bySession.clear();
    this.byRule.clear();
    this.byType.clear();
  }

  private addEntry(entry: DebugTraceEntry): void {
    if (this.entries.length >= this.maxEntries) {
      this.evictOldest();
    }

    this.entries.push(entry);
    this.entriesById.set(entry.id, entry);
    this.indexEntry(entry);
  }

  private evictOldest(): void {
    // Remove approximately 10% when limit is reached
    const toRemove = Math.max(1, Math.ceil(this.maxEntries * 0.1));
    const removed = this.entries.splice(0, toRemove);

    for (const entry of removed) {
      this.unindexEntry(entry);
      this.entriesById.delete(entry.id);
    }
  }

  private indexEntry(entry: DebugTraceEntry): void {
    if (entry.sessionId !== undefined) {
      addToIndex(this.bySession, entry.sessionId, entry.id);
    }
    if (entry.ruleName !== undefined) {
      addToIndex(this.byRule, entry.ruleName, entry.id);
    }
    addToIndex(this.byType, entry.type, entry.id);
  }

  private unindexEntry(entry: DebugTraceEntry): void {
    if (entry.sessionId !== undefined) {
      removeFromIndex(this.bySession, entry.sessionId, entry.id);
    }
    if (entry.ruleName !== undefined) {
      removeFromIndex(this.byRule, entry.ruleName, entry.id);
    }
    removeFromIndex(this.byType, entry.type, entry.id);
  }

  private resolveEntries(entryIds: Set<string> | undefined): DebugTraceEntry[] {
    if (!entryIds) {
      return [];
    }

    const result: DebugTraceEntry[] = [];
    for (const id of entryIds) {
      const entry = this.entriesById.get(id);
      if (entry) {
        result.push(entry);
      }
    }

    result.sort((a, b) => a.sequence - b.sequence);
    return result;
  }

  private notifySubscribers(entry: DebugTraceEntry): void {
    for (const subscriber of this.subscribers) {
      try {
        subscriber(entry);
      } catch (error) {
        console.error('[TraceCollector] Error in trace subscriber:', error);
      }
    }
  }
}

function addToIndex<K>(index: Map<K, Set<string>>, key: K, entryId: string): void {
  let set = index.get(key);
  if (!set) {
    set = new Set();
    index.set(key, set);
  }
  set.add(entryId);
}

function removeFromIndex<K>(index: Map<K, Set<string>>, key: K, entryId: string): void {
  const set = index.get(key);
  if (!set) return;
  set.delete(entryId);
  if (set.size === 0) {
    index.delete(key);
  }
}
