export { TraceCollector } from './trace-collector.js';
export type { TraceCollectorConfig } from './trace-collector.js';
export type {
  TraceEntryType,
  DebugTraceEntry,
  TraceEntryOptions,
  TraceFilter,
  TraceSubscriber,
} from './types.js';
