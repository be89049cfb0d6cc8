/**
 * taskweave: unify tasks from several systems and recommend what to work on.
 */

// Types
export * from './types/index.js';

// Core
export {
  TaskweaveError,
  MalformedRecordError,
  SourceUnavailableError,
  CompletionDispatchError,
  ConfigurationError,
} from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export { loadConfig, DEFAULTS } from './core/config.js';

// Capacity
export {
  FixedCapacityReader,
  DailyNoteCapacityReader,
  OverrideCapacityReader,
  parseCapacity,
  type CapacityReader,
} from './core/capacity.js';

// Sources
export {
  buildProviders,
  buildCapacityReader,
  sinksByName,
  type RawRecord,
  type SourceProvider,
  type CompletionSink,
  type MarkCompleteOutcome,
} from './core/sources/index.js';
export { VaultProvider } from './core/sources/vault.js';
export { DailyNoteProvider } from './core/sources/daily-note.js';
export { TodoistCacheProvider } from './core/sources/todoist-cache.js';

// Tasks
export { normalize, mapPriority, mapLevel, UNKNOWN_CREATED_AT } from './core/tasks/normalize.js';
export { merge } from './core/tasks/dedupe.js';
export { score, scoreAll, deadlineMultiplier, DEFAULT_SCORING_POLICY, type ScoringPolicy } from './core/tasks/score.js';
export { recommend, fitsCapacity } from './core/tasks/recommend.js';
export { findStale, idleDays } from './core/tasks/stale.js';
export { aggregate, type AggregateResult, type SourceReport } from './core/tasks/aggregate.js';
export { listTasks, findTaskById } from './core/tasks/list.js';
export { summarize, type StatusSummary } from './core/tasks/status.js';
export { CompletionReconciler, complete, type CompletionResult } from './core/tasks/complete.js';

// Store
export {
  FileCompletionLedger,
  type FileLedgerOptions,
  MemoryCompletionLedger,
  type CompletionLedger,
} from './store/completion-ledger.js';
