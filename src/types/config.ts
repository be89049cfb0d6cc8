/**
 * Configuration type definitions.
 * Covers project and global config with cascade resolution.
 */

import type { Level, Priority } from './task.js';

/** Output format options. */
export type OutputFormat = 'json' | 'human';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
  showColor: boolean;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the data directory (default: 'logs/taskweave.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Cloud to-do service, read from its persisted snapshot. */
export interface TodoistSourceConfig {
  enabled: boolean;
  /** Directory holding todoist_tasks.json and todoist_completions.json. */
  cacheDir: string;
}

/** Daily notes inside the vault. */
export interface DailyNotesConfig {
  /** Read today's action items as a task source. */
  enabled: boolean;
  /** Directory of daily notes, relative to the vault. */
  directory: string;
  /** File name pattern, YYYY / MM / DD tokens. */
  format: string;
  /** Heading whose checkbox lines are action items. */
  section: string;
}

/** Personal note vault. */
export interface VaultSourceConfig {
  enabled: boolean;
  path: string;
  /** Task database file, relative to the vault. */
  taskDatabase: string;
  dailyNotes: DailyNotesConfig;
}

export interface SourcesConfig {
  todoist: TodoistSourceConfig;
  vault: VaultSourceConfig;
}

export interface FetchConfig {
  /** Per-source fetch bound. */
  timeoutMs: number;
}

export interface DedupeConfig {
  similarityThreshold: number;
  windowDays: number;
}

export interface ScoringConfig {
  priorityWeights: Record<Priority, number>;
  energyMultipliers: Record<Level, number>;
  deadline: {
    overdue: number;
    dueToday: number;
    dueThisWeek: number;
    later: number;
    weekDays: number;
  };
}

export interface RecommendConfig {
  maxTasks: number;
}

export interface CleanupConfig {
  staleThresholdDays: number;
}

export interface CompletionConfig {
  dispatchTimeoutMs: number;
}

export interface StatusConfig {
  /** Open tasks due within this many days are critical. */
  criticalWithinDays: number;
}

/** Project configuration (config.json). */
export interface TaskweaveConfig {
  version: string;
  sources: SourcesConfig;
  fetch: FetchConfig;
  dedupe: DedupeConfig;
  scoring: ScoringConfig;
  recommend: RecommendConfig;
  cleanup: CleanupConfig;
  completion: CompletionConfig;
  status: StatusConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}
