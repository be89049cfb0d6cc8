/**
 * Configuration engine.
 *
 * Resolution priority: CLI flags > Environment vars > Project config > Global config > Defaults
 *
 * CLI flags are applied by the commands themselves; everything below them
 * is merged here and validated once.
 */

import { z } from 'zod';
import type { TaskweaveConfig } from '../types/config.js';
import { readJson } from '../store/json.js';
import { ConfigurationError } from './errors.js';
import { getLogger } from './logger.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { isMonotonicDeadline } from './tasks/score.js';

/** Default configuration values. */
export const DEFAULTS: TaskweaveConfig = {
  version: '1.0.0',
  sources: {
    todoist: {
      enabled: true,
      cacheDir: 'cache',
    },
    vault: {
      enabled: false,
      path: '',
      taskDatabase: 'Tasks.md',
      dailyNotes: {
        enabled: true,
        directory: 'Daily Notes',
        format: 'YYYY-MM-DD',
        section: 'Action Items',
      },
    },
  },
  fetch: {
    timeoutMs: 10_000,
  },
  dedupe: {
    similarityThreshold: 0.8,
    windowDays: 7,
  },
  scoring: {
    priorityWeights: { P1: 4, P2: 3, P3: 2, P4: 1 },
    energyMultipliers: { high: 1.5, medium: 1.0, low: 0.75 },
    deadline: {
      overdue: 2.0,
      dueToday: 1.5,
      dueThisWeek: 1.2,
      later: 1.0,
      weekDays: 7,
    },
  },
  recommend: {
    maxTasks: 5,
  },
  cleanup: {
    staleThresholdDays: 30,
  },
  completion: {
    dispatchTimeoutMs: 10_000,
  },
  status: {
    criticalWithinDays: 2,
  },
  output: {
    defaultFormat: 'json',
    showColor: true,
  },
  logging: {
    level: 'info',
    filePath: 'logs/taskweave.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TASKWEAVE_FORMAT': 'output.defaultFormat',
  'TASKWEAVE_OUTPUT_SHOW_COLOR': 'output.showColor',
  'TASKWEAVE_TODOIST_ENABLED': 'sources.todoist.enabled',
  'TASKWEAVE_TODOIST_CACHE_DIR': 'sources.todoist.cacheDir',
  'TASKWEAVE_VAULT_ENABLED': 'sources.vault.enabled',
  'TASKWEAVE_VAULT_PATH': 'sources.vault.path',
  'TASKWEAVE_FETCH_TIMEOUT_MS': 'fetch.timeoutMs',
  'TASKWEAVE_MAX_TASKS': 'recommend.maxTasks',
  'TASKWEAVE_STALE_THRESHOLD_DAYS': 'cleanup.staleThresholdDays',
  'TASKWEAVE_DISPATCH_TIMEOUT_MS': 'completion.dispatchTimeoutMs',
  'TASKWEAVE_LOG_LEVEL': 'logging.level',
  'TASKWEAVE_LOG_FILE': 'logging.filePath',
};

/** Keys whose values are always strings, whatever they look like. */
const STRING_PATHS = new Set([
  'sources.todoist.cacheDir',
  'sources.vault.path',
  'logging.filePath',
]);

const weight = z.number().positive();
const levelTable = z.object({ low: weight, medium: weight, high: weight });
const priorityTable = z.object({ P1: weight, P2: weight, P3: weight, P4: weight });

/** Schema of the fully merged config. */
export const ConfigSchema = z.object({
  version: z.string(),
  sources: z.object({
    todoist: z.object({
      enabled: z.boolean(),
      cacheDir: z.string().min(1),
    }),
    vault: z.object({
      enabled: z.boolean(),
      path: z.string(),
      taskDatabase: z.string().min(1),
      dailyNotes: z.object({
        enabled: z.boolean(),
        directory: z.string(),
        format: z.string().min(1),
        section: z.string().min(1),
      }),
    }),
  }).refine((s) => !s.vault.enabled || s.vault.path.trim() !== '', {
    message: 'sources.vault.path is required when the vault is enabled',
    path: ['vault', 'path'],
  }),
  fetch: z.object({
    timeoutMs: z.number().int().min(0),
  }),
  dedupe: z.object({
    similarityThreshold: z.number().gt(0).max(1),
    windowDays: z.number().min(0),
  }),
  scoring: z.object({
    priorityWeights: priorityTable,
    energyMultipliers: levelTable,
    deadline: z.object({
      overdue: weight,
      dueToday: weight,
      dueThisWeek: weight,
      later: weight,
      weekDays: z.number().int().min(1),
    }).refine(isMonotonicDeadline, {
      message: 'deadline multipliers must not increase as the due date moves away',
    }),
  }),
  recommend: z.object({
    maxTasks: z.number().int().min(1),
  }),
  cleanup: z.object({
    staleThresholdDays: z.number().int().min(1),
  }),
  completion: z.object({
    dispatchTimeoutMs: z.number().int().min(0),
  }),
  status: z.object({
    criticalWithinDays: z.number().int().min(0),
  }),
  output: z.object({
    defaultFormat: z.enum(['json', 'human']),
    showColor: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().min(1),
  }),
}) satisfies z.ZodType<TaskweaveConfig>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
export function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

async function readLayer(filePath: string): Promise<Record<string, unknown> | null> {
  let raw: unknown;
  try {
    raw = await readJson(filePath);
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${filePath}`, {
      fix: `Fix the JSON syntax in ${filePath}`,
      cause: err,
    });
  }
  if (raw === null) return null;
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return raw;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 *
 * @throws ConfigurationError when a layer is unreadable or the result is invalid
 */
export async function loadConfig(cwd?: string): Promise<TaskweaveConfig> {
  const log = getLogger('config');
  let merged: Record<string, unknown> = Object.fromEntries(Object.entries(structuredClone(DEFAULTS)));

  // Layer 1: Global config
  const globalConfig = await readLayer(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  // Layer 2: Project config
  const projectPath = getConfigPath(cwd);
  const projectConfig = await readLayer(projectPath);
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  // Layer 3: Environment variables
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, STRING_PATHS.has(configPath) ? envValue : parseEnvValue(envValue));
    }
  }

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`, {
      fix: `Correct ${projectPath} or the TASKWEAVE_* environment variables`,
      cause: parsed.error,
    });
  }

  log.debug({ project: projectConfig !== null, global: globalConfig !== null }, 'config loaded');
  return parsed.data;
}
