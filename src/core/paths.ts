/**
 * Path resolution.
 *
 * Environment variables:
 *   TASKWEAVE_HOME - Global directory (default: ~/.taskweave)
 *   TASKWEAVE_DIR  - Project data directory (default: .taskweave)
 */

import { resolve, dirname, join, basename } from 'node:path';
import { homedir } from 'node:os';

const DEFAULT_DATA_DIR = '.taskweave';

/**
 * Get the global home directory.
 * Respects TASKWEAVE_HOME, defaults to ~/.taskweave.
 */
export function getHome(): string {
  return process.env['TASKWEAVE_HOME'] ?? join(homedir(), DEFAULT_DATA_DIR);
}

/**
 * Get the absolute path to the project data directory.
 * Respects TASKWEAVE_DIR; a relative value resolves against `cwd`.
 */
export function getDataDir(cwd?: string): string {
  const dir = process.env['TASKWEAVE_DIR'] ?? DEFAULT_DATA_DIR;
  if (isAbsolutePath(dir)) return dir;
  return resolve(cwd ?? process.cwd(), dir);
}

/**
 * Get the project root. When the data directory is the default
 * `.taskweave`, the root is its parent.
 */
export function getProjectRoot(cwd?: string): string {
  const dataDir = getDataDir(cwd);
  if (basename(dataDir) === DEFAULT_DATA_DIR) {
    return dirname(dataDir);
  }
  return cwd ?? process.cwd();
}

/**
 * Resolve a configured path: absolute as is, `~/` against the home
 * directory, anything else against the project root.
 */
export function resolveProjectPath(relativePath: string, cwd?: string): string {
  if (relativePath === '~') return homedir();
  if (relativePath.startsWith('~/')) {
    return resolve(homedir(), relativePath.slice(2));
  }
  if (isAbsolutePath(relativePath)) {
    return relativePath;
  }
  return resolve(getProjectRoot(cwd), relativePath);
}

/** Project config.json. */
export function getConfigPath(cwd?: string): string {
  return join(getDataDir(cwd), 'config.json');
}

/** Global config.json, under the home directory. */
export function getGlobalConfigPath(): string {
  return join(getHome(), 'config.json');
}

/** Completion ledger. */
export function getLedgerPath(cwd?: string): string {
  return join(getDataDir(cwd), 'completions.json');
}

/**
 * Check if a path is absolute (POSIX or Windows).
 */
export function isAbsolutePath(path: string): boolean {
  // POSIX absolute
  if (path.startsWith('/')) return true;
  // Windows drive letter (C:\, D:/)
  if (/^[A-Za-z]:[\\/]/.test(path)) return true;
  // UNC path
  if (path.startsWith('\\\\')) return true;
  return false;
}
