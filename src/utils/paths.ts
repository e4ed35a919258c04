import path from 'node:path';
import os from 'node:os';

/**
 * Root directory for configuration and, by default, the session logs.
 * `SESSIONSCOPE_HOME` overrides it (used by tests and sandboxed runs).
 */
export function sessionscopeDir(): string {
  return process.env.SESSIONSCOPE_HOME ?? path.join(os.homedir(), '.sessionscope');
}

export const CONFIG_FILE_NAME = 'config.yml';
export const LOGS_SUBDIR = 'logs';
export const METADATA_FILE_NAME = 'sessions_metadata.json';

// Project-relative location of the assistant instructions file
export const PROJECT_INSTRUCTIONS_FILE = path.join('.claude', 'CLAUDE.md');

export function configPath(root: string = sessionscopeDir()): string {
  return path.join(root, CONFIG_FILE_NAME);
}

export function metadataPath(logsDir: string): string {
  return path.join(logsDir, METADATA_FILE_NAME);
}

/**
 * Expand a leading `~` to the user's home directory.
 * e.g. `~/logs` → `/Users/jo/logs`
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}
