import path from 'node:path';
import { detectMethodology } from './methodology.js';
import type { Methodology, SessionEnd, SessionMetadata } from './types.js';

export const DEFAULT_ASSISTANT_COMMAND = 'claude';

/** `2025-01-15T10:00:00.000Z` → `2025-01-15_10-00-00` */
export function sessionIdFor(startedAt: Date): string {
  return startedAt.toISOString().slice(0, 19).replace('T', '_').replace(/:/g, '-');
}

export function formatCommand(command: string, args: readonly string[]): string {
  return args.length === 0 ? command : `${command} ${args.join(' ')}`;
}

export interface CreateSessionOptions {
  logsDir: string;
  projectDir: string;
  args?: readonly string[];
  command?: string;
  now?: Date;
  methodology?: Methodology;
}

/**
 * Build the metadata skeleton for a session that is about to start.
 * End time, duration and energy stay empty until {@link completeSession}.
 */
export function createSession(opts: CreateSessionOptions): SessionMetadata {
  const timestamp = opts.now ?? new Date();
  const id = sessionIdFor(timestamp);
  const methodology = opts.methodology ?? detectMethodology(opts.projectDir);

  return {
    id,
    timestamp,
    project: path.basename(opts.projectDir) || 'unknown',
    methodology,
    workingDirectory: opts.projectDir,
    command: formatCommand(opts.command ?? DEFAULT_ASSISTANT_COMMAND, opts.args ?? []),
    logFile: path.join(opts.logsDir, `${id}.log`),
    featuresWorkedOn: [],
  };
}

export function isCompleted(session: SessionMetadata): boolean {
  return session.endTime !== undefined || session.durationMs !== undefined;
}

export function completeSession(session: SessionMetadata, end: SessionEnd): SessionMetadata {
  if (isCompleted(session)) {
    throw new Error(`Session ${session.id} has already been completed`);
  }
  return {
    ...session,
    endTime: end.endTime,
    durationMs: end.durationMs,
    creativeEnergy: end.creativeEnergy,
  };
}
