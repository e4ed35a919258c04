import type { SessionMetadata } from '../src/session/types.js';

export function makeSession(
  id: string,
  overrides: Partial<SessionMetadata> = {},
): SessionMetadata {
  return {
    id,
    timestamp: new Date('2025-01-15T10:00:00Z'),
    project: 'demo',
    methodology: 'ContextDriven',
    workingDirectory: '/tmp/demo',
    command: 'claude',
    logFile: `/logs/${id}.log`,
    featuresWorkedOn: [],
    ...overrides,
  };
}

export const MINUTE = 60_000;
