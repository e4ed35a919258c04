import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  INITIAL_COMMIT_MESSAGE,
  SessionRepo,
  formatCommitMessage,
  wholeMinutes,
} from '../../src/git/repo.js';
import { makeSession, MINUTE } from '../helpers.js';

describe('formatCommitMessage', () => {
  it('includes every recorded field', () => {
    const session = makeSession('2025-01-15_10-00-00', {
      durationMs: 2 * MINUTE + 45_000,
      creativeEnergy: 3,
      featuresWorkedOn: ['auth', 'api'],
    });
    expect(formatCommitMessage(session)).toBe(
      'Session: 2025-01-15_10-00-00 | Context-Driven | demo | 2m | Energy: 3/3 | Features: auth, api',
    );
  });

  it('keeps only the header for a bare session', () => {
    expect(formatCommitMessage(makeSession('s', { methodology: 'Unknown' }))).toBe(
      'Session: s | Unknown | demo',
    );
  });
});

describe('wholeMinutes', () => {
  it('truncates toward zero', () => {
    expect(wholeMinutes(59_999)).toBe(0);
    expect(wholeMinutes(90_000)).toBe(1);
    expect(wholeMinutes(-90_000)).toBe(-1);
  });
});

describe('SessionRepo', () => {
  let tmpDir: string;
  const savedEnv = { ...process.env };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sscope-git-'));
    process.env.GIT_AUTHOR_NAME = 'Test User';
    process.env.GIT_AUTHOR_EMAIL = 'test@example.com';
    process.env.GIT_COMMITTER_NAME = 'Test User';
    process.env.GIT_COMMITTER_EMAIL = 'test@example.com';
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    process.env = { ...savedEnv };
  });

  it('initializes the logs repository once and commits sessions', async () => {
    const repo = await SessionRepo.open(tmpDir);
    expect(await repo.commitCount()).toBe(1);

    const again = await SessionRepo.open(tmpDir);
    expect(await again.commitCount()).toBe(1);

    const logFile = path.join(tmpDir, '2025-01-15_10-00-00.log');
    fs.writeFileSync(logFile, 'Human: hi\n');
    const session = makeSession('2025-01-15_10-00-00', { logFile, durationMs: 5 * MINUTE });

    const hash = await repo.commitSession(session);
    expect(hash).toMatch(/^[0-9a-f]{40}$/);

    const commits = await repo.recentCommits(5);
    expect(commits.map((c) => c.subject)).toEqual([
      'Session: 2025-01-15_10-00-00 | Context-Driven | demo | 5m',
      INITIAL_COMMIT_MESSAGE,
    ]);
    expect(commits[0]?.hash).toBe(hash);
  }, 15_000);
});
