import fs from 'node:fs/promises';
import fsSync from 'node:fs';
import path from 'node:path';
import { simpleGit } from 'simple-git';
import type { SimpleGit } from 'simple-git';
import { CommitError } from '../errors.js';
import { methodologyLabel } from '../session/methodology.js';
import type { SessionMetadata } from '../session/types.js';
import { debug } from '../utils/logger.js';

export const INITIAL_COMMIT_MESSAGE = 'Initial commit: Initialize session logs repository';

export interface CommitSummary {
  hash: string;
  subject: string;
  date: string;
}

/** Whole minutes, truncated toward zero. */
export function wholeMinutes(durationMs: number): number {
  return Math.trunc(durationMs / 60_000);
}

export function formatCommitMessage(session: SessionMetadata): string {
  let message = `Session: ${session.id} | ${methodologyLabel(session.methodology)} | ${session.project}`;

  if (session.durationMs !== undefined) {
    message += ` | ${wholeMinutes(session.durationMs)}m`;
  }
  if (session.creativeEnergy !== undefined) {
    message += ` | Energy: ${session.creativeEnergy}/3`;
  }
  if (session.featuresWorkedOn.length > 0) {
    message += ` | Features: ${session.featuresWorkedOn.join(', ')}`;
  }

  return message;
}

/**
 * Git history of the logs directory. Every finished session becomes one
 * commit containing its transcript.
 */
export class SessionRepo {
  private constructor(
    readonly repoPath: string,
    private readonly git: SimpleGit,
  ) {}

  /** Open the logs repository, initializing it with an empty first commit if needed. */
  static async open(repoPath: string): Promise<SessionRepo> {
    await fs.mkdir(repoPath, { recursive: true });
    const git = simpleGit(repoPath);

    if (!fsSync.existsSync(path.join(repoPath, '.git'))) {
      debug(`Initializing git repository in ${repoPath}`);
      await git.init();
      await fs.writeFile(path.join(repoPath, '.gitkeep'), '');
      await git.add('.gitkeep');
      try {
        await git.commit(INITIAL_COMMIT_MESSAGE);
      } catch (err) {
        throw new CommitError(
          `Failed to create initial commit: ${(err as Error).message}`,
          { repoPath },
          { cause: err },
        );
      }
    }

    return new SessionRepo(repoPath, git);
  }

  /** Stage the session's transcript and commit it; resolves with the commit hash. */
  async commitSession(session: SessionMetadata): Promise<string> {
    const fileName = path.basename(session.logFile);
    const message = formatCommitMessage(session);

    try {
      await this.git.add(fileName);
      await this.git.commit(message);
      const hash = (await this.git.revparse(['HEAD'])).trim();
      debug(`Committed ${fileName} as ${hash}`);
      return hash;
    } catch (err) {
      throw new CommitError(
        `Git commit failed for session ${session.id}: ${(err as Error).message}`,
        { sessionId: session.id, file: fileName },
        { cause: err },
      );
    }
  }

  async log(count: number): Promise<string> {
    return this.git.raw(['log', '--oneline', '--graph', '--decorate', `-${count}`]);
  }

  async commitCount(): Promise<number> {
    try {
      const out = await this.git.raw(['rev-list', '--count', 'HEAD']);
      const count = parseInt(out.trim(), 10);
      return Number.isNaN(count) ? 0 : count;
    } catch {
      // No HEAD yet
      return 0;
    }
  }

  async recentCommits(count: number): Promise<CommitSummary[]> {
    try {
      const out = await this.git.raw([
        'log',
        '--pretty=format:%H%x1f%s%x1f%ad',
        '--date=short',
        `-${count}`,
      ]);
      return out
        .split('\n')
        .filter(Boolean)
        .map((line) => {
          const [hash = '', subject = '', date = ''] = line.split('\x1f');
          return { hash, subject, date };
        });
    } catch {
      return [];
    }
  }
}
