import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, resolveConfig } from '../config/config.js';
import { SessionRepo } from '../git/repo.js';

function parseCount(value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n) || n < 1) {
    throw new InvalidArgumentError('Count must be a positive integer.');
  }
  return n;
}

async function runGitLog(options: { count: number }): Promise<void> {
  const config = resolveConfig(loadConfig());
  const repo = await SessionRepo.open(config.logsDir);
  console.log(await repo.log(options.count));
}

export function createGitLogCommand(): Command {
  return new Command('git-log')
    .description('Show the git history of logged sessions')
    .option('-c, --count <n>', 'number of commits to show', parseCount, 10)
    .action(runGitLog);
}
