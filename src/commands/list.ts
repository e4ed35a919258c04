import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig, resolveConfig } from '../config/config.js';
import { formatSessionLine } from '../report/format.js';
import { parseMethodology } from '../session/methodology.js';
import type { Methodology } from '../session/types.js';
import { openMetadataStore } from '../store/index.js';
import { warn } from '../utils/logger.js';

function parseLimit(value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) {
    throw new InvalidArgumentError('Limit must be a non-negative integer.');
  }
  return n;
}

async function runList(options: { methodology?: string; limit: number }): Promise<void> {
  const config = resolveConfig(loadConfig());
  const store = openMetadataStore(config.logsDir);

  let methodology: Methodology | undefined;
  if (options.methodology) {
    methodology = parseMethodology(options.methodology) ?? undefined;
    if (!methodology) {
      warn(`Unknown methodology "${options.methodology}", showing all sessions`);
    }
  }

  const sessions = store.list({ methodology, limit: options.limit });
  if (sessions.length === 0) {
    console.log(chalk.yellow('No sessions found.'));
    return;
  }

  console.log(chalk.bold('=== Recent Sessions ==='));
  for (const session of sessions) {
    console.log(formatSessionLine(session));
  }
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List logged sessions, newest first')
    .option('-m, --methodology <name>', 'filter by methodology')
    .option('-l, --limit <n>', 'maximum number of sessions to show', parseLimit, 10)
    .action(runList);
}
