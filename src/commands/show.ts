import { Command } from 'commander';
import fs from 'node:fs/promises';
import chalk from 'chalk';
import { SessionAnalyzer } from '../analysis/analyzer.js';
import type { SessionSummary } from '../analysis/analyzer.js';
import { loadConfig, resolveConfig } from '../config/config.js';
import { SessionNotFoundError } from '../errors.js';
import { formatSessionSummary } from '../report/format.js';
import { openMetadataStore } from '../store/index.js';
import { error } from '../utils/logger.js';

async function runShow(sessionId: string, options: { full?: boolean }): Promise<void> {
  const config = resolveConfig(loadConfig());
  const analyzer = new SessionAnalyzer(openMetadataStore(config.logsDir));

  let summary: SessionSummary;
  try {
    summary = analyzer.getSessionSummary(sessionId);
  } catch (err) {
    if (err instanceof SessionNotFoundError) {
      error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  for (const line of formatSessionSummary(summary)) {
    console.log(line);
  }

  if (options.full) {
    console.log(chalk.bold('\n=== Full Log Content ==='));
    console.log(await fs.readFile(summary.session.logFile, 'utf-8'));
  }
}

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show metrics and quality scores for one session')
    .argument('<id>', 'session id')
    .option('-f, --full', 'print the full transcript')
    .action(runShow);
}
