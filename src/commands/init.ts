import { Command } from 'commander';
import fsSync from 'node:fs';
import chalk from 'chalk';
import { loadConfig, resolveConfig, writeDefaultConfig } from '../config/config.js';
import { SessionRepo } from '../git/repo.js';
import { openMetadataStore } from '../store/index.js';
import { configPath, sessionscopeDir } from '../utils/paths.js';

async function runInit(): Promise<void> {
  const root = sessionscopeDir();
  const file = configPath(root);

  if (!fsSync.existsSync(file)) {
    writeDefaultConfig(root);
    console.log(chalk.green('✓') + ` Created ${file}`);
  }

  const config = resolveConfig(loadConfig(root), root);
  const store = openMetadataStore(config.logsDir);
  console.log(chalk.green('✓') + ` Logs directory ${config.logsDir} (${store.size} session(s))`);

  const repo = await SessionRepo.open(config.logsDir);
  const commits = await repo.commitCount();
  console.log(chalk.green('✓') + ` Git repository ready (${commits} commit(s))`);

  const [latest] = await repo.recentCommits(1);
  if (latest) {
    console.log(chalk.gray(`  Latest: ${latest.hash.slice(0, 7)} ${latest.date} ${latest.subject}`));
  }

  console.log(chalk.green('\nsessionscope initialized successfully!'));
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create the configuration file and the session logs repository')
    .action(runInit);
}
