#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { configureRunCommand } from './commands/run.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createGitLogCommand } from './commands/git-log.js';
import { createInitCommand } from './commands/init.js';
import { SessionScopeError } from './errors.js';
import { debug, error } from './utils/logger.js';

const program = new Command();

program
  .name('sessionscope')
  .version('0.1.0')
  .description('Log AI assistant sessions and analyze their transcripts');

program.addCommand(createInitCommand());
program.addCommand(createAnalyzeCommand());
program.addCommand(createListCommand());
program.addCommand(createShowCommand());
program.addCommand(createGitLogCommand());

// Without a subcommand, run the assistant under capture
configureRunCommand(program);

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // Filter Commander control-flow "errors" (help, version display)
    if (
      err instanceof CommanderError &&
      (err.code === 'commander.helpDisplayed' || err.code === 'commander.version')
    ) {
      return;
    }
    throw err;
  }
}

main().catch((err) => {
  if (err instanceof CommanderError) {
    // Commander has already printed the usage error
    process.exitCode = err.exitCode;
    return;
  }
  if (err instanceof SessionScopeError) {
    debug(JSON.stringify(err.toJSON()));
    error(err.message);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
