import { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import { loadConfig, resolveConfig } from '../config/config.js';
import { InvalidEnergyRatingError } from '../errors.js';
import { SessionRepo } from '../git/repo.js';
import { runCapturedSession } from '../session/capture.js';
import { parseEnergyRating } from '../session/energy.js';
import { completeSession, createSession } from '../session/lifecycle.js';
import type { EnergyRating } from '../session/types.js';
import { openMetadataStore } from '../store/index.js';
import { debug } from '../utils/logger.js';

interface RunOptions {
  trackEnergy?: boolean;
}

async function promptEnergy(): Promise<EnergyRating | undefined> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const answer = await rl.question(
        'Rate your creative energy for this session (1-3, or press Enter to skip): ',
      );
      try {
        return parseEnergyRating(answer);
      } catch (err) {
        if (!(err instanceof InvalidEnergyRatingError)) throw err;
        console.log(chalk.yellow('Invalid input. Please enter 1, 2, or 3.'));
      }
    }
  } finally {
    rl.close();
  }
}

export async function runLoggedSession(
  assistantArgs: string[],
  options: RunOptions,
): Promise<void> {
  const config = resolveConfig(loadConfig());
  const store = openMetadataStore(config.logsDir);
  const repo = await SessionRepo.open(config.logsDir);

  const session = createSession({
    logsDir: config.logsDir,
    projectDir: process.cwd(),
    args: assistantArgs,
    command: config.assistantCommand,
  });
  debug(`Session ${session.id} classified as ${session.methodology}`);

  console.log(`Starting session - logging to: ${session.logFile}`);

  const startedAt = Date.now();
  const exitCode = await runCapturedSession(
    session.logFile,
    config.assistantCommand,
    assistantArgs,
    { captureCommand: config.captureCommand },
  );
  const endTime = new Date();

  const trackEnergy = options.trackEnergy ?? config.trackEnergy;
  const creativeEnergy = trackEnergy ? await promptEnergy() : undefined;

  const finished = completeSession(session, {
    endTime,
    durationMs: endTime.getTime() - startedAt,
    creativeEnergy,
  });

  store.insert(finished);
  store.save();

  const hash = await repo.commitSession(finished);
  debug(`Session ${finished.id} committed as ${hash}`);

  console.log(chalk.green(`Session completed. Exit status: ${exitCode}`));
  if (finished.creativeEnergy !== undefined) {
    console.log(`Creative energy level: ${finished.creativeEnergy}/3`);
  }
}

export function configureRunCommand(program: Command): Command {
  return program
    .argument('[assistantArgs...]', 'arguments passed through to the assistant')
    .option('-e, --track-energy', 'ask for a creative energy rating after the session')
    .allowUnknownOption()
    .passThroughOptions()
    .action(runLoggedSession);
}
