import chalk from 'chalk';

type Level = 'debug' | 'warn' | 'error';

const STYLES: Record<Level, (text: string) => string> = {
  debug: chalk.gray,
  warn: chalk.yellow,
  error: chalk.red,
};

const isDebug = process.env.SESSIONSCOPE_DEBUG === '1';

// stdout is reserved for command output and the captured assistant session
function write(level: Level, msg: string): void {
  console.error(STYLES[level](`[${level}] ${msg}`));
}

export function debug(msg: string): void {
  if (isDebug) write('debug', msg);
}

/** Skipped sessions and other recoverable problems. */
export function warn(msg: string): void {
  write('warn', msg);
}

/** A failure the CLI reports before exiting non-zero. */
export function error(msg: string): void {
  write('error', msg);
}
