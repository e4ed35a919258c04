import { spawn } from 'node:child_process';
import { debug } from '../utils/logger.js';

export interface CaptureOptions {
  /** Terminal-capture utility, `script` by default. */
  captureCommand?: string;
  platform?: NodeJS.Platform;
  cwd?: string;
}

const BSD_PLATFORMS: readonly NodeJS.Platform[] = ['darwin', 'freebsd', 'openbsd'];

export function shellQuote(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Arguments for `script` so that it records `command args...` into `logFile`.
 * BSD `script` takes the command after the file; util-linux wants it as
 * one shell string behind `-c`.
 */
export function buildCaptureArgs(
  platform: NodeJS.Platform,
  logFile: string,
  command: string,
  args: readonly string[],
): string[] {
  if (BSD_PLATFORMS.includes(platform)) {
    return ['-q', logFile, command, ...args];
  }
  const commandLine = [command, ...args].map(shellQuote).join(' ');
  return ['-q', '-c', commandLine, logFile];
}

/**
 * Run the assistant under the capture utility with the terminal attached.
 * Resolves with the exit code, or -1 when the process was killed by a signal.
 */
export async function runCapturedSession(
  logFile: string,
  command: string,
  args: readonly string[],
  opts: CaptureOptions = {},
): Promise<number> {
  const captureCommand = opts.captureCommand ?? 'script';
  const captureArgs = buildCaptureArgs(opts.platform ?? process.platform, logFile, command, args);

  debug(`Spawning ${captureCommand} ${captureArgs.join(' ')}`);

  return new Promise<number>((resolve, reject) => {
    const proc = spawn(captureCommand, captureArgs, {
      cwd: opts.cwd,
      stdio: 'inherit',
    });

    proc.on('close', (code) => {
      resolve(code ?? -1);
    });

    proc.on('error', (err) => {
      reject(new Error(`Failed to start ${captureCommand}: ${err.message}`, { cause: err }));
    });
  });
}
