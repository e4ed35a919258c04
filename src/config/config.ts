import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { ConfigError } from '../errors.js';
import { LOGS_SUBDIR, configPath, expandHome, sessionscopeDir } from '../utils/paths.js';

const ConfigSchema = z.object({
  version: z.literal(1),
  logs_dir: z.string().optional(),
  assistant: z
    .object({ command: z.string().min(1).default('claude') })
    .default({ command: 'claude' }),
  capture: z
    .object({ command: z.string().min(1).default('script') })
    .default({ command: 'script' }),
  track_energy: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface ResolvedConfig {
  logsDir: string;
  assistantCommand: string;
  captureCommand: string;
  trackEnergy: boolean;
}

const DEFAULT_CONFIG: Config = {
  version: 1,
  assistant: { command: 'claude' },
  capture: { command: 'script' },
  track_energy: false,
};

export function loadConfig(root: string = sessionscopeDir()): Config {
  const file = configPath(root);
  if (!fs.existsSync(file)) {
    return DEFAULT_CONFIG;
  }

  const raw = fs.readFileSync(file, 'utf-8');
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${file}: ${(err as Error).message}`, file, { cause: err });
  }

  const result = ConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Invalid config ${file}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`,
      file,
      { cause: result.error },
    );
  }
  return result.data;
}

export function resolveConfig(config: Config, root: string = sessionscopeDir()): ResolvedConfig {
  return {
    logsDir: config.logs_dir
      ? path.resolve(expandHome(config.logs_dir))
      : path.join(root, LOGS_SUBDIR),
    assistantCommand: config.assistant.command,
    captureCommand: config.capture.command,
    trackEnergy: config.track_energy,
  };
}

export function writeDefaultConfig(root: string = sessionscopeDir()): void {
  const file = configPath(root);
  fs.mkdirSync(root, { recursive: true });
  const yamlStr = YAML.stringify(DEFAULT_CONFIG, { indent: 2 });
  fs.writeFileSync(file, yamlStr, 'utf-8');
}
