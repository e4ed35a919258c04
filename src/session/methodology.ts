import fs from 'node:fs';
import path from 'node:path';
import { InstructionsReadError } from '../errors.js';
import { PROJECT_INSTRUCTIONS_FILE } from '../utils/paths.js';
import { debug } from '../utils/logger.js';
import type { Methodology } from './types.js';

const LABELS: Record<Methodology, string> = {
  ContextDriven: 'Context-Driven',
  CommandBased: 'Command-Based',
  Unknown: 'Unknown',
};

export function methodologyLabel(methodology: Methodology): string {
  return LABELS[methodology];
}

/**
 * Parse a user-supplied methodology filter.
 * Accepts `context-driven`, `contextdriven`, `command-based`,
 * `commandbased` and `unknown`, in any case.
 */
export function parseMethodology(name: string): Methodology | null {
  switch (name.trim().toLowerCase()) {
    case 'context-driven':
    case 'contextdriven':
      return 'ContextDriven';
    case 'command-based':
    case 'commandbased':
      return 'CommandBased';
    case 'unknown':
      return 'Unknown';
    default:
      return null;
  }
}

export function classifyInstructions(content: string): Methodology {
  if (content.includes('Context-Driven') || content.includes('context-driven')) {
    return 'ContextDriven';
  }
  if (content.includes('Command-Based') || content.includes('command-based')) {
    return 'CommandBased';
  }
  return 'Unknown';
}

/**
 * Classify a project from its `.claude/CLAUDE.md`. A missing file is
 * `Unknown`; a file that exists but cannot be read is an error.
 */
export function detectMethodology(projectDir: string): Methodology {
  const instructionsPath = path.join(projectDir, PROJECT_INSTRUCTIONS_FILE);
  if (!fs.existsSync(instructionsPath)) {
    debug(`No instructions file at ${instructionsPath}`);
    return 'Unknown';
  }

  let content: string;
  try {
    content = fs.readFileSync(instructionsPath, 'utf-8');
  } catch (err) {
    throw new InstructionsReadError(instructionsPath, { cause: err });
  }
  return classifyInstructions(content);
}
