import { InvalidEnergyRatingError } from '../errors.js';
import type { EnergyRating } from './types.js';

export function isEnergyRating(value: unknown): value is EnergyRating {
  return value === 1 || value === 2 || value === 3;
}

/**
 * Validate a creative-energy answer. Blank input means the user skipped
 * the rating. Anything other than 1, 2 or 3 throws; re-prompting is the
 * caller's job.
 */
export function parseEnergyRating(input: string): EnergyRating | undefined {
  const trimmed = input.trim();
  if (trimmed === '') return undefined;

  const value = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!isEnergyRating(value)) {
    throw new InvalidEnergyRatingError(trimmed);
  }
  return value;
}
