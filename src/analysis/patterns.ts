export type PatternCategory =
  | 'enthusiasm'
  | 'confusion'
  | 'compaction'
  | 'codeBlock'
  | 'exchange';

export type PatternCounts = Record<PatternCategory, number>;

/**
 * `text` patterns count every non-overlapping match in the whole transcript.
 * `line` patterns count lines that match, so at most one per line.
 */
export interface PatternEntry {
  category: PatternCategory;
  pattern: RegExp;
  scope: 'text' | 'line';
}

export const ENTHUSIASM_WORDS = [
  'excellent',
  'great',
  'perfect',
  'amazing',
  'awesome',
  'fantastic',
  'wonderful',
  'brilliant',
  'outstanding',
  'superb',
  'terrific',
  'love it',
  'exactly',
  'precisely',
] as const;

export const CONFUSION_PHRASES = [
  'confused',
  'unclear',
  'not sure',
  "don't understand",
  'what do you mean',
  'can you clarify',
  'help me understand',
  "i'm lost",
  'not following',
] as const;

export const COMPACTION_WORDS = [
  'concise',
  'brief',
  'short',
  'summarize',
  'compact',
  'terse',
  'reduce',
  'minimize',
  'streamline',
] as const;

export const CODE_FENCE = '```';

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function vocabulary(words: readonly string[]): RegExp {
  return new RegExp(`(?:${words.map(escapeRegExp).join('|')})`, 'gi');
}

export const DEFAULT_PATTERNS: readonly PatternEntry[] = [
  { category: 'enthusiasm', pattern: vocabulary(ENTHUSIASM_WORDS), scope: 'text' },
  { category: 'confusion', pattern: vocabulary(CONFUSION_PHRASES), scope: 'text' },
  { category: 'compaction', pattern: vocabulary(COMPACTION_WORDS), scope: 'text' },
  { category: 'codeBlock', pattern: /```[\s\S]*?```/g, scope: 'text' },
  { category: 'exchange', pattern: /^(?:Human:|Assistant:)/, scope: 'line' },
];

/** Splits on `\n` and drops a trailing `\r` from each line. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

function countInText(pattern: RegExp, text: string): number {
  // matchAll works on a copy of the regex, so a shared pattern keeps no lastIndex state
  let count = 0;
  for (const _match of text.matchAll(pattern)) {
    count++;
  }
  return count;
}

function countLines(pattern: RegExp, lines: readonly string[]): number {
  let count = 0;
  for (const line of lines) {
    if (pattern.test(line)) count++;
  }
  return count;
}

export interface PatternMatcher {
  count(category: PatternCategory, text: string): number;
  countAll(text: string): PatternCounts;
}

/**
 * Compile the pattern table once; the returned matcher is shared by
 * every extraction in the process.
 */
export function createPatternMatcher(
  entries: readonly PatternEntry[] = DEFAULT_PATTERNS,
): PatternMatcher {
  for (const entry of entries) {
    if (entry.scope === 'text' && !entry.pattern.global) {
      throw new Error(`Pattern for "${entry.category}" must use the g flag`);
    }
    if (entry.scope === 'line' && entry.pattern.global) {
      throw new Error(`Line pattern for "${entry.category}" must not use the g flag`);
    }
  }

  const byCategory = new Map(entries.map((e) => [e.category, e]));

  function countEntry(entry: PatternEntry, text: string, lines?: readonly string[]): number {
    if (entry.scope === 'line') {
      return countLines(entry.pattern, lines ?? splitLines(text));
    }
    return countInText(entry.pattern, text);
  }

  return {
    count(category, text) {
      const entry = byCategory.get(category);
      if (!entry) return 0;
      return countEntry(entry, text);
    },

    countAll(text) {
      const counts: PatternCounts = {
        enthusiasm: 0,
        confusion: 0,
        compaction: 0,
        codeBlock: 0,
        exchange: 0,
      };
      const lines = entries.some((e) => e.scope === 'line') ? splitLines(text) : [];
      for (const entry of entries) {
        counts[entry.category] += countEntry(entry, text, lines);
      }
      return counts;
    },
  };
}
