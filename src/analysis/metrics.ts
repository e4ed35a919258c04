import { CODE_FENCE, splitLines } from './patterns.js';
import type { PatternMatcher } from './patterns.js';
import type { AnalysisMetrics } from './types.js';

/**
 * Count `?` characters outside fenced code.
 *
 * A line starting (after indentation) with a fence flips the in-code state
 * and is itself skipped. Fences are not checked for balance: an odd fence
 * leaves the rest of the transcript treated as code.
 */
export function countQuestions(text: string): number {
  let count = 0;
  let inCodeBlock = false;

  for (const line of splitLines(text)) {
    if (line.trimStart().startsWith(CODE_FENCE)) {
      inCodeBlock = !inCodeBlock;
      continue;
    }
    if (inCodeBlock) continue;

    for (const ch of line) {
      if (ch === '?') count++;
    }
  }

  return count;
}

export function extractMetrics(matcher: PatternMatcher, text: string): AnalysisMetrics {
  const counts = matcher.countAll(text);
  return {
    exchanges: counts.exchange,
    codeBlocks: counts.codeBlock,
    questionsAsked: countQuestions(text),
    enthusiasmMarkers: counts.enthusiasm,
    confusionMarkers: counts.confusion,
    compactionIndicators: counts.compaction,
  };
}

export interface MetricsExtractor {
  extract(text: string): AnalysisMetrics;
}

export function createMetricsExtractor(matcher: PatternMatcher): MetricsExtractor {
  return {
    extract: (text) => extractMetrics(matcher, text),
  };
}
