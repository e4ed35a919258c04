import {
  countQuestions,
  createMetricsExtractor,
  extractMetrics,
} from '../../src/analysis/metrics.js';
import { createPatternMatcher } from '../../src/analysis/patterns.js';
import { addMetrics, emptyMetrics } from '../../src/analysis/types.js';

describe('countQuestions', () => {
  it('skips question marks inside fenced code', () => {
    const text = 'Human: is this ok?\n```\nwhat? really?\n```\nAssistant: yes?';
    expect(countQuestions(text)).toBe(2);
  });

  it('counts every question mark on a line', () => {
    expect(countQuestions('what?? why?')).toBe(3);
  });

  it('treats indented fences as fences', () => {
    expect(countQuestions('  ```js\n?\n  ```\n?')).toBe(1);
  });

  it('excludes the fence line itself', () => {
    expect(countQuestions('``` what?\ncode\n```\ndone?')).toBe(1);
  });

  // Known edge case: an unbalanced fence leaves the rest of the text as code
  it('keeps an unclosed fence open to the end', () => {
    expect(countQuestions('before?\n```\ninside?\nafter?')).toBe(1);
  });
});

describe('metrics extraction', () => {
  const extractor = createMetricsExtractor(createPatternMatcher());

  it('returns zeros for an empty transcript', () => {
    expect(extractor.extract('')).toEqual(emptyMetrics());
  });

  it('extracts all six counters', () => {
    const text = [
      'Human: This is great, can you summarize?',
      'Assistant: Sure, here is a brief version:',
      '```ts',
      'const x = 1;',
      '```',
      "Human: I'm confused, what do you mean?",
    ].join('\n');

    expect(extractor.extract(text)).toEqual({
      exchanges: 3,
      codeBlocks: 1,
      questionsAsked: 2,
      enthusiasmMarkers: 1,
      confusionMarkers: 2,
      compactionIndicators: 2,
    });
  });

  it('counts the fenced example from both sides', () => {
    const text = 'Human: is this ok?\n```\nwhat? really?\n```\nAssistant: yes?';
    const metrics = extractor.extract(text);
    expect(metrics.questionsAsked).toBe(2);
    expect(metrics.exchanges).toBe(2);
    expect(metrics.codeBlocks).toBe(1);
  });

  it('is deterministic', () => {
    const text = 'Human: perfect?\nAssistant: exactly, be concise';
    expect(extractor.extract(text)).toEqual(extractor.extract(text));
  });

  it('never decreases when content is appended', () => {
    const base = 'Human: great? not sure\n```x```';
    const more = base + '\nAssistant: amazing, brief, unclear?\n```y```';
    const a = extractMetrics(createPatternMatcher(), base);
    const b = extractMetrics(createPatternMatcher(), more);
    for (const key of Object.keys(a) as Array<keyof typeof a>) {
      expect(b[key]).toBeGreaterThanOrEqual(a[key]);
    }
  });
});

describe('addMetrics', () => {
  it('sums elementwise', () => {
    const a = { ...emptyMetrics(), exchanges: 2, codeBlocks: 1 };
    const b = { ...emptyMetrics(), exchanges: 3, confusionMarkers: 4 };
    expect(addMetrics(a, b)).toEqual({
      exchanges: 5,
      codeBlocks: 1,
      questionsAsked: 0,
      enthusiasmMarkers: 0,
      confusionMarkers: 4,
      compactionIndicators: 0,
    });
  });
});
