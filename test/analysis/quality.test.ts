import {
  averageQuality,
  clarityScore,
  engagementScore,
  productivityScore,
  scoreMetrics,
  scoreTranscript,
} from '../../src/analysis/quality.js';
import { createMetricsExtractor } from '../../src/analysis/metrics.js';
import { createPatternMatcher } from '../../src/analysis/patterns.js';
import { emptyMetrics } from '../../src/analysis/types.js';
import type { AnalysisMetrics } from '../../src/analysis/types.js';

function metrics(overrides: Partial<AnalysisMetrics>): AnalysisMetrics {
  return { ...emptyMetrics(), ...overrides };
}

describe('quality scoring', () => {
  it('scores an all-zero record at the base values', () => {
    const q = scoreMetrics(emptyMetrics());
    expect(q.engagement).toBe(50);
    expect(q.clarity).toBe(70);
    expect(q.productivity).toBe(40);
    expect(q.overall).toBeCloseTo(53.333, 3);
  });

  it('caps engagement bonuses', () => {
    expect(engagementScore(metrics({ enthusiasmMarkers: 10, exchanges: 100 }))).toBe(100);
    expect(engagementScore(metrics({ exchanges: 5 }))).toBe(60);
    expect(engagementScore(metrics({ enthusiasmMarkers: 1, exchanges: 2 }))).toBe(64);
  });

  it('caps the confusion penalties', () => {
    const m = metrics({ confusionMarkers: 10 });
    expect(engagementScore(m)).toBe(30);
    expect(clarityScore(m)).toBe(30);
  });

  it('penalizes clarity only for questions beyond the exchange count', () => {
    expect(clarityScore(metrics({ questionsAsked: 5, exchanges: 5 }))).toBe(70);
    expect(clarityScore(metrics({ questionsAsked: 7, exchanges: 5 }))).toBe(66);
    expect(clarityScore(metrics({ questionsAsked: 15, exchanges: 5 }))).toBe(50);
    expect(clarityScore(metrics({ questionsAsked: 100, confusionMarkers: 100 }))).toBe(10);
  });

  it('rewards code blocks and compaction up to their caps', () => {
    expect(productivityScore(metrics({ codeBlocks: 2 }))).toBe(70);
    expect(productivityScore(metrics({ codeBlocks: 2, compactionIndicators: 1 }))).toBe(75);
    expect(productivityScore(metrics({ codeBlocks: 10, compactionIndicators: 10 }))).toBe(100);
  });

  it('averages the three scores into overall', () => {
    const q = scoreMetrics(metrics({ codeBlocks: 2, confusionMarkers: 1 }));
    // engagement 45, clarity 60, productivity 70
    expect(q.overall).toBe(175 / 3);
  });

  it('stays within bounds for extreme records', () => {
    const samples = [
      emptyMetrics(),
      metrics({ confusionMarkers: 1000, questionsAsked: 1000 }),
      metrics({ enthusiasmMarkers: 1000, exchanges: 1000, codeBlocks: 1000, compactionIndicators: 1000 }),
    ];
    for (const m of samples) {
      const q = scoreMetrics(m);
      for (const value of [q.engagement, q.clarity, q.productivity, q.overall]) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(100);
      }
    }
  });

  it('scores a transcript end to end', () => {
    const extractor = createMetricsExtractor(createPatternMatcher());
    const q = scoreTranscript(extractor, 'Human: excellent\n```a```');
    // one enthusiasm marker, one exchange, one code block
    expect(q.engagement).toBe(62);
    expect(q.productivity).toBe(55);
  });
});

describe('averageQuality', () => {
  it('returns null for an empty sample', () => {
    expect(averageQuality([])).toBeNull();
  });

  it('averages each score', () => {
    const avg = averageQuality([
      { engagement: 50, clarity: 70, productivity: 40, overall: 60 },
      { engagement: 70, clarity: 50, productivity: 60, overall: 80 },
    ]);
    expect(avg).toEqual({ engagement: 60, clarity: 60, productivity: 50, overall: 70 });
  });
});
