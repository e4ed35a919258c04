import type { AnalysisMetrics, SessionQuality } from './types.js';
import type { MetricsExtractor } from './metrics.js';

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function engagementScore(m: AnalysisMetrics): number {
  const base = 50;
  const enthusiasmBonus = Math.min(m.enthusiasmMarkers * 10, 30);
  const exchangeBonus = Math.min((m.exchanges / 10) * 20, 20);
  const confusionPenalty = Math.min(m.confusionMarkers * 5, 20);
  return clamp(base + enthusiasmBonus + exchangeBonus - confusionPenalty, 0, 100);
}

export function clarityScore(m: AnalysisMetrics): number {
  const base = 70;
  const confusionPenalty = Math.min(m.confusionMarkers * 10, 40);
  // Only questions beyond one per exchange count against clarity
  const questionPenalty =
    m.questionsAsked > m.exchanges
      ? Math.min((m.questionsAsked - m.exchanges) * 2, 20)
      : 0;
  return clamp(base - confusionPenalty - questionPenalty, 0, 100);
}

export function productivityScore(m: AnalysisMetrics): number {
  const base = 40;
  const codeBonus = Math.min(m.codeBlocks * 15, 40);
  const compactionBonus = Math.min(m.compactionIndicators * 5, 20);
  return clamp(base + codeBonus + compactionBonus, 0, 100);
}

export function scoreMetrics(metrics: AnalysisMetrics): SessionQuality {
  const engagement = engagementScore(metrics);
  const clarity = clarityScore(metrics);
  const productivity = productivityScore(metrics);
  return {
    engagement,
    clarity,
    productivity,
    overall: (engagement + clarity + productivity) / 3,
  };
}

export function scoreTranscript(extractor: MetricsExtractor, text: string): SessionQuality {
  return scoreMetrics(extractor.extract(text));
}

/** Mean of each score; `null` for an empty sample. */
export function averageQuality(samples: readonly SessionQuality[]): SessionQuality | null {
  if (samples.length === 0) return null;
  const sum = samples.reduce(
    (acc, q) => ({
      engagement: acc.engagement + q.engagement,
      clarity: acc.clarity + q.clarity,
      productivity: acc.productivity + q.productivity,
      overall: acc.overall + q.overall,
    }),
    { engagement: 0, clarity: 0, productivity: 0, overall: 0 },
  );
  const n = samples.length;
  return {
    engagement: sum.engagement / n,
    clarity: sum.clarity / n,
    productivity: sum.productivity / n,
    overall: sum.overall / n,
  };
}
