import { TranscriptReadError } from '../errors.js';
import { methodologyLabel } from '../session/methodology.js';
import type { EnergyRating, Methodology, SessionMetadata } from '../session/types.js';
import { warn } from '../utils/logger.js';
import type { MetricsExtractor } from './metrics.js';
import { averageQuality, scoreMetrics } from './quality.js';
import { addMetrics, emptyMetrics } from './types.js';
import type { AnalysisMetrics, SessionQuality } from './types.js';

/** Sessions per group that feed the averaged quality scores. */
export const QUALITY_SAMPLE_SIZE = 5;

export const ENERGY_RECOMMENDATION_THRESHOLD = 2.0;
export const CONFUSION_RATE_THRESHOLD = 2.0;
export const CODE_RATE_THRESHOLD = 5.0;

export const FALLBACK_RECOMMENDATION =
  'No specific recommendations - continue logging sessions for better insights.';

/** Reads a transcript by path; throws {@link TranscriptReadError} when it cannot. */
export interface TranscriptSource {
  read(filePath: string): string;
}

/**
 * Running totals for one methodology. Averages are recomputed on every
 * {@link addSession}, so a partially folded accumulator is still coherent.
 */
export class MethodologyStats {
  sessions = 0;
  totalDurationMs = 0;
  avgDurationMs = 0;
  creativeEnergy: EnergyRating[] = [];
  avgEnergy: number | undefined = undefined;
  metrics: AnalysisMetrics = emptyMetrics();

  addSession(session: SessionMetadata, metrics: AnalysisMetrics): void {
    this.sessions += 1;

    // The average moves only when a duration is recorded, but its divisor
    // is every session folded so far
    if (session.durationMs !== undefined) {
      this.totalDurationMs += session.durationMs;
      this.avgDurationMs = this.totalDurationMs / this.sessions;
    }

    if (session.creativeEnergy !== undefined) {
      this.creativeEnergy.push(session.creativeEnergy);
      const sum = this.creativeEnergy.reduce<number>((acc, e) => acc + e, 0);
      this.avgEnergy = sum / this.creativeEnergy.length;
    }

    this.metrics = addMetrics(this.metrics, metrics);
  }
}

export interface GroupAggregate {
  methodology: Methodology;
  /** The group's sessions in iteration order (ascending id). */
  members: SessionMetadata[];
  stats: MethodologyStats;
  skipped: number;
  /** Metrics of every member that could be analyzed, by session id. */
  metricsBySession: Map<string, AnalysisMetrics>;
}

export interface AggregationResult {
  groups: GroupAggregate[];
  totalSessions: number;
  totalSkipped: number;
}

export function aggregateSessions(
  groups: Map<Methodology, SessionMetadata[]>,
  extractor: MetricsExtractor,
  source: TranscriptSource,
): AggregationResult {
  const result: AggregationResult = { groups: [], totalSessions: 0, totalSkipped: 0 };

  for (const [methodology, members] of groups) {
    const group: GroupAggregate = {
      methodology,
      members,
      stats: new MethodologyStats(),
      skipped: 0,
      metricsBySession: new Map(),
    };

    for (const session of members) {
      let text: string;
      try {
        text = source.read(session.logFile);
      } catch (err) {
        if (!(err instanceof TranscriptReadError)) throw err;
        warn(`Failed to analyze session ${session.id}: ${err.message}`);
        group.skipped += 1;
        continue;
      }

      const metrics = extractor.extract(text);
      group.metricsBySession.set(session.id, metrics);
      group.stats.addSession(session, metrics);
    }

    result.groups.push(group);
    result.totalSessions += group.stats.sessions;
    result.totalSkipped += group.skipped;
  }

  return result;
}

export interface PerSessionAverages {
  exchanges: number;
  codeBlocks: number;
}

export interface MethodologyGroupReport {
  methodology: Methodology;
  label: string;
  /** No session of this group could be analyzed. */
  empty: boolean;
  sessions: number;
  skipped: number;
  totalDurationMs: number;
  avgDurationMs: number;
  avgEnergy: number | null;
  metrics: AnalysisMetrics;
  perSession: PerSessionAverages | null;
  quality: SessionQuality | null;
  qualitySampleSize: number;
}

export type RecommendationKind = 'continue' | 'clarify' | 'productivity' | 'none';

export interface Recommendation {
  kind: RecommendationKind;
  methodology?: Methodology;
  value?: number;
  message: string;
}

export interface MethodologyReport {
  totalSessions: number;
  totalSkipped: number;
  groups: MethodologyGroupReport[];
  recommendations: Recommendation[];
}

function sampleQuality(group: GroupAggregate): { quality: SessionQuality | null; size: number } {
  const samples: SessionQuality[] = [];
  for (const session of group.members.slice(0, QUALITY_SAMPLE_SIZE)) {
    const metrics = group.metricsBySession.get(session.id);
    if (metrics) samples.push(scoreMetrics(metrics));
  }
  return { quality: averageQuality(samples), size: samples.length };
}

function toGroupReport(group: GroupAggregate): MethodologyGroupReport {
  const { stats } = group;
  const empty = stats.sessions === 0;
  const sample = empty ? { quality: null, size: 0 } : sampleQuality(group);

  return {
    methodology: group.methodology,
    label: methodologyLabel(group.methodology),
    empty,
    sessions: stats.sessions,
    skipped: group.skipped,
    totalDurationMs: stats.totalDurationMs,
    avgDurationMs: stats.avgDurationMs,
    avgEnergy: stats.avgEnergy ?? null,
    metrics: { ...stats.metrics },
    perSession: empty
      ? null
      : {
          exchanges: stats.metrics.exchanges / stats.sessions,
          codeBlocks: stats.metrics.codeBlocks / stats.sessions,
        },
    quality: sample.quality,
    qualitySampleSize: sample.size,
  };
}

export function generateRecommendations(
  groups: ReadonlyArray<{ methodology: Methodology; stats: MethodologyStats }>,
): Recommendation[] {
  const active = groups.filter((g) => g.stats.sessions > 0);
  const recommendations: Recommendation[] = [];

  // Highest average energy wins; the first group keeps a tie
  let best: { methodology: Methodology; energy: number } | null = null;
  for (const group of active) {
    const energy = group.stats.avgEnergy ?? 0;
    if (!best || energy > best.energy) {
      best = { methodology: group.methodology, energy };
    }
  }
  if (best && best.energy > ENERGY_RECOMMENDATION_THRESHOLD) {
    recommendations.push({
      kind: 'continue',
      methodology: best.methodology,
      value: best.energy,
      message: `Continue using ${methodologyLabel(best.methodology)} methodology - it shows high creative energy (${best.energy.toFixed(1)}/3)`,
    });
  }

  for (const group of active) {
    const rate = group.stats.metrics.confusionMarkers / group.stats.sessions;
    if (rate > CONFUSION_RATE_THRESHOLD) {
      recommendations.push({
        kind: 'clarify',
        methodology: group.methodology,
        value: rate,
        message: `Consider clearer requirements when using ${methodologyLabel(group.methodology)} - high confusion rate (${rate.toFixed(1)} per session)`,
      });
    }
  }

  for (const group of active) {
    const rate = group.stats.metrics.codeBlocks / group.stats.sessions;
    if (rate > CODE_RATE_THRESHOLD) {
      recommendations.push({
        kind: 'productivity',
        methodology: group.methodology,
        value: rate,
        message: `${methodologyLabel(group.methodology)} shows high code productivity (${rate.toFixed(1)} blocks per session)`,
      });
    }
  }

  if (recommendations.length === 0) {
    recommendations.push({ kind: 'none', message: FALLBACK_RECOMMENDATION });
  }
  return recommendations;
}

export function buildMethodologyReport(aggregation: AggregationResult): MethodologyReport {
  return {
    totalSessions: aggregation.totalSessions,
    totalSkipped: aggregation.totalSkipped,
    groups: aggregation.groups.map(toGroupReport),
    recommendations: generateRecommendations(aggregation.groups),
  };
}
