import fs from 'node:fs';
import { TranscriptReadError } from '../errors.js';
import type { MetadataStore } from '../store/metadata.js';
import type { SessionMetadata } from '../session/types.js';
import { aggregateSessions, buildMethodologyReport } from './aggregate.js';
import type { AggregationResult, MethodologyReport, TranscriptSource } from './aggregate.js';
import { createMetricsExtractor } from './metrics.js';
import type { MetricsExtractor } from './metrics.js';
import { createPatternMatcher } from './patterns.js';
import type { PatternMatcher } from './patterns.js';
import { scoreMetrics } from './quality.js';
import type { AnalysisMetrics, SessionQuality } from './types.js';

export const fileTranscriptSource: TranscriptSource = {
  read(filePath) {
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new TranscriptReadError(filePath, { cause: err });
    }
  },
};

export interface SessionAnalysis {
  metrics: AnalysisMetrics;
  quality: SessionQuality;
}

export interface SessionSummary extends SessionAnalysis {
  session: SessionMetadata;
}

export interface SessionAnalyzerOptions {
  matcher?: PatternMatcher;
  source?: TranscriptSource;
}

/**
 * Joins stored session metadata with freshly computed transcript metrics.
 */
export class SessionAnalyzer {
  private readonly extractor: MetricsExtractor;
  private readonly source: TranscriptSource;

  constructor(
    private readonly store: MetadataStore,
    opts: SessionAnalyzerOptions = {},
  ) {
    this.extractor = createMetricsExtractor(opts.matcher ?? createPatternMatcher());
    this.source = opts.source ?? fileTranscriptSource;
  }

  analyzeText(text: string): SessionAnalysis {
    const metrics = this.extractor.extract(text);
    return { metrics, quality: scoreMetrics(metrics) };
  }

  analyzeLogFile(logFile: string): AnalysisMetrics {
    return this.extractor.extract(this.source.read(logFile));
  }

  analyzeSession(sessionId: string): SessionAnalysis {
    const session = this.store.require(sessionId);
    return this.analyzeText(this.source.read(session.logFile));
  }

  getSessionSummary(sessionId: string): SessionSummary {
    const session = this.store.require(sessionId);
    return { session, ...this.analyzeText(this.source.read(session.logFile)) };
  }

  compareMethodologies(): AggregationResult {
    return aggregateSessions(this.store.byMethodology(), this.extractor, this.source);
  }

  buildReport(): MethodologyReport {
    return buildMethodologyReport(this.compareMethodologies());
  }
}
