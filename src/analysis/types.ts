export interface AnalysisMetrics {
  exchanges: number;
  codeBlocks: number;
  questionsAsked: number;
  enthusiasmMarkers: number;
  confusionMarkers: number;
  compactionIndicators: number;
}

/** Scores in [0, 100]; `overall` is the mean of the other three. */
export interface SessionQuality {
  engagement: number;
  clarity: number;
  productivity: number;
  overall: number;
}

export function emptyMetrics(): AnalysisMetrics {
  return {
    exchanges: 0,
    codeBlocks: 0,
    questionsAsked: 0,
    enthusiasmMarkers: 0,
    confusionMarkers: 0,
    compactionIndicators: 0,
  };
}

export function addMetrics(a: AnalysisMetrics, b: AnalysisMetrics): AnalysisMetrics {
  return {
    exchanges: a.exchanges + b.exchanges,
    codeBlocks: a.codeBlocks + b.codeBlocks,
    questionsAsked: a.questionsAsked + b.questionsAsked,
    enthusiasmMarkers: a.enthusiasmMarkers + b.enthusiasmMarkers,
    confusionMarkers: a.confusionMarkers + b.confusionMarkers,
    compactionIndicators: a.compactionIndicators + b.compactionIndicators,
  };
}
