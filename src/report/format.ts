import type {
  MethodologyGroupReport,
  MethodologyReport,
} from '../analysis/aggregate.js';
import type { SessionSummary } from '../analysis/analyzer.js';
import type { AnalysisMetrics, SessionQuality } from '../analysis/types.js';
import { wholeMinutes } from '../git/repo.js';
import { methodologyLabel } from '../session/methodology.js';
import type { SessionMetadata } from '../session/types.js';

/** `2025-01-15T10:05:09Z` → `2025-01-15 10:05` (UTC) */
export function formatTimestamp(date: Date, withSeconds = false): string {
  const iso = date.toISOString().replace('T', ' ');
  return withSeconds ? `${iso.slice(0, 19)} UTC` : iso.slice(0, 16);
}

export function formatSessionLine(session: SessionMetadata): string {
  let line = `${session.id} | ${methodologyLabel(session.methodology)} | ${session.project} | ${formatTimestamp(session.timestamp)}`;
  if (session.durationMs !== undefined) {
    line += ` | ${wholeMinutes(session.durationMs)}m`;
  }
  if (session.creativeEnergy !== undefined) {
    line += ` | Energy: ${session.creativeEnergy}/3`;
  }
  return line;
}

function metricLines(metrics: AnalysisMetrics, indent: string): string[] {
  return [
    `${indent}Exchanges: ${metrics.exchanges}`,
    `${indent}Code Blocks: ${metrics.codeBlocks}`,
    `${indent}Questions Asked: ${metrics.questionsAsked}`,
    `${indent}Enthusiasm Markers: ${metrics.enthusiasmMarkers}`,
    `${indent}Confusion Markers: ${metrics.confusionMarkers}`,
    `${indent}Compaction Indicators: ${metrics.compactionIndicators}`,
  ];
}

function qualityLines(quality: SessionQuality, indent: string, prefix = ''): string[] {
  return [
    `${indent}${prefix}Engagement: ${quality.engagement.toFixed(1)}/100`,
    `${indent}${prefix}Clarity: ${quality.clarity.toFixed(1)}/100`,
    `${indent}${prefix}Productivity: ${quality.productivity.toFixed(1)}/100`,
    `${indent}${prefix}Overall: ${quality.overall.toFixed(1)}/100`,
  ];
}

export function formatSessionSummary(summary: SessionSummary): string[] {
  const { session } = summary;
  const lines = [
    `=== Session Summary: ${session.id} ===`,
    `Project: ${session.project}`,
    `Methodology: ${methodologyLabel(session.methodology)}`,
    `Timestamp: ${formatTimestamp(session.timestamp, true)}`,
  ];
  if (session.durationMs !== undefined) {
    lines.push(`Duration: ${wholeMinutes(session.durationMs)} minutes`);
  }
  if (session.creativeEnergy !== undefined) {
    lines.push(`Creative Energy: ${session.creativeEnergy}/3`);
  }
  if (session.featuresWorkedOn.length > 0) {
    lines.push(`Features: ${session.featuresWorkedOn.join(', ')}`);
  }

  lines.push('', 'Conversation Metrics:', ...metricLines(summary.metrics, '  '));
  lines.push('', 'Quality Scores:', ...qualityLines(summary.quality, '  '));
  return lines;
}

export function formatGroupStats(group: MethodologyGroupReport): string[] {
  const lines = [`${group.label} Sessions:`, `  Sessions: ${group.sessions}`];
  if (group.skipped > 0) {
    lines.push(`  Skipped (unreadable logs): ${group.skipped}`);
  }

  const avgMinutes = wholeMinutes(group.avgDurationMs);
  if (avgMinutes > 0) {
    lines.push(`  Average Duration: ${avgMinutes} minutes`);
    lines.push(`  Total Duration: ${wholeMinutes(group.totalDurationMs)} minutes`);
  }
  if (group.avgEnergy !== null) {
    lines.push(`  Average Creative Energy: ${group.avgEnergy.toFixed(1)}/3`);
  }

  lines.push('  Conversation Metrics:', ...metricLines(group.metrics, '    ').map((l) =>
    l.replace('Exchanges:', 'Total Exchanges:'),
  ));

  if (group.perSession) {
    lines.push(
      '  Average per Session:',
      `    Exchanges: ${group.perSession.exchanges.toFixed(1)}`,
      `    Code Blocks: ${group.perSession.codeBlocks.toFixed(1)}`,
    );
  }
  return lines;
}

export function formatMethodologyReport(report: MethodologyReport): string[] {
  const lines = ['=== Session Analysis Report ===', ''];
  const active = report.groups.filter((g) => !g.empty);

  if (report.groups.length === 0) {
    lines.push('No sessions found for analysis.');
    return lines;
  }

  lines.push(`Total Sessions Analyzed: ${report.totalSessions}`);
  if (report.totalSkipped > 0) {
    lines.push(`Sessions Skipped: ${report.totalSkipped}`);
  }

  lines.push('', '=== Methodology Comparison ===');
  for (const group of active) {
    lines.push('', ...formatGroupStats(group));
  }

  lines.push('', '=== Session Quality Analysis ===');
  for (const group of active) {
    lines.push('', `${group.label} Quality Metrics:`);
    if (group.quality) {
      lines.push(...qualityLines(group.quality, '  ', 'Average '));
    }
  }

  lines.push('', '=== Recommendations ===');
  if (report.recommendations.length === 1 && report.recommendations[0].kind === 'none') {
    lines.push(report.recommendations[0].message);
  } else {
    report.recommendations.forEach((r, i) => lines.push(`${i + 1}. ${r.message}`));
  }
  return lines;
}
