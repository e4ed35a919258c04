import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { SessionAnalyzer } from '../analysis/analyzer.js';
import type { MethodologyReport } from '../analysis/aggregate.js';
import { loadConfig, resolveConfig } from '../config/config.js';
import { formatGroupStats, formatMethodologyReport } from '../report/format.js';
import { methodologyLabel } from '../session/methodology.js';
import { openMetadataStore } from '../store/index.js';

interface AnalyzeOptions {
  methodology?: string;
  comparative?: boolean;
}

function buildReport(analyzer: SessionAnalyzer): MethodologyReport {
  const spinner = ora('Analyzing sessions...').start();
  try {
    const report = analyzer.buildReport();
    spinner.succeed(`Analyzed ${report.totalSessions} session(s)`);
    return report;
  } catch (err) {
    spinner.fail('Analysis failed');
    throw err;
  }
}

async function runAnalyze(options: AnalyzeOptions): Promise<void> {
  const config = resolveConfig(loadConfig());
  const analyzer = new SessionAnalyzer(openMetadataStore(config.logsDir));

  const report = buildReport(analyzer);

  if (options.methodology && !options.comparative) {
    const filter = options.methodology.toLowerCase();
    console.log(`Analyzing sessions with methodology: ${options.methodology}`);

    // Substring match on the display label, so "context" finds Context-Driven
    const group = report.groups.find((g) =>
      methodologyLabel(g.methodology).toLowerCase().includes(filter),
    );
    if (!group) {
      console.log(chalk.yellow(`No sessions found for methodology: ${options.methodology}`));
      return;
    }
    console.log(chalk.bold(`=== ${group.label} Analysis ===`));
    for (const line of formatGroupStats(group).slice(1)) {
      console.log(line);
    }
    return;
  }

  for (const line of formatMethodologyReport(report)) {
    console.log(line.startsWith('===') ? chalk.bold(line) : line);
  }
}

export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Analyze logged sessions and compare methodologies')
    .option('--methodology <name>', 'show statistics for one methodology')
    .option('--comparative', 'generate the comparative report across methodologies')
    .action(runAnalyze);
}
