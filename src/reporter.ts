import chalk from 'chalk';
import { prettyPrint } from './format.js';
import type { Logger } from './logger.js';
import type { OutputFormat, ReportSnapshot } from './types.js';

export interface RunSummary {
  report: ReportSnapshot;
  bursts: number;
  duration: number;
}

export interface ReporterOptions {
  format: OutputFormat;
  logger: Logger;
  write?: (text: string) => void;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function successRate(report: ReportSnapshot): string {
  return report.TotalRequests > 0
    ? ((report.TotalSuccess / report.TotalRequests) * 100).toFixed(1)
    : '0.0';
}

function formatPretty(summary: RunSummary): string {
  const { report } = summary;
  const rate = successRate(report);
  const failRate = report.TotalRequests > 0 ? (100 - parseFloat(rate)).toFixed(1) : '0.0';

  return [
    '',
    chalk.bold('Burstload Report'),
    chalk.gray('══════════════════════════════════════'),
    `${chalk.cyan('Duration:')}      ${formatDuration(summary.duration)}`,
    `${chalk.cyan('Bursts:')}        ${summary.bursts}`,
    '',
    chalk.bold('Requests:'),
    `  Total:        ${report.TotalRequests}`,
    `  Succeeded:    ${chalk.green(report.TotalSuccess)} (${rate}%)`,
    `  Failed:       ${chalk.red(report.TotalFail)} (${failRate}%)`,
    chalk.gray('══════════════════════════════════════'),
    '',
  ].join('\n');
}

/**
 * Renders the final report. `json` is the indented three-counter object;
 * throws SerializationError if it cannot be rendered.
 */
export function formatReport(summary: RunSummary, format: OutputFormat = 'json'): string {
  if (format === 'pretty') {
    return formatPretty(summary);
  }
  return prettyPrint(summary.report);
}

export function printReport(summary: RunSummary, options: ReporterOptions): void {
  const write = options.write ?? ((text: string) => console.log(text));
  const text = formatReport(summary, options.format);
  if (options.format === 'json') {
    options.logger.info('--------------------REPORT--------------------');
  }
  write(text);
}
