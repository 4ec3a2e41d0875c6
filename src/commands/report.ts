import { writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { logger, setLogLevel } from '../utils/logger.js';
import { titleCase } from '../utils/format.js';
import { analyze } from '../scorecard/analyzer.js';
import { generateJsonReport } from '../report/json-reporter.js';
import { generateMarkdownReport } from '../report/markdown-reporter.js';
import type { Scorecard } from '../scorecard/types.js';

export const JSON_REPORT_NAME = 'resilience_report.json';
export const MARKDOWN_REPORT_NAME = 'resilience_report.md';

export interface ReportOptions {
  logFile?: string;
  logDir: string;
  outputDir: string;
  jsonOnly?: boolean;
  mdOnly?: boolean;
  debug?: boolean;
}

export interface ReportResult {
  scorecard: Scorecard;
  written: string[];
}

/**
 * Analyze once and write the requested reports from that same snapshot.
 */
export function writeReports(options: ReportOptions): ReportResult {
  const { logFile, logDir, outputDir, jsonOnly, mdOnly } = options;

  mkdirSync(outputDir, { recursive: true });

  const scorecard = analyze({ logFile, logDir });
  const written: string[] = [];

  if (!mdOnly) {
    const jsonPath = join(outputDir, JSON_REPORT_NAME);
    writeFileSync(jsonPath, generateJsonReport(scorecard), 'utf-8');
    logger.info(`JSON report generated: ${jsonPath}`);
    written.push(jsonPath);
  }

  if (!jsonOnly) {
    const mdPath = join(outputDir, MARKDOWN_REPORT_NAME);
    writeFileSync(mdPath, generateMarkdownReport(scorecard), 'utf-8');
    logger.info(`Markdown report generated: ${mdPath}`);
    written.push(mdPath);
  }

  return { scorecard, written };
}

export function formatConsoleSummary(scorecard: Scorecard): string {
  const lines: string[] = [];
  lines.push('Scorecard Summary');
  lines.push('');
  lines.push(`Grade: ${scorecard.grade}`);
  lines.push(`Resilience Score: ${scorecard.metrics.resilience_score.toFixed(1)}/100`);
  lines.push('');
  for (const [key, value] of Object.entries(scorecard.summary)) {
    if (key === 'grade') continue;
    lines.push(`  ${titleCase(key)}: ${value}`);
  }
  return lines.join('\n');
}

export async function reportCommand(options: ReportOptions): Promise<void> {
  if (options.debug) {
    setLogLevel('debug');
  }

  let result: ReportResult;
  try {
    result = writeReports(options);
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error('Failed to write reports', { outputDir: options.outputDir, error: errorMessage });
    process.exitCode = 1;
    return;
  }

  for (const path of result.written) {
    console.log(`Report: ${path}`);
  }
  console.log('');
  console.log(formatConsoleSummary(result.scorecard));
}
