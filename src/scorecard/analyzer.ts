import { readFileSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger.js';
import { deepFreeze } from '../utils/freeze.js';
import { findLogFile, type LocateOptions } from './locator.js';
import { parseLine, splitLines } from './line-parser.js';
import { MetricsAccumulator, emptyCounters } from './metrics.js';
import { countSuccessfulRetries } from './retry-correlator.js';
import { detectRaceConditions, DEFAULT_DEPENDENCY_PAIRS, type LocatedRecord } from './race-detector.js';
import { gradeFor } from './score.js';
import { buildSummary, EMPTY_SUMMARY_MESSAGE } from './summary.js';
import type { DependencyPair, Event, Metrics, Scorecard, ToolCall } from './types.js';

export const ANALYZER_VERSION = '1.0.0';
export const RECENT_TOOL_CALLS = 10;
export const RECENT_EVENTS = 20;

export interface AnalyzeOptions extends LocateOptions {
  dependencyPairs?: readonly DependencyPair[];
}

export interface LogAnalysis {
  events: Event[];
  metrics: Metrics;
}

/**
 * Run the full pipeline over log content: parse every line, correlate
 * retries, detect races, derive rates.
 */
export function analyzeContent(
  content: string,
  dependencyPairs: readonly DependencyPair[] = DEFAULT_DEPENDENCY_PAIRS
): LogAnalysis {
  const lines = splitLines(content);
  const accumulator = new MetricsAccumulator();
  const events: Event[] = [];
  const records: LocatedRecord[] = [];

  lines.forEach((raw, index) => {
    const lineNumber = index + 1;
    const parsed = parseLine(raw, lineNumber);
    if (parsed.kind === 'empty') return;

    for (const event of parsed.events) {
      accumulator.recordEvent(event);
      events.push(event);
    }

    if (parsed.kind === 'record') {
      records.push({ line: lineNumber, record: parsed.record });
      if (parsed.swarm) accumulator.recordSwarm(parsed.swarm);
    }
  });

  accumulator.recordSuccessfulRetries(countSuccessfulRetries(events, lines));
  accumulator.recordLogicErrors(detectRaceConditions(records, dependencyPairs));

  return { events, metrics: accumulator.toMetrics() };
}

function toolCallsFrom(events: readonly Event[]): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const event of events) {
    if (event.type === 'tool_call') {
      calls.push({ line: event.line, url: event.url, timestamp: event.timestamp, tool_name: event.tool_name });
    }
  }
  return calls;
}

export function buildScorecard(analysis: LogAnalysis, logFile: string): Scorecard {
  const grade = gradeFor(analysis.metrics.resilience_score);

  const scorecard: Scorecard = {
    metadata: {
      generated_at: new Date().toISOString(),
      analyzer_version: ANALYZER_VERSION,
      analysis_id: uuidv4(),
      log_file: logFile,
    },
    metrics: analysis.metrics,
    grade,
    summary: buildSummary(analysis.metrics, grade),
    tool_calls: toolCallsFrom(analysis.events).slice(-RECENT_TOOL_CALLS),
    events: analysis.events.slice(-RECENT_EVENTS),
  };
  return deepFreeze(scorecard);
}

function emptyMetrics(): Metrics {
  return {
    ...emptyCounters(),
    tool_call_errors: {},
    fuzzing_types: {},
    swarm_communication_errors: {},
    logic_errors: [],
    tool_call_success_rate: 0,
    fuzzing_success_rate: 0,
    system_recovery_rate: 0,
    retry_success_rate: 0,
    resilience_score: 0,
  };
}

/**
 * Scorecard for runs with nothing to analyze: grade N/A, zeroed metrics and
 * a warning in the metadata.
 */
export function emptyScorecard(warning: string, logFile?: string): Scorecard {
  const scorecard: Scorecard = {
    metadata: {
      generated_at: new Date().toISOString(),
      analyzer_version: ANALYZER_VERSION,
      analysis_id: uuidv4(),
      ...(logFile ? { log_file: logFile } : {}),
      warning,
    },
    metrics: emptyMetrics(),
    grade: 'N/A',
    summary: { grade: 'N/A', message: EMPTY_SUMMARY_MESSAGE },
    tool_calls: [],
    events: [],
  };
  return deepFreeze(scorecard);
}

/**
 * Locate, read and analyze one log file. Never throws: a missing or
 * unreadable file produces the empty scorecard.
 */
export function analyze(options: AnalyzeOptions): Scorecard {
  logger.info('Starting log analysis', { logFile: options.logFile, logDir: options.logDir });

  const logFile = findLogFile(options);
  if (!logFile) {
    logger.warn('No log file found. Using empty results.');
    return emptyScorecard('No log file found');
  }

  let content: string;
  try {
    content = readFileSync(logFile, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('Error reading log file', { path: logFile, error: message });
    return emptyScorecard(`Failed to read log file: ${message}`, logFile);
  }

  logger.info('Parsing log file', { path: logFile });
  const analysis = analyzeContent(content, options.dependencyPairs);
  const scorecard = buildScorecard(analysis, logFile);

  logger.info('Analysis complete', {
    grade: scorecard.grade,
    score: scorecard.metrics.resilience_score,
    events: analysis.events.length,
    raceConditions: scorecard.metrics.race_conditions_detected,
  });

  return scorecard;
}
