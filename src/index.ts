export { analyze, analyzeContent, buildScorecard, emptyScorecard, ANALYZER_VERSION } from './scorecard/analyzer.js';
export type { AnalyzeOptions, LogAnalysis } from './scorecard/analyzer.js';
export { findLogFile, CONVENTIONAL_LOG_NAMES } from './scorecard/locator.js';
export { parseLine, splitLines } from './scorecard/line-parser.js';
export type { ParsedLine } from './scorecard/line-parser.js';
export { decodeLogRecord, parseLogRecord, resolveToolName } from './scorecard/record-parser.js';
export { parseTextLine, extractTimestamp, classifyToolUrl } from './scorecard/text-parser.js';
export { MetricsAccumulator, Tally, deriveRates } from './scorecard/metrics.js';
export { countSuccessfulRetries, RETRY_LOOKAHEAD_LINES } from './scorecard/retry-correlator.js';
export { detectRaceConditions, DEFAULT_DEPENDENCY_PAIRS } from './scorecard/race-detector.js';
export { calculateResilienceScore, gradeFor } from './scorecard/score.js';
export type {
  LogRecord,
  Event,
  EventType,
  LogicError,
  Metrics,
  Grade,
  Scorecard,
  ScorecardMetadata,
  ToolCall,
  DependencyPair,
} from './scorecard/types.js';
export { generateJsonReport, toScorecardDocument } from './report/json-reporter.js';
export type { ScorecardDocument } from './report/json-reporter.js';
export { generateMarkdownReport } from './report/markdown-reporter.js';
export { buildRecommendations } from './report/recommendations.js';
export { createApp, startServer } from './server/index.js';
