import { describe, expect, it } from 'vitest';

import { MIXED_SESSION_LOG } from '../__fixtures__/session-logs.js';
import { analyzeContent, buildScorecard, emptyScorecard } from '../scorecard/analyzer.js';
import { generateJsonReport } from './json-reporter.js';
import { RECOMMENDATIONS } from './recommendations.js';

describe('generateJsonReport', () => {
  it('writes the scorecard with recommendations', () => {
    const scorecard = buildScorecard(analyzeContent(MIXED_SESSION_LOG), 'session.log');
    const text = generateJsonReport(scorecard);

    expect(text.startsWith('{\n  "metadata": {\n')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);

    const document = JSON.parse(text);
    expect(document.grade).toBe('A');
    expect(document.metadata.analysis_id).toBe(scorecard.metadata.analysis_id);
    expect(document.metrics.resilience_score).toBe(90);
    expect(document.metrics.tool_call_errors).toEqual({ not_found: 1 });
    expect(document.tool_calls.map((call: { line: number }) => call.line)).toEqual([1, 2, 4, 5]);
    expect(document.recommendations).toEqual([RECOMMENDATIONS.raceSequential, RECOMMENDATIONS.raceDependency]);
  });

  it('keeps the warning of an empty scorecard', () => {
    const document = JSON.parse(generateJsonReport(emptyScorecard('No log file found')));

    expect(document.grade).toBe('N/A');
    expect(document.metadata.warning).toBe('No log file found');
    expect(document.summary).toEqual({ grade: 'N/A', message: 'No log data available for analysis' });
    expect(document.recommendations).toEqual([RECOMMENDATIONS.noData]);
  });
});
