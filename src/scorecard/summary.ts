import type { Grade, Metrics } from './types.js';

export const EMPTY_SUMMARY_MESSAGE = 'No log data available for analysis';

/**
 * Human-readable one-liners keyed by metric area, in report order.
 */
export function buildSummary(metrics: Metrics, grade: Grade): Record<string, string> {
  const completions = metrics.agent_successful_completion;
  const crashes = metrics.agent_crashes;

  const summary: Record<string, string> = {
    grade,
    resilience_score: `${metrics.resilience_score.toFixed(1)}/100`,
    tool_calls:
      `Total: ${metrics.total_tool_calls}, ` +
      `Successful: ${metrics.successful_tool_calls}, ` +
      `Failed: ${metrics.failed_tool_calls}`,
    fuzzing: `Attempted: ${metrics.fuzzing_attempts}, Successful: ${metrics.fuzzing_successful}`,
    recovery: `System recovered from ${metrics.system_recovery_rate.toFixed(1)}% of failures`,
    outcome: `Completions: ${completions}, Crashes: ${crashes}`,
  };

  if (metrics.fuzzing_attempts > 0) {
    const outcomes = completions + crashes;
    const survival = outcomes > 0 ? (completions / outcomes) * 100 : 0;
    summary.protocol_attacks = `System survived ${survival.toFixed(1)}% of protocol attacks`;
  } else {
    summary.protocol_attacks = 'No protocol attacks detected';
  }

  if (metrics.race_conditions_detected > 0) {
    summary.race_conditions =
      `CRITICAL: ${metrics.race_conditions_detected} race condition(s) detected - ` +
      'Agent called dependent tools before dependencies completed';
    if (metrics.logic_errors.length > 0) {
      summary.logic_errors = metrics.logic_errors
        .slice(0, 3)
        .map((error) => error.description)
        .join('; ');
    }
  } else {
    summary.race_conditions = 'No race conditions detected';
  }

  return summary;
}
