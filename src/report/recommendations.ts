import type { Scorecard } from '../scorecard/types.js';

export const RECOMMENDATIONS = {
  lowResilience: '**Critical**: System resilience is low. Implement error handling and retry logic.',
  toolErrors: 'Improve tool call error handling. Many tool calls are failing.',
  retryLogic: 'Implement retry logic. System is not recovering from failures effectively.',
  exceptionHandling: 'Add exception handling. Agent is crashing on errors.',
  fuzzingConfig: 'Fuzzing is not being applied effectively. Check proxy configuration.',
  noRetries: 'No retry attempts detected. Consider implementing retry mechanisms.',
  raceSequential:
    '**CRITICAL**: Race condition detected! Agent is calling dependent tools before dependencies complete. ' +
    'Implement sequential tool execution or dependency validation before calling dependent tools.',
  raceDependency:
    "**Solution**: Ensure tools that depend on other tools' results wait for those results. " +
    'For example, `book_ticket` should only be called after `search_flights` returns a valid `flight_id`.',
  healthy: 'System shows good resilience. Continue monitoring and testing.',
  noData: 'No log data was analyzed. Run a chaos session to produce a proxy log, then generate the scorecard again.',
} as const;

/**
 * Rule-based recommendations derived from metric thresholds only.
 */
export function buildRecommendations(scorecard: Scorecard): string[] {
  if (scorecard.grade === 'N/A') {
    return [RECOMMENDATIONS.noData];
  }

  const m = scorecard.metrics;
  const recommendations: string[] = [];

  if (scorecard.grade === 'D' || scorecard.grade === 'F') {
    recommendations.push(RECOMMENDATIONS.lowResilience);
  }
  if (m.tool_call_success_rate < 70) {
    recommendations.push(RECOMMENDATIONS.toolErrors);
  }
  if (m.system_recovery_rate < 50) {
    recommendations.push(RECOMMENDATIONS.retryLogic);
  }
  if (m.agent_crashes > 0) {
    recommendations.push(RECOMMENDATIONS.exceptionHandling);
  }
  // a zero rate with nothing attempted says nothing about the proxy
  if (m.fuzzing_attempts > 0 && m.fuzzing_success_rate < 50) {
    recommendations.push(RECOMMENDATIONS.fuzzingConfig);
  }
  if (m.retry_attempts === 0 && m.failed_tool_calls > 0) {
    recommendations.push(RECOMMENDATIONS.noRetries);
  }
  if (m.race_conditions_detected > 0) {
    recommendations.push(RECOMMENDATIONS.raceSequential, RECOMMENDATIONS.raceDependency);
  }

  if (recommendations.length === 0) {
    recommendations.push(RECOMMENDATIONS.healthy);
  }

  return recommendations;
}
