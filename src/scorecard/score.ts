import { roundTo } from '../utils/format.js';
import type { DerivedRates, Grade, MetricCounters } from './types.js';

export const SCORE_WEIGHTS = {
  toolSuccess: 0.4,
  recovery: 0.4,
  completion: 0.2,
} as const;

// Lower bounds, highest first
const GRADE_THRESHOLDS: ReadonlyArray<[number, Grade]> = [
  [90, 'A'],
  [80, 'B'],
  [70, 'C'],
  [60, 'D'],
];

/**
 * Weighted 0-100 score, rounded to two decimals.
 *
 * Completion counts as 100 when nothing crashed, otherwise completions over
 * completions plus crashes.
 */
export function calculateResilienceScore(
  c: Pick<MetricCounters, 'agent_crashes' | 'agent_successful_completion'>,
  rates: Pick<DerivedRates, 'tool_call_success_rate' | 'system_recovery_rate'>
): number {
  const toolScore = Math.min(rates.tool_call_success_rate, 100);
  const recoveryScore = Math.min(rates.system_recovery_rate, 100);

  let completionScore = 100;
  if (c.agent_crashes > 0) {
    const attempts = c.agent_successful_completion + c.agent_crashes;
    completionScore = (c.agent_successful_completion / attempts) * 100;
  }

  const score =
    toolScore * SCORE_WEIGHTS.toolSuccess +
    recoveryScore * SCORE_WEIGHTS.recovery +
    completionScore * SCORE_WEIGHTS.completion;

  return roundTo(score, 2);
}

export function gradeFor(score: number): Grade {
  for (const [threshold, grade] of GRADE_THRESHOLDS) {
    if (score >= threshold) return grade;
  }
  return 'F';
}
