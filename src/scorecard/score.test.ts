import { describe, expect, it } from 'vitest';

import { calculateResilienceScore, gradeFor } from './score.js';

describe('gradeFor', () => {
  it.each([
    [100, 'A'],
    [90, 'A'],
    [89.99, 'B'],
    [80, 'B'],
    [79.99, 'C'],
    [70, 'C'],
    [69.99, 'D'],
    [60, 'D'],
    [59.99, 'F'],
    [0, 'F'],
  ])('grades %d as %s', (score, grade) => {
    expect(gradeFor(score)).toBe(grade);
  });
});

describe('calculateResilienceScore', () => {
  it('weights success, recovery and completion 40/40/20', () => {
    expect(
      calculateResilienceScore(
        { agent_crashes: 0, agent_successful_completion: 0 },
        { tool_call_success_rate: 75, system_recovery_rate: 100 }
      )
    ).toBe(90);
  });

  it('uses completions over attempts once anything crashed', () => {
    expect(
      calculateResilienceScore(
        { agent_crashes: 1, agent_successful_completion: 1 },
        { tool_call_success_rate: 50, system_recovery_rate: 20 }
      )
    ).toBe(38);
  });

  it('scores completion as zero when there were only crashes', () => {
    expect(
      calculateResilienceScore(
        { agent_crashes: 3, agent_successful_completion: 0 },
        { tool_call_success_rate: 100, system_recovery_rate: 100 }
      )
    ).toBe(80);
  });

  it('rounds to two decimals', () => {
    expect(
      calculateResilienceScore(
        { agent_crashes: 0, agent_successful_completion: 0 },
        { tool_call_success_rate: 200 / 3, system_recovery_rate: 0 }
      )
    ).toBe(46.67);
  });
});
