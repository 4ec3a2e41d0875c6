import { describe, expect, it } from 'vitest';

import { MetricsAccumulator, Tally, deriveRates, emptyCounters } from './metrics.js';

describe('Tally', () => {
  it('reads unseen keys as zero and keeps insertion order', () => {
    const tally = new Tally();
    expect(tally.get('timeout')).toBe(0);

    tally.increment('not_found');
    tally.increment('timeout');
    tally.increment('not_found');

    expect(tally.get('not_found')).toBe(2);
    expect(Object.keys(tally.toRecord())).toEqual(['not_found', 'timeout']);
  });
});

describe('MetricsAccumulator', () => {
  it('counts events by kind', () => {
    const acc = new MetricsAccumulator();
    acc.recordEvent({ type: 'tool_call', line: 1, timestamp: null, url: 'u', tool_name: 'search_flights' });
    acc.recordEvent({ type: 'response', line: 1, timestamp: null, status_code: 200 });
    acc.recordEvent({ type: 'response', line: 2, timestamp: null, status_code: 404, error_type: 'not_found' });
    acc.recordEvent({ type: 'response', line: 3, timestamp: null, status_code: 500 });
    acc.recordEvent({ type: 'error', line: 4, timestamp: null, error_type: 'timeout', message: 'timeout error' });
    acc.recordEvent({ type: 'fuzzing', line: 5, timestamp: null, fuzz_type: 'garbage_value', fields_fuzzed: 2 });
    acc.recordEvent({ type: 'fuzzing', line: 6, timestamp: null, fuzz_type: 'unknown', fields_fuzzed: 0 });
    acc.recordEvent({ type: 'retry', line: 7, timestamp: null });
    acc.recordEvent({ type: 'completion', line: 8, timestamp: null });
    acc.recordEvent({ type: 'crash', line: 9, timestamp: null, message: 'Traceback' });

    const metrics = acc.toMetrics();
    expect(metrics.total_tool_calls).toBe(1);
    expect(metrics.successful_tool_calls).toBe(1);
    expect(metrics.failed_tool_calls).toBe(3);
    expect(metrics.tool_call_errors).toEqual({ not_found: 1, timeout: 1 });
    expect(metrics.fuzzing_attempts).toBe(2);
    expect(metrics.fuzzing_successful).toBe(1);
    expect(metrics.fuzzing_types).toEqual({ garbage_value: 1, unknown: 1 });
    expect(metrics.retry_attempts).toBe(1);
    expect(metrics.agent_successful_completion).toBe(1);
    expect(metrics.agent_crashes).toBe(1);
  });

  it('tallies swarm disruptions', () => {
    const acc = new MetricsAccumulator();
    acc.recordSwarm({ traffic_subtype: 'consensus', chaos: 'swarm_disruption,consensus_delay', status_code: 503 });
    acc.recordSwarm({ chaos: 'agent_isolation', status_code: 200 });

    const metrics = acc.toMetrics();
    expect(metrics.agent_to_agent_disruptions).toBe(2);
    expect(metrics.message_mutations).toBe(1);
    expect(metrics.consensus_delays).toBe(1);
    expect(metrics.agent_isolations).toBe(1);
    expect(metrics.swarm_communication_errors).toEqual({ swarm_consensus: 1, swarm_error_503: 1 });
  });

  it('records retries and logic errors from the correlation stages', () => {
    const acc = new MetricsAccumulator();
    acc.recordSuccessfulRetries(2);
    acc.recordLogicErrors([
      {
        type: 'race_condition',
        description: 'book_ticket called before search_flights completed or with invalid input',
        dependency_tool: 'search_flights',
        dependent_tool: 'book_ticket',
        dependent_call_line: 4,
        dependent_call_time: '2024-05-01T10:00:00Z',
        dependent_call_status: 404,
        dependency_available: false,
        simultaneous_calls: false,
      },
    ]);

    const metrics = acc.toMetrics();
    expect(metrics.successful_retries).toBe(2);
    expect(metrics.race_conditions_detected).toBe(1);
    expect(metrics.logic_errors).toHaveLength(1);
  });
});

describe('deriveRates', () => {
  it('computes percentages', () => {
    const rates = deriveRates({
      ...emptyCounters(),
      total_tool_calls: 4,
      successful_tool_calls: 3,
      fuzzing_attempts: 4,
      fuzzing_successful: 1,
      failed_tool_calls: 4,
      successful_retries: 1,
      retry_attempts: 2,
      agent_successful_completion: 1,
    });
    expect(rates.tool_call_success_rate).toBe(75);
    expect(rates.fuzzing_success_rate).toBe(25);
    expect(rates.system_recovery_rate).toBe(50);
    expect(rates.retry_success_rate).toBe(50);
  });

  it('treats zero failures as full recovery regardless of retries', () => {
    const rates = deriveRates({ ...emptyCounters(), successful_retries: 5, agent_successful_completion: 2 });
    expect(rates.system_recovery_rate).toBe(100);
    expect(rates.tool_call_success_rate).toBe(0);
    expect(rates.fuzzing_success_rate).toBe(0);
    expect(rates.retry_success_rate).toBe(0);
  });

  it('lets recovery exceed 100 while the score caps it', () => {
    const rates = deriveRates({
      ...emptyCounters(),
      total_tool_calls: 1,
      successful_tool_calls: 1,
      failed_tool_calls: 1,
      successful_retries: 2,
      agent_successful_completion: 1,
    });
    expect(rates.system_recovery_rate).toBe(300);
    expect(rates.resilience_score).toBe(100);
  });
});
