import { calculateResilienceScore } from './score.js';
import type { DerivedRates, Event, LogicError, MetricCounters, Metrics, SwarmObservation } from './types.js';

/**
 * Counts keyed by an open set of names. Unseen keys read as zero; insertion
 * order is kept for reports.
 */
export class Tally {
  private counts = new Map<string, number>();

  increment(key: string, by = 1): void {
    this.counts.set(key, this.get(key) + by);
  }

  get(key: string): number {
    return this.counts.get(key) ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}

export function emptyCounters(): MetricCounters {
  return {
    total_tool_calls: 0,
    successful_tool_calls: 0,
    failed_tool_calls: 0,
    fuzzing_attempts: 0,
    fuzzing_successful: 0,
    retry_attempts: 0,
    successful_retries: 0,
    agent_crashes: 0,
    agent_successful_completion: 0,
    race_conditions_detected: 0,
    agent_to_agent_disruptions: 0,
    message_mutations: 0,
    consensus_delays: 0,
    agent_isolations: 0,
  };
}

/**
 * Collects counters from extracted events. One instance per analysis run.
 */
export class MetricsAccumulator {
  readonly counters: MetricCounters = emptyCounters();
  readonly toolCallErrors = new Tally();
  readonly fuzzingTypes = new Tally();
  readonly swarmErrors = new Tally();
  private logicErrors: LogicError[] = [];

  recordEvent(event: Event): void {
    const c = this.counters;
    switch (event.type) {
      case 'tool_call':
        c.total_tool_calls++;
        break;
      case 'fuzzing':
        c.fuzzing_attempts++;
        if (event.fields_fuzzed > 0) c.fuzzing_successful++;
        this.fuzzingTypes.increment(event.fuzz_type);
        break;
      case 'error':
        c.failed_tool_calls++;
        this.toolCallErrors.increment(event.error_type);
        break;
      case 'retry':
        c.retry_attempts++;
        break;
      case 'completion':
        c.agent_successful_completion++;
        break;
      case 'crash':
        c.agent_crashes++;
        break;
      case 'response':
        if (event.status_code === 200) {
          c.successful_tool_calls++;
        } else if (event.status_code >= 400) {
          c.failed_tool_calls++;
          if (event.error_type) this.toolCallErrors.increment(event.error_type);
        }
        break;
    }
  }

  recordSwarm(observation: SwarmObservation): void {
    const c = this.counters;
    c.agent_to_agent_disruptions++;

    if (observation.traffic_subtype) {
      this.swarmErrors.increment(`swarm_${observation.traffic_subtype}`);
    }

    const chaos = observation.chaos;
    if (chaos.includes('swarm_disruption') || chaos.includes('message_mutation')) c.message_mutations++;
    if (chaos.includes('consensus_delay')) c.consensus_delays++;
    if (chaos.includes('agent_isolation')) c.agent_isolations++;

    if (observation.status_code !== undefined && observation.status_code >= 400) {
      this.swarmErrors.increment(`swarm_error_${observation.status_code}`);
    }
  }

  recordSuccessfulRetries(count: number): void {
    this.counters.successful_retries += count;
  }

  recordLogicErrors(errors: LogicError[]): void {
    this.counters.race_conditions_detected += errors.length;
    this.logicErrors.push(...errors);
  }

  toMetrics(): Metrics {
    const counters = { ...this.counters };
    return {
      ...counters,
      tool_call_errors: this.toolCallErrors.toRecord(),
      fuzzing_types: this.fuzzingTypes.toRecord(),
      swarm_communication_errors: this.swarmErrors.toRecord(),
      logic_errors: [...this.logicErrors],
      ...deriveRates(counters),
    };
  }
}

function ratio(numerator: number, denominator: number, whenEmpty: number): number {
  return denominator > 0 ? (numerator / denominator) * 100 : whenEmpty;
}

/**
 * Percentages derived from the counters. Recovery with nothing failed is
 * full recovery; the other rates are zero without a denominator.
 */
export function deriveRates(c: MetricCounters): DerivedRates {
  const rates = {
    tool_call_success_rate: ratio(c.successful_tool_calls, c.total_tool_calls, 0),
    fuzzing_success_rate: ratio(c.fuzzing_successful, c.fuzzing_attempts, 0),
    system_recovery_rate: ratio(c.successful_retries + c.agent_successful_completion, c.failed_tool_calls, 100),
    retry_success_rate: ratio(c.successful_retries, c.retry_attempts, 0),
  };
  return { ...rates, resilience_score: calculateResilienceScore(c, rates) };
}
