// Structured proxy log record (one JSON object per line)
export interface LogRecord {
  timestamp?: string;
  method: string;
  url: string;
  status_code?: number;
  tool_name?: string;
  // Normalized: a single string becomes a one-element list
  chaos_applied: string[];
  fuzzed: boolean;
  agent_role?: string;
  traffic_type: string;
  traffic_subtype?: string;
}

export type ToolName = 'search_flights' | 'book_ticket' | 'flight_related' | 'llm_request' | 'unknown';

export type FuzzType = 'schema_violation' | 'type_mismatch' | 'null_injection' | 'garbage_value' | 'unknown';

export type ErrorType =
  | 'validation_error'
  | 'not_found'
  | 'server_error'
  | 'timeout'
  | 'network_error'
  | 'unknown';

// Event types extracted from log lines
export type Event =
  | ToolCallEvent
  | FuzzingEvent
  | ErrorEvent
  | RetryEvent
  | CompletionEvent
  | CrashEvent
  | ResponseEvent;

export type EventType = Event['type'];

interface EventBase {
  line: number;
  timestamp: string | null;
}

export interface ToolCallEvent extends EventBase {
  type: 'tool_call';
  url: string;
  tool_name: string;
}

export interface FuzzingEvent extends EventBase {
  type: 'fuzzing';
  fuzz_type: FuzzType;
  fields_fuzzed: number;
}

export interface ErrorEvent extends EventBase {
  type: 'error';
  error_type: ErrorType;
  message: string;
}

export interface RetryEvent extends EventBase {
  type: 'retry';
}

export interface CompletionEvent extends EventBase {
  type: 'completion';
}

export interface CrashEvent extends EventBase {
  type: 'crash';
  message: string;
}

export interface ResponseEvent extends EventBase {
  type: 'response';
  status_code: number;
  // Set for failing structured responses, classified from the status code alone
  error_type?: ErrorType;
}

// Agent-to-agent traffic seen on a structured record
export interface SwarmObservation {
  traffic_subtype?: string;
  chaos: string;
  status_code?: number;
}

export interface ToolCall {
  line: number;
  url: string;
  timestamp: string | null;
  tool_name: string;
}

export interface LogicError {
  type: 'race_condition';
  description: string;
  dependency_tool: string;
  dependent_tool: string;
  dependent_call_line: number;
  dependent_call_time: string;
  dependent_call_status: number;
  dependency_available: boolean;
  simultaneous_calls: boolean;
}

export interface MetricCounters {
  total_tool_calls: number;
  successful_tool_calls: number;
  failed_tool_calls: number;
  fuzzing_attempts: number;
  fuzzing_successful: number;
  retry_attempts: number;
  successful_retries: number;
  agent_crashes: number;
  agent_successful_completion: number;
  race_conditions_detected: number;
  agent_to_agent_disruptions: number;
  message_mutations: number;
  consensus_delays: number;
  agent_isolations: number;
}

export interface DerivedRates {
  tool_call_success_rate: number;
  fuzzing_success_rate: number;
  system_recovery_rate: number;
  retry_success_rate: number;
  resilience_score: number;
}

export interface Metrics extends MetricCounters, DerivedRates {
  tool_call_errors: Record<string, number>;
  fuzzing_types: Record<string, number>;
  swarm_communication_errors: Record<string, number>;
  logic_errors: LogicError[];
}

export type Grade = 'A' | 'B' | 'C' | 'D' | 'F' | 'N/A';

export interface ScorecardMetadata {
  generated_at: string;
  analyzer_version: string;
  analysis_id: string;
  log_file?: string;
  warning?: string;
}

export interface Scorecard {
  readonly metadata: Readonly<ScorecardMetadata>;
  readonly metrics: Readonly<Metrics>;
  readonly grade: Grade;
  readonly summary: Readonly<Record<string, string>>;
  readonly tool_calls: readonly ToolCall[];
  readonly events: readonly Event[];
}

export interface DependencyPair {
  producer: string;
  consumer: string;
}
