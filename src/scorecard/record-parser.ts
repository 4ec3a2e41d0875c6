import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { ErrorType, Event, FuzzType, LogRecord, SwarmObservation } from './types.js';

export const AGENT_TO_AGENT = 'AGENT_TO_AGENT';

const optionalString = z.string().optional().catch(undefined);

// Fields with the wrong type are treated as absent rather than rejecting the record
const logRecordSchema = z.object({
  timestamp: optionalString,
  method: z.string().catch(''),
  url: z.string().catch(''),
  status_code: z.number().int().optional().catch(undefined),
  tool_name: optionalString,
  chaos_applied: z.union([z.string(), z.array(z.unknown())]).optional().catch(undefined),
  fuzzed: z.boolean().catch(false),
  agent_role: optionalString,
  traffic_type: z.string().catch('UNKNOWN'),
  traffic_subtype: optionalString,
});

type RawLogRecord = z.infer<typeof logRecordSchema>;

export function normalizeChaosApplied(value: RawLogRecord['chaos_applied']): string[] {
  if (value === undefined) return [];
  if (typeof value === 'string') return value ? [value] : [];
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Lowercase comma-joined form used for substring classification.
 */
export function chaosSearchText(record: LogRecord): string {
  return record.chaos_applied.join(',').toLowerCase();
}

/**
 * Decode a trimmed line as a structured record.
 *
 * A line is structured only when it decodes to a JSON object that has a
 * `timestamp` key; everything else is left to the free-text rules.
 */
export function decodeLogRecord(line: string): LogRecord | undefined {
  if (!line.startsWith('{')) {
    return undefined;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch (err) {
    logger.debug('Could not parse log line as JSON', { line: line.slice(0, 50), error: String(err) });
    return undefined;
  }

  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded) || !('timestamp' in decoded)) {
    return undefined;
  }

  const raw = logRecordSchema.parse(decoded);
  return { ...raw, chaos_applied: normalizeChaosApplied(raw.chaos_applied) };
}

/**
 * Tool name from the record, or inferred from its URL.
 */
export function resolveToolName(record: LogRecord): string | undefined {
  if (record.tool_name) {
    return record.tool_name;
  }
  const url = record.url.toLowerCase();
  if (url.includes('/search_flights')) return 'search_flights';
  if (url.includes('/book_ticket') || url.includes('/book')) return 'book_ticket';
  if (url.includes('/api/') || url.includes('/v1/chat')) return 'llm_request';
  return undefined;
}

export function classifyStatusCode(statusCode: number): ErrorType {
  if (statusCode === 400) return 'validation_error';
  if (statusCode === 404) return 'not_found';
  if (statusCode >= 500) return 'server_error';
  return 'unknown';
}

function classifyFuzzChaos(chaos: string): FuzzType {
  if (chaos.includes('schema_violation')) return 'schema_violation';
  if (chaos.includes('type_mismatch')) return 'type_mismatch';
  if (chaos.includes('null')) return 'null_injection';
  if (chaos.includes('garbage')) return 'garbage_value';
  return 'unknown';
}

export interface RecordParseResult {
  events: Event[];
  swarm?: SwarmObservation;
}

export function parseLogRecord(record: LogRecord, lineNumber: number): RecordParseResult {
  const events: Event[] = [];
  const timestamp = record.timestamp ?? null;
  const toolName = resolveToolName(record);
  const chaos = chaosSearchText(record);

  if (toolName && record.method === 'POST') {
    events.push({ type: 'tool_call', line: lineNumber, timestamp, url: record.url, tool_name: toolName });
  }

  if (record.status_code !== undefined) {
    const statusCode = record.status_code;
    events.push({
      type: 'response',
      line: lineNumber,
      timestamp,
      status_code: statusCode,
      ...(statusCode >= 400 ? { error_type: classifyStatusCode(statusCode) } : {}),
    });
  }

  if (record.fuzzed || chaos.includes('fuzzing') || chaos.includes('mcp')) {
    events.push({
      type: 'fuzzing',
      line: lineNumber,
      timestamp,
      fuzz_type: classifyFuzzChaos(chaos),
      // the proxy does not report a field count, only whether fuzzing happened
      fields_fuzzed: record.fuzzed ? 1 : 0,
    });
  }

  if (record.traffic_type !== AGENT_TO_AGENT) {
    return { events };
  }

  return {
    events,
    swarm: {
      traffic_subtype: record.traffic_subtype || undefined,
      chaos,
      status_code: record.status_code,
    },
  };
}
