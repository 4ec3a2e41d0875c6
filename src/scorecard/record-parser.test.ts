import { describe, expect, it } from 'vitest';

import { classifyStatusCode, decodeLogRecord, parseLogRecord, resolveToolName } from './record-parser.js';
import type { LogRecord } from './types.js';

function record(fields: Partial<LogRecord>): LogRecord {
  return {
    timestamp: '2024-05-01T10:00:00Z',
    method: 'POST',
    url: '',
    chaos_applied: [],
    fuzzed: false,
    traffic_type: 'UNKNOWN',
    ...fields,
  };
}

describe('decodeLogRecord', () => {
  it('decodes objects with a timestamp and applies defaults', () => {
    expect(
      decodeLogRecord('{"timestamp":"2024-05-01T10:00:00Z","method":"POST","url":"http://h/search_flights"}')
    ).toEqual({
      timestamp: '2024-05-01T10:00:00Z',
      method: 'POST',
      url: 'http://h/search_flights',
      chaos_applied: [],
      fuzzed: false,
      traffic_type: 'UNKNOWN',
    });
  });

  it('rejects lines that are not timestamped objects', () => {
    expect(decodeLogRecord('{"method":"POST"}')).toBeUndefined();
    expect(decodeLogRecord('[1, 2]')).toBeUndefined();
    expect(decodeLogRecord('{not json')).toBeUndefined();
    expect(decodeLogRecord('Response: 200')).toBeUndefined();
  });

  it('treats a non-string timestamp as present but unusable', () => {
    const decoded = decodeLogRecord('{"timestamp":12345,"method":"GET"}');
    expect(decoded).toBeDefined();
    expect(decoded?.timestamp).toBeUndefined();
  });

  it('drops fields with the wrong type', () => {
    const decoded = decodeLogRecord('{"timestamp":"t","status_code":"404","fuzzed":"yes","url":7}');
    expect(decoded?.status_code).toBeUndefined();
    expect(decoded?.fuzzed).toBe(false);
    expect(decoded?.url).toBe('');
  });

  it('normalizes chaos_applied to a list of strings', () => {
    expect(decodeLogRecord('{"timestamp":"t","chaos_applied":"MCP_Fuzzing"}')?.chaos_applied).toEqual([
      'MCP_Fuzzing',
    ]);
    expect(decodeLogRecord('{"timestamp":"t","chaos_applied":["a",1,"b"]}')?.chaos_applied).toEqual(['a', 'b']);
    expect(decodeLogRecord('{"timestamp":"t","chaos_applied":""}')?.chaos_applied).toEqual([]);
  });
});

describe('resolveToolName', () => {
  it('prefers the explicit tool name', () => {
    expect(resolveToolName(record({ tool_name: 'lookup', url: 'http://h/search_flights' }))).toBe('lookup');
  });

  it('infers from the URL', () => {
    expect(resolveToolName(record({ url: 'http://h/Search_Flights?from=OSL' }))).toBe('search_flights');
    expect(resolveToolName(record({ url: 'http://h/book' }))).toBe('book_ticket');
    expect(resolveToolName(record({ url: 'http://h/v1/chat/completions' }))).toBe('llm_request');
    expect(resolveToolName(record({ url: 'http://h/health' }))).toBeUndefined();
  });
});

describe('classifyStatusCode', () => {
  it('maps codes to error kinds', () => {
    expect(classifyStatusCode(400)).toBe('validation_error');
    expect(classifyStatusCode(404)).toBe('not_found');
    expect(classifyStatusCode(503)).toBe('server_error');
    expect(classifyStatusCode(401)).toBe('unknown');
  });
});

describe('parseLogRecord', () => {
  it('emits a tool call and a response for a POST with a status', () => {
    const result = parseLogRecord(record({ url: 'http://h/search_flights', status_code: 200 }), 1);
    expect(result.events).toEqual([
      { type: 'tool_call', line: 1, timestamp: '2024-05-01T10:00:00Z', url: 'http://h/search_flights', tool_name: 'search_flights' },
      { type: 'response', line: 1, timestamp: '2024-05-01T10:00:00Z', status_code: 200 },
    ]);
    expect(result.swarm).toBeUndefined();
  });

  it('classifies failing responses from the status code', () => {
    const { events } = parseLogRecord(record({ url: 'http://h/book_ticket', status_code: 404 }), 2);
    expect(events[1]).toEqual({
      type: 'response',
      line: 2,
      timestamp: '2024-05-01T10:00:00Z',
      status_code: 404,
      error_type: 'not_found',
    });
  });

  it('does not count non-POST requests as tool calls', () => {
    const { events } = parseLogRecord(record({ method: 'GET', url: 'http://h/search_flights' }), 3);
    expect(events).toEqual([]);
  });

  it('recognizes fuzzing from the flag or the chaos list', () => {
    const flagged = parseLogRecord(record({ fuzzed: true, chaos_applied: ['MCP_Fuzzing', 'type_mismatch'] }), 4);
    expect(flagged.events).toContainEqual({
      type: 'fuzzing',
      line: 4,
      timestamp: '2024-05-01T10:00:00Z',
      fuzz_type: 'type_mismatch',
      fields_fuzzed: 1,
    });

    const declared = parseLogRecord(record({ chaos_applied: ['mcp_null'] }), 5);
    expect(declared.events).toContainEqual({
      type: 'fuzzing',
      line: 5,
      timestamp: '2024-05-01T10:00:00Z',
      fuzz_type: 'null_injection',
      fields_fuzzed: 0,
    });

    expect(parseLogRecord(record({ chaos_applied: ['null_injection'] }), 6).events).toEqual([]);
  });

  it('observes agent-to-agent traffic', () => {
    const result = parseLogRecord(
      record({
        url: 'http://h/agent/message',
        status_code: 503,
        traffic_type: 'AGENT_TO_AGENT',
        traffic_subtype: 'consensus',
        chaos_applied: ['Consensus_Delay'],
      }),
      7
    );
    expect(result.swarm).toEqual({ traffic_subtype: 'consensus', chaos: 'consensus_delay', status_code: 503 });
  });
});
