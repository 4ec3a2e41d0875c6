import { truncate } from '../utils/format.js';
import type { ErrorType, Event, FuzzType, ToolName } from './types.js';

export const MESSAGE_MAX_LENGTH = 200;

const FUZZ_TYPES: readonly FuzzType[] = ['schema_violation', 'type_mismatch', 'null_injection', 'garbage_value'];

const TIMESTAMP_PATTERNS = [
  /(\d{4}-\d{2}-\d{2}[\sT]\d{2}:\d{2}:\d{2})/,
  /(\d{2}\/\d{2}\/\d{4}\s\d{2}:\d{2}:\d{2})/,
  /\[(\d{2}:\d{2}:\d{2})\]/,
];

/**
 * First timestamp found in a free-text line, or null.
 */
export function extractTimestamp(line: string): string | null {
  for (const pattern of TIMESTAMP_PATTERNS) {
    const match = pattern.exec(line);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Classify a tool call by URL. Priority matters: `book` alone is enough for
 * book_ticket, and anything else mentioning a flight is flight_related.
 */
export function classifyToolUrl(url: string): ToolName {
  const lower = url.toLowerCase();
  if (lower.includes('search_flights')) return 'search_flights';
  if (lower.includes('book_ticket') || lower.includes('book')) return 'book_ticket';
  if (lower.includes('flight')) return 'flight_related';
  return 'unknown';
}

export function classifyErrorText(line: string): ErrorType {
  const lower = line.toLowerCase();
  if (line.includes('400') || line.includes('Bad Request')) return 'validation_error';
  if (line.includes('404') || line.includes('Not Found')) return 'not_found';
  if (line.includes('500') || line.includes('Internal Server Error')) return 'server_error';
  if (lower.includes('timeout')) return 'timeout';
  if (lower.includes('network')) return 'network_error';
  return 'unknown';
}

function classifyFuzzText(line: string): FuzzType {
  return FUZZ_TYPES.find((fuzzType) => line.includes(fuzzType)) ?? 'unknown';
}

/**
 * Extract events from a free-text log line.
 *
 * Each rule is checked independently, so one line can yield several events
 * (an error line that also mentions a retry produces both).
 */
export function parseTextLine(line: string, lineNumber: number): Event[] {
  const events: Event[] = [];
  const timestamp = extractTimestamp(line);
  const lower = line.toLowerCase();

  if (line.includes('HTTP Tool') && line.includes('POST')) {
    const match = /POST\s+(\S+)/.exec(line);
    if (match) {
      const url = match[1];
      events.push({ type: 'tool_call', line: lineNumber, timestamp, url, tool_name: classifyToolUrl(url) });
    }
  }

  if (line.includes('Schema-aware fuzzing') || line.includes('MCP protocol fuzzing')) {
    const match = /(\d+)\s+fields?\s+fuzzed/.exec(line);
    events.push({
      type: 'fuzzing',
      line: lineNumber,
      timestamp,
      fuzz_type: classifyFuzzText(line),
      fields_fuzzed: match ? parseInt(match[1], 10) : 0,
    });
  }

  if (lower.includes('error')) {
    events.push({
      type: 'error',
      line: lineNumber,
      timestamp,
      error_type: classifyErrorText(line),
      message: truncate(line, MESSAGE_MAX_LENGTH),
    });
  }

  if (lower.includes('retry')) {
    events.push({ type: 'retry', line: lineNumber, timestamp });
  }

  if (line.includes('Agent processing complete') || line.includes('Workflow Complete')) {
    events.push({ type: 'completion', line: lineNumber, timestamp });
  }

  if (line.includes('Exception') || line.includes('Traceback') || lower.includes('crash')) {
    events.push({ type: 'crash', line: lineNumber, timestamp, message: truncate(line, MESSAGE_MAX_LENGTH) });
  }

  if (line.includes('Response:') && (line.includes('200') || line.includes('400') || line.includes('500'))) {
    const match = /Response:\s*(\d+)/.exec(line);
    if (match) {
      events.push({ type: 'response', line: lineNumber, timestamp, status_code: parseInt(match[1], 10) });
    }
  }

  return events;
}
