import { decodeLogRecord, parseLogRecord } from './record-parser.js';
import { parseTextLine } from './text-parser.js';
import type { Event, LogRecord, SwarmObservation } from './types.js';

export type ParsedLine =
  | { kind: 'empty' }
  | { kind: 'record'; record: LogRecord; events: Event[]; swarm?: SwarmObservation }
  | { kind: 'text'; events: Event[] };

/**
 * Split file content into lines the way a line-oriented reader sees them:
 * any newline convention, and no phantom empty line after a trailing newline.
 */
export function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Structured decoding wins; free-text rules only see lines that are not
 * structured records.
 */
export function parseLine(rawLine: string, lineNumber: number): ParsedLine {
  const line = rawLine.trim();
  if (!line) {
    return { kind: 'empty' };
  }

  const record = decodeLogRecord(line);
  if (record) {
    const { events, swarm } = parseLogRecord(record, lineNumber);
    return { kind: 'record', record, events, swarm };
  }

  return { kind: 'text', events: parseTextLine(line, lineNumber) };
}
