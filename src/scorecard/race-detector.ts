import { logger } from '../utils/logger.js';
import { resolveToolName } from './record-parser.js';
import { parseIsoTimestamp } from './timestamp.js';
import type { DependencyPair, LogicError, LogRecord } from './types.js';

export const DEFAULT_DEPENDENCY_PAIRS: readonly DependencyPair[] = [
  { producer: 'search_flights', consumer: 'book_ticket' },
];

export const SIMULTANEOUS_WINDOW_MS = 2000;

// Failures that suggest the consumer ran without a usable producer result
const DEPENDENT_FAILURE_CODES: ReadonlySet<number> = new Set([400, 404]);

export interface LocatedRecord {
  line: number;
  record: LogRecord;
}

interface TimedCall {
  line: number;
  epochMs: number;
  statusCode?: number;
}

/**
 * Flag dependent tool calls that failed while no successful producer call
 * preceded them, or while a producer call ran within the simultaneity window.
 *
 * This is an ordering heuristic. A consumer call whose input was always
 * invalid is flagged the same way as one that ran too early; the two cannot
 * be told apart from the log.
 */
export function detectRaceConditions(
  records: readonly LocatedRecord[],
  pairs: readonly DependencyPair[] = DEFAULT_DEPENDENCY_PAIRS
): LogicError[] {
  const callsByTool = groupTimedCalls(records);
  const errors: LogicError[] = [];

  for (const { producer, consumer } of pairs) {
    const producerCalls = callsByTool.get(producer) ?? [];

    for (const call of callsByTool.get(consumer) ?? []) {
      if (call.statusCode === undefined || !DEPENDENT_FAILURE_CODES.has(call.statusCode)) {
        continue;
      }

      const completedBefore = producerCalls.filter((p) => p.epochMs < call.epochMs && p.statusCode === 200);
      const simultaneous = producerCalls.filter(
        (p) => Math.abs(p.epochMs - call.epochMs) < SIMULTANEOUS_WINDOW_MS
      );

      if (completedBefore.length > 0 && simultaneous.length === 0) {
        continue;
      }

      const error: LogicError = {
        type: 'race_condition',
        description: `${consumer} called before ${producer} completed or with invalid input`,
        dependency_tool: producer,
        dependent_tool: consumer,
        dependent_call_line: call.line,
        dependent_call_time: new Date(call.epochMs).toISOString(),
        dependent_call_status: call.statusCode,
        dependency_available: completedBefore.length > 0,
        simultaneous_calls: simultaneous.length > 0,
      };
      logger.debug('Race condition detected', {
        description: error.description,
        line: call.line,
        time: error.dependent_call_time,
        status: call.statusCode,
      });
      errors.push(error);
    }
  }

  return errors;
}

function groupTimedCalls(records: readonly LocatedRecord[]): Map<string, TimedCall[]> {
  const map = new Map<string, TimedCall[]>();

  for (const { line, record } of records) {
    const toolName = resolveToolName(record);
    if (!toolName || !record.timestamp) continue;

    const epochMs = parseIsoTimestamp(record.timestamp);
    if (epochMs === undefined) {
      logger.debug('Skipping record with unparseable timestamp', { line, timestamp: record.timestamp });
      continue;
    }

    const existing = map.get(toolName) ?? [];
    existing.push({ line, epochMs, statusCode: record.status_code });
    map.set(toolName, existing);
  }

  return map;
}
