import type { Event } from './types.js';

export const RETRY_LOOKAHEAD_LINES = 10;
export const RETRY_SUCCESS_MARKER = 'Response: 200';

/**
 * Count retries followed by a successful response within the lookahead
 * window. The window starts at the retry line itself and spans
 * RETRY_LOOKAHEAD_LINES raw lines, clipped at end of file. Proximity only:
 * an unrelated success nearby still counts.
 */
export function countSuccessfulRetries(events: readonly Event[], lines: readonly string[]): number {
  let successes = 0;

  for (const event of events) {
    if (event.type !== 'retry') continue;

    const start = event.line - 1;
    const end = Math.min(start + RETRY_LOOKAHEAD_LINES, lines.length);
    for (let i = start; i < end; i++) {
      if (lines[i].includes(RETRY_SUCCESS_MARKER)) {
        successes++;
        break;
      }
    }
  }

  return successes;
}
