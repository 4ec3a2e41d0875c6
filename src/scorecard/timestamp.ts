const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Parse an ISO-8601 timestamp to epoch milliseconds.
 *
 * Timestamps without an offset are read as UTC so results do not depend on
 * the host timezone. Returns undefined for anything unparseable.
 */
export function parseIsoTimestamp(value: string): number | undefined {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [, date, hoursMinutes = '00:00', seconds = '00', fraction = '', offset] = match;
  const millis = fraction.padEnd(3, '0').slice(0, 3);
  const canonical = `${date}T${hoursMinutes}:${seconds}.${millis}${normalizeOffset(offset)}`;

  const epoch = Date.parse(canonical);
  return Number.isNaN(epoch) ? undefined : epoch;
}

function normalizeOffset(offset: string | undefined): string {
  if (!offset || offset.toUpperCase() === 'Z') {
    return 'Z';
  }
  const digits = offset.slice(1).replace(':', '');
  const hours = digits.slice(0, 2);
  const minutes = digits.slice(2, 4) || '00';
  return `${offset[0]}${hours}:${minutes}`;
}
