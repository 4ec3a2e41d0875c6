export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

// Counts code points so a surrogate pair is never split
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return Array.from(str).slice(0, maxLen).join('');
}

/**
 * `tool_calls` -> `Tool Calls`
 */
export function titleCase(key: string): string {
  return key
    .split('_')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

export function percent(value: number): string {
  return `${value.toFixed(1)}%`;
}
