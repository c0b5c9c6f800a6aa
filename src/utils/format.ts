/**
 * Formatting helpers for log lines and diagnostics
 */

/**
 * Format a byte count as kilobytes with one decimal, e.g. "117.2KB"
 */
export function formatKb(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)}KB`;
}

/**
 * Cut text to at most maxChars characters
 */
export function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? text.substring(0, maxChars) : text;
}

/**
 * Short single-line preview of a value for debug logs
 */
export function preview(value: unknown, maxChars = 200): string {
  if (typeof value === 'string') {
    return truncate(value, maxChars);
  }
  try {
    return truncate(JSON.stringify(value) ?? String(value), maxChars);
  } catch {
    return truncate(String(value), maxChars);
  }
}

export function countLines(text: string): number {
  if (text.length === 0) return 0;
  return text.split('\n').length;
}
