import msLib from 'ms';

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '100ms', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  return `${Math.round(ms / 3_600_000)}h`;
}

/**
 * Round to at most two decimals and drop trailing zeros: 85 -> "85", 85.456 -> "85.46".
 */
export function formatNumber(value: number): string {
  return String(Math.round(value * 100) / 100);
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

/**
 * Parse a numeric reading. Accepts numbers and strings holding a finite
 * decimal number; returns undefined for anything else.
 */
export function parseNumeric(value: number | string): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
