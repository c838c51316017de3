/**
 * Number and duration formatting shared by the console reporter and the
 * dashboard.
 */

/**
 * Formats a count with K/M/B suffixes.
 *
 * @example
 * formatCount(1234)      // "1.2K"
 * formatCount(42)        // "42"
 */
export function formatCount(value: number, precision = 1): string {
  if (value >= 1_000_000_000) {
    return `${(value / 1_000_000_000).toFixed(precision)}B`;
  }
  if (value >= 1_000_000) {
    return `${(value / 1_000_000).toFixed(precision)}M`;
  }
  if (value >= 1_000) {
    return `${(value / 1_000).toFixed(precision)}K`;
  }
  return String(Math.round(value));
}

/**
 * Formats a per-second rate with two decimals and thousands separators.
 *
 * @example
 * formatRate(12345.678)  // "12,345.68"
 */
export function formatRate(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

/**
 * Formats milliseconds as HH:MM:SS.
 */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return [
    String(hours).padStart(2, '0'),
    String(minutes).padStart(2, '0'),
    String(seconds).padStart(2, '0'),
  ].join(':');
}
