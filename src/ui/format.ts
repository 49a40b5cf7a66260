/**
 * Formatting utilities for CLI output
 * Handles probabilities, bars, truncation and number formatting
 */

/**
 * Format a probability (0-1) as a percentage string
 */
export function formatPercent(probability: number, decimals: number = 1): string {
  return `${(probability * 100).toFixed(decimals)}%`;
}

/**
 * Horizontal bar for a probability, `width` cells wide
 */
export function formatBar(probability: number, width: number = 20): string {
  const clamped = Math.min(1, Math.max(0, probability));
  const filled = Math.round(clamped * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/**
 * Format a feature value; integers stay integers
 */
export function formatValue(value: number): string {
  return Number.isInteger(value) ? value.toString() : value.toFixed(2);
}

/**
 * Format number with thousands separator
 */
export function formatNumber(num: number): string {
  return num.toLocaleString();
}

/**
 * Truncate string with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 1) + '…';
}
