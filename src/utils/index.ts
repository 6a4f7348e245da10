/**
 * Utility functions for the Whale Watcher
 */

export { createLogger, formatLine, isLogLevel, logger, setLogLevel, type LogLevel, type Logger } from './logger.js';
export { withTimeout, sleep } from './timeout.js';

/**
 * Format number as currency
 */
export function formatCurrency(amount: number): string {
  if (amount >= 1_000_000) {
    return `$${(amount / 1_000_000).toFixed(1)}M`;
  } else if (amount >= 1_000) {
    return `$${(amount / 1_000).toFixed(1)}K`;
  }
  return `$${amount.toFixed(0)}`;
}

/**
 * Truncate text with ellipsis
 */
export function truncateText(text: string, maxLength: number = 100): string {
  if (!text) return '';
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Split a comma-separated setting into trimmed, non-empty entries
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}
