/**
 * Price and amount formatting utilities
 */

/**
 * Format a decimal token amount
 */
export function formatTokenAmount(amount: number, maxDecimals: number = 6): string {
  if (amount === 0) return '0';

  // For small numbers, show more decimals
  if (Math.abs(amount) < 0.01) {
    return amount.toFixed(Math.max(maxDecimals, 8));
  }

  return amount.toFixed(maxDecimals);
}

/**
 * Format USD amount
 */
export function formatUSD(amount: number, decimals: number = 2): string {
  const sign = amount < 0 ? '-' : '';
  return `${sign}$${Math.abs(amount).toFixed(decimals)}`;
}

/**
 * Format percentage
 */
export function formatPercentage(value: number, decimals: number = 2): string {
  return `${value.toFixed(decimals)}%`;
}

/**
 * Format duration in milliseconds to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(2)}m`;
}
