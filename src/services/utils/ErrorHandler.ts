/**
 * Error handling and retry logic utilities
 */

import { logger } from './Logger';

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  backoffMultiplier?: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Execute function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
  context: string = 'operation'
): Promise<T> {
  const {
    maxAttempts,
    delayMs,
    backoffMultiplier = 2,
    retryIf,
    onRetry,
  } = config;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toError(error);

      if (attempt >= maxAttempts || (retryIf && !retryIf(error))) {
        logger.error(`${context} failed after ${attempt} attempt(s)`, {
          error: lastError.message,
          stack: lastError.stack,
        });
        throw error;
      }

      const delay = delayMs * Math.pow(backoffMultiplier, attempt - 1);

      logger.warn(`${context} failed (attempt ${attempt}/${maxAttempts}), retrying in ${delay}ms`, {
        error: lastError.message,
      });

      if (onRetry) {
        onRetry(attempt, lastError);
      }

      await sleep(delay);
    }
  }
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(parseErrorMessage(error));
}

function errorField(error: unknown, field: string): unknown {
  if (typeof error === 'object' && error !== null && field in error) {
    return Reflect.get(error, field);
  }
  return undefined;
}

function lowerMessage(error: unknown): string {
  return parseErrorMessage(error).toLowerCase();
}

/**
 * Check if error is a network error
 */
export function isNetworkError(error: unknown): boolean {
  const networkErrorCodes = [
    'ECONNREFUSED',
    'ENOTFOUND',
    'ETIMEDOUT',
    'ECONNRESET',
    'NETWORK_ERROR',
    'SERVER_ERROR',
    'TIMEOUT',
  ];

  const code = errorField(error, 'code');
  return (
    (typeof code === 'string' && networkErrorCodes.includes(code)) ||
    lowerMessage(error).includes('network') ||
    lowerMessage(error).includes('timeout')
  );
}

/**
 * Check if error is a rate limit error
 */
export function isRateLimitError(error: unknown): boolean {
  return (
    errorField(error, 'status') === 429 ||
    lowerMessage(error).includes('rate limit') ||
    lowerMessage(error).includes('too many requests')
  );
}

/**
 * Check if error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  return isNetworkError(error) || isRateLimitError(error);
}

/**
 * Parse error message from various error types
 */
export function parseErrorMessage(error: unknown): string {
  if (typeof error === 'string') return error;
  const message = errorField(error, 'message');
  if (typeof message === 'string') return message;
  const reason = errorField(error, 'reason');
  if (typeof reason === 'string') return reason;
  const nested = errorField(errorField(error, 'error'), 'message');
  if (typeof nested === 'string') return nested;
  return 'Unknown error';
}
