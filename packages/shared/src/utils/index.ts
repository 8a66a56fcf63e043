/**
 * @fileoverview Common utilities for mcpfleet
 */

import { v4 as uuidv4 } from 'uuid';
import { OperationCancelledError } from '@mcpfleet/core';

/**
 * Generate a unique ID
 */
export function generateId(prefix = ''): string {
  const uuid = uuidv4();
  return prefix ? `${prefix}-${uuid}` : uuid;
}

/**
 * Sleep for a specified number of milliseconds, rejecting early if `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError('sleep'));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError('sleep'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface BackoffOptions {
  readonly baseDelay: number;
  readonly maxDelay: number;
  readonly backoff?: 'exponential' | 'linear' | 'fixed';
  readonly jitter?: boolean;
}

/**
 * Delay before the given (1-based) attempt
 */
export function computeBackoff(attempt: number, options: BackoffOptions, random: () => number = Math.random): number {
  const { baseDelay, maxDelay, backoff = 'exponential', jitter = true } = options;

  let delay: number;
  switch (backoff) {
    case 'exponential':
      delay = Math.min(baseDelay * Math.pow(2, Math.max(0, attempt - 1)), maxDelay);
      break;
    case 'linear':
      delay = Math.min(baseDelay * attempt, maxDelay);
      break;
    case 'fixed':
    default:
      delay = baseDelay;
      break;
  }

  // Add jitter
  if (jitter) {
    delay = delay * (0.5 + random() * 0.5);
  }

  return Math.round(delay);
}

export interface RetryOptions {
  readonly attempts: number;
  readonly delay: number;
  readonly backoff?: 'exponential' | 'linear' | 'fixed';
  readonly maxDelay?: number;
  readonly jitter?: boolean;
  /** Errors for which this returns false are rethrown immediately */
  readonly shouldRetry?: (error: Error) => boolean;
  readonly signal?: AbortSignal;
  readonly onRetry?: (error: Error, attempt: number, delay: number) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, delay, backoff = 'exponential', maxDelay = 30000, jitter = true, shouldRetry, signal, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new OperationCancelledError('retry');
    }
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= attempts || (shouldRetry && !shouldRetry(lastError))) {
        throw lastError;
      }

      const wait = computeBackoff(attempt, { baseDelay: delay, maxDelay, backoff, jitter });
      onRetry?.(lastError, attempt, wait);
      await sleep(wait, signal);
    }
  }
}

/**
 * `READY_POLL_MS` -> `readyPollMs`; already camelCased keys pass through
 */
export function toCamelCase(key: string): string {
  if (!key.includes('_') && key !== key.toUpperCase()) {
    return key;
  }
  return key
    .toLowerCase()
    .split('_')
    .filter(part => part.length > 0)
    .map((part, index) => (index === 0 ? part : part.charAt(0).toUpperCase() + part.slice(1)))
    .join('');
}
