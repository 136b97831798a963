/**
 * Async Utilities (Consolidated)
 * Sleep, cancellation-aware waits and retry logic.
 */

import { ErrorCode, ScraperError } from '../core/errors';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('Async');

// ==========================================
// Part 1: Sleep & Cancellation
// ==========================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleeps for `ms`, rejecting early with CANCELLED once the signal aborts.
 */
export function sleepOrCancel(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  if (signal?.aborted) {
    return Promise.reject(new ScraperError(ErrorCode.CANCELLED, 'Run aborted'));
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScraperError(ErrorCode.CANCELLED, 'Run aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ==========================================
// Part 2: Retry Logic
// ==========================================

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  onRetry?: (error: unknown, attempt: number) => void;
  shouldRetry?: (error: unknown) => boolean;
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    onRetry,
    shouldRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;
      if (shouldRetry && !shouldRetry(error)) throw error;
      if (attempt === maxRetries) throw error;

      const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);
      if (onRetry) onRetry(error, attempt + 1);

      logger.debug(`Retrying ${attempt + 1}/${maxRetries} after ${delay}ms`);
      await sleep(delay);
    }
  }
  throw lastError;
}
