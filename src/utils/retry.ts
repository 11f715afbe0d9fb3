/**
 * Exponential backoff for rate-limited Graph calls
 * Only RateLimitError is retried; every other failure propagates on the first attempt
 */

import type { RetryConfig } from '../config/app';
import { RateLimitError, TransientError } from './error';
import { logger, type TracedLogger } from './logger';

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions extends RetryConfig {
  sleep?: Sleep;
}

export interface RetryContext {
  operation: string;
  log?: TracedLogger;
  memberId?: string;
}

export interface RetryOutcome<T> {
  value: T;
  retries: number;
}

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before the given retry (1-based), capped at maxDelayMs
 */
export const computeBackoffDelay = (retry: number, config: RetryConfig, retryAfterMs?: number): number => {
  const delay =
    retryAfterMs !== undefined
      ? retryAfterMs
      : config.baseDelayMs * Math.pow(config.backoffFactor, retry - 1);
  return Math.min(delay, config.maxDelayMs);
};

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  context: RetryContext
): Promise<RetryOutcome<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const log: TracedLogger = context.log ?? logger;
  let retries = 0;

  for (;;) {
    try {
      const value = await operation();
      return { value, retries };
    } catch (error) {
      if (!(error instanceof RateLimitError)) {
        throw error;
      }

      if (retries >= options.maxRetries) {
        throw new TransientError(
          `${context.operation}: retry budget exhausted after ${retries + 1} attempts (${error.message})`,
          'RETRY_BUDGET_EXHAUSTED',
          error,
          retries + 1
        );
      }

      retries += 1;
      const delayMs = computeBackoffDelay(retries, options, error.retryAfterMs);

      log.warn('Rate limited, backing off before retry', {
        operation: context.operation,
        memberId: context.memberId,
        retry: retries,
        maxRetries: options.maxRetries,
        delayMs,
      });

      await sleep(delayMs);
    }
  }
}
