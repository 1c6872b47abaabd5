/**
 * Retry with exponential backoff for gh calls that fail transiently
 *
 * Defaults come from the retry config section (REPOS_RETRY_*).
 */

import { createComponentLogger } from './logger.js';
import { config } from '../config/index.js';
import { ErrorCodes, ReposError } from '../core/errors.js';

const logger = createComponentLogger('retry');

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Name used in log lines, e.g. "gh repo list" */
  operation?: string;
  retryableErrors?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

type ResolvedRetryOptions = Required<RetryOptions>;

function resolveOptions(options: RetryOptions): ResolvedRetryOptions {
  return {
    maxAttempts: config.retry.maxAttempts,
    initialDelayMs: config.retry.initialDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
    backoffMultiplier: config.retry.backoffMultiplier,
    operation: 'operation',
    retryableErrors: () => true,
    onRetry: () => {},
    ...options,
  };
}

/**
 * Delay before the attempt following `attempt` (1-based), capped at maxDelayMs
 */
export function backoffDelay(
  attempt: number,
  options: Pick<ResolvedRetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>
): number {
  const delay = options.initialDelayMs * options.backoffMultiplier ** (attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = resolveOptions(options);
  let lastError: Error = new Error(`${opts.operation} failed`);

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts || !opts.retryableErrors(lastError)) {
        throw lastError;
      }

      const delay = backoffDelay(attempt, opts);
      opts.onRetry(lastError, attempt);
      logger.warn(
        { operation: opts.operation, error: lastError.message, attempt, delayMs: delay },
        'Retrying after transient failure'
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

const TRANSIENT_MARKERS = [
  'timeout',
  'timed out',
  'econnreset',
  'econnrefused',
  'could not resolve host',
  'connection reset',
  'rate limit',
  '502',
  '503',
  '504',
];

/**
 * Heuristic for gh/git failures worth another attempt; a missing executable never is
 */
export function isRetryableNetworkError(error: Error): boolean {
  if (error instanceof ReposError && error.code === ErrorCodes.COMMAND_NOT_FOUND) {
    return false;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => message.includes(marker));
}
