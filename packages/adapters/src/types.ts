import type { Logger } from '@arena/shared';

/**
 * Retry behaviour for transient provider failures (rate limits, timeouts,
 * server errors). Retrying is the adapter's concern; the session never
 * retries a model call itself.
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 2 */
  maxRetries?: number;
}

/**
 * Context passed to adapter methods for each request.
 */
export interface AdapterContext {
  /** Session identifier */
  runId: string;
  logger: Logger;
  /** Signal to cancel the request */
  abortSignal?: AbortSignal;
  /** Maximum time in milliseconds for the request */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}
