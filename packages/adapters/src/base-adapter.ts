import { ConfigError, ProviderError, toError } from '@arena/shared';
import { RateLimitError, TimeoutError } from './errors';

/**
 * Interface for API error types that have a status code.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * Each provider SDK supplies its own error class checks.
 */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for provider adapters that maps SDK errors onto the arena's
 * error hierarchy:
 * - 429 -> RateLimitError
 * - 401 -> ConfigError (bad or missing credentials)
 * - connection timeouts -> TimeoutError
 * - anything else -> ProviderError
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  protected mapError(error: unknown): Error {
    if (error instanceof ProviderError || error instanceof ConfigError) {
      return error;
    }
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, undefined, { cause: error });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }
    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(toError(error).message, { cause: error });
    }
    const cause = toError(error);
    return new ProviderError(cause.message, { cause });
  }
}
