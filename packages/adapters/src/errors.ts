import { ProviderError, type AppErrorOptions } from '@arena/shared';

export class RateLimitError extends ProviderError {
  constructor(
    message: string,
    public readonly retryAfter?: number,
    options: AppErrorOptions = {},
  ) {
    super(message, options);
  }
}

export class TimeoutError extends ProviderError {}
