import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';

export const TRUNCATION_SUFFIX = '... [truncated]';

export interface LeveledLoggerOptions {
  level: LogLevel;
  /** Messages longer than this are cut and suffixed; 0 disables truncation */
  maxMessageLength?: number;
}

export function truncateMessage(message: string, maxLength: number): string {
  if (maxLength <= 0 || message.length <= maxLength) {
    return message;
  }
  return message.slice(0, maxLength) + TRUNCATION_SUFFIX;
}

/**
 * Drops messages below the configured level and shortens long ones.
 */
export class LeveledLogger implements Logger {
  constructor(
    private readonly inner: Logger,
    private readonly options: LeveledLoggerOptions,
  ) {}

  debug(message: string): void {
    if (!this.enabled('debug')) return;
    this.inner.debug(this.shorten(message));
  }

  info(message: string): void {
    if (!this.enabled('info')) return;
    this.inner.info(this.shorten(message));
  }

  warn(message: string): void {
    if (!this.enabled('warn')) return;
    this.inner.warn(this.shorten(message));
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    this.inner.error(error, message === undefined ? undefined : this.shorten(message));
  }

  child(bindings: Record<string, unknown>): Logger {
    return new LeveledLogger(this.inner.child(bindings), this.options);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.options.level];
  }

  private shorten(message: string): string {
    return truncateMessage(message, this.options.maxMessageLength ?? 0);
  }
}

export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}
