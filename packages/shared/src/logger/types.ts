export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Interface for logging throughout the arena. Structured session events do
 * not go through the logger; they are written by an `EventWriter`.
 *
 * @example
 * ```typescript
 * logger.info('Compiling submission');
 *
 * const sessionLogger = logger.child({ session: sessionId });
 * ```
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(error: Error, message?: string): void;

  /**
   * Create a child logger whose messages are prefixed with `[key=value ...]`.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
