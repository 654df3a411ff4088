import { ConsoleLogger, ScopedLogger } from './consoleLogger';
import { LeveledLogger, SilentLogger, truncateMessage, TRUNCATION_SUFFIX } from './leveledLogger';
import type { LogLevel, Logger } from './types';

export type { Logger, LogLevel } from './types';
export type { LeveledLoggerOptions } from './leveledLogger';
export { LOG_LEVEL_ORDER, formatBindings } from './types';

export {
  ConsoleLogger,
  ScopedLogger,
  LeveledLogger,
  SilentLogger,
  truncateMessage,
  TRUNCATION_SUFFIX,
};

export function createLogger(level: LogLevel, maxMessageLength = 1000): Logger {
  if (level === 'silent') {
    return new SilentLogger();
  }
  return new LeveledLogger(new ConsoleLogger(), { level, maxMessageLength });
}
