import { formatBindings, type Logger } from './types';

export class ConsoleLogger implements Logger {
  debug(message: string): void {
    console.debug(message);
  }

  info(message: string): void {
    console.info(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string): void {
    this.base.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    this.base.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    this.base.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    this.base.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}
