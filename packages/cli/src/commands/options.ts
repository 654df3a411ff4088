import { InvalidArgumentError, type Command } from 'commander';
import { ConfigLoader } from '@arena/core';
import { createLogger, type ArenaConfig, type ArenaConfigInput, type Logger } from '@arena/shared';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

/** Shared between the program and its commands; actions set the exit code. */
export interface CliContext {
  exitCode: number;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function loadConfig(globals: GlobalOptions, flags: ArenaConfigInput = {}): ArenaConfig {
  return ConfigLoader.load({ configPath: globals.config, flags });
}

/** `--json` keeps stdout machine-readable, so nothing else is logged. */
export function loggerFor(globals: GlobalOptions, config: ArenaConfig): Logger {
  if (globals.json) {
    return createLogger('silent');
  }
  return createLogger(globals.verbose ? 'debug' : config.logging.level, config.logging.maxMessageLength);
}
