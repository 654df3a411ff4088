import { readFileSync } from 'fs';
import { Command, CommanderError } from 'commander';
import pc from 'picocolors';
import { z } from 'zod';
import { AppError, ConfigError, UsageError } from '@arena/shared';
import { globalOptions, type CliContext, type GlobalOptions } from './commands/options';
import { registerExecCommand } from './commands/exec';
import { registerRunCommand } from './commands/run';
import { registerSubmitCommand } from './commands/submit';
import { registerValidateCommand } from './commands/validate';

const { version } = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')));

export function buildProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('arena')
    .description('Evaluate agents on olympiad programming problems')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerRunCommand(program, ctx);
  registerSubmitCommand(program, ctx);
  registerExecCommand(program, ctx);
  registerValidateCommand(program, ctx);

  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(JSON.stringify({ error: { code: e.code, message: e.message, details: e.details } }));
    } else {
      console.log(
        JSON.stringify({
          error: { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) },
        }),
      );
    }
    return;
  }

  console.error(pc.red(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`));
  if (e instanceof AppError && e.details) {
    console.error(`  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`);
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv`, runs the command and resolves to the process exit code:
 * 0 on success, 1 on a runtime failure, 2 on a configuration or usage error.
 */
export async function runCli(argv: string[]): Promise<number> {
  const ctx: CliContext = { exitCode: 0 };
  const program = buildProgram(ctx);
  try {
    await program.parseAsync(argv);
    return ctx.exitCode;
  } catch (e) {
    // Commander has already printed its own message (or the help text).
    if (e instanceof CommanderError) {
      return e.exitCode === 0 ? 0 : 2;
    }
    reportError(e, globalOptions(program));
    return e instanceof ConfigError || e instanceof UsageError ? 2 : 1;
  }
}
