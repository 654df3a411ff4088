import { Option, type Command } from 'commander';
import { runArenaSession } from '@arena/core';
import { UsageError, type ProviderConfig } from '@arena/shared';
import { OutputRenderer } from '../output/renderer';
import { globalOptions, loadConfig, loggerFor, parsePositiveInt, type CliContext } from './options';

interface RunOptions {
  provider?: ProviderConfig['type'];
  model?: string;
  script?: string;
  maxTurns?: number;
  maxSubmissions?: number;
  resultsDir?: string;
  sessionId?: string;
}

export function registerRunCommand(program: Command, ctx: CliContext): void {
  program
    .command('run')
    .argument('<problemDir>', 'Problem directory')
    .description('Run a full session of a model against a problem')
    .addOption(new Option('--provider <type>', 'Model provider').choices(['openai', 'fake']))
    .option('--model <name>', 'Model to evaluate')
    .option('--script <file>', 'Replay a JSON list of replies through the fake provider')
    .option('--max-turns <n>', 'Turn quota', parsePositiveInt)
    .option('--max-submissions <n>', 'Submission quota', parsePositiveInt)
    .option('--results-dir <dir>', 'Where session results are written')
    .option('--session-id <id>', 'Session id (default: a random UUID)')
    .action(async (problemDir: string, options: RunOptions) => {
      const globals = globalOptions(program);
      const renderer = new OutputRenderer(!!globals.json);
      if (options.script !== undefined && options.provider === 'openai') {
        throw new UsageError('--script replays replies through the fake provider and cannot be used with --provider openai');
      }

      const config = loadConfig(globals, {
        session: { maxTurns: options.maxTurns, maxSubmissions: options.maxSubmissions },
        provider: {
          type: options.script !== undefined ? 'fake' : options.provider,
          model: options.model,
          script: options.script,
        },
        results: options.resultsDir !== undefined ? { dir: options.resultsDir } : undefined,
      });
      if (globals.verbose) {
        renderer.log(`Running ${config.provider.type}/${config.provider.model} on ${problemDir}`);
      }

      const result = await runArenaSession({
        config,
        problemDir,
        logger: loggerFor(globals, config),
        sessionId: options.sessionId,
        onSession: (session) => renderer.follow(session),
      });

      renderer.renderSession(result);
      ctx.exitCode = result.statistics.terminationReason === 'fatal_error' ? 1 : 0;
    });
}
