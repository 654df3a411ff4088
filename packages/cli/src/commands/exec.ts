import type { Command } from 'commander';
import { readFile } from 'fs-extra';
import { ResourceBoundedExecutor } from '@arena/exec';
import { OutputRenderer } from '../output/renderer';
import { globalOptions, loadConfig, loggerFor, parsePositiveInt, type CliContext } from './options';

interface ExecOptions {
  stdin?: string;
  timeLimit?: number;
  memoryLimit?: number;
}

export function registerExecCommand(program: Command, ctx: CliContext): void {
  program
    .command('exec')
    .argument('<source>', 'C++ source file')
    .description('Compile and run a program under the experiment limits')
    .option('--stdin <file>', 'File fed to the program on stdin')
    .option('--time-limit <ms>', 'Wall-clock limit in milliseconds', parsePositiveInt)
    .option('--memory-limit <bytes>', 'Memory limit in bytes', parsePositiveInt)
    .action(async (sourcePath: string, options: ExecOptions) => {
      const globals = globalOptions(program);
      const renderer = new OutputRenderer(!!globals.json);
      const config = loadConfig(globals, {
        experiment: { timeLimitMs: options.timeLimit, memoryLimitBytes: options.memoryLimit },
      });

      const source = await readFile(sourcePath, 'utf8');
      const stdin = options.stdin !== undefined ? await readFile(options.stdin, 'utf8') : '';
      const executor = await ResourceBoundedExecutor.forInstalledCompiler(config, loggerFor(globals, config));

      const outcome = await executor.execute(source, stdin, config.experiment);
      renderer.renderExecution(outcome);
      ctx.exitCode = outcome.status === 'ok' ? 0 : 1;
    });
}
