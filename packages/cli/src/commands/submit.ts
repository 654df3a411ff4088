import type { Command } from 'commander';
import { readFile } from 'fs-extra';
import { loadProblem } from '@arena/core';
import { ResourceBoundedExecutor } from '@arena/exec';
import { SubmissionEvaluator } from '@arena/judge';
import { OutputRenderer } from '../output/renderer';
import { globalOptions, loadConfig, loggerFor, parsePositiveInt, type CliContext } from './options';

interface SubmitOptions {
  shortCircuit: boolean;
  concurrency?: number;
}

export function registerSubmitCommand(program: Command, ctx: CliContext): void {
  program
    .command('submit')
    .argument('<problemDir>', 'Problem directory')
    .argument('<solution>', 'C++ source file')
    .description('Evaluate one solution against every test of a problem')
    .option('--no-short-circuit', 'Run every test even after a subtask has failed')
    .option('--concurrency <n>', 'Tests run in parallel', parsePositiveInt)
    .action(async (problemDir: string, solution: string, options: SubmitOptions) => {
      const globals = globalOptions(program);
      const renderer = new OutputRenderer(!!globals.json);
      const config = loadConfig(globals, {
        evaluation: { shortCircuit: options.shortCircuit, concurrency: options.concurrency },
      });
      const logger = loggerFor(globals, config);

      const problem = await loadProblem(problemDir, { logger });
      const source = await readFile(solution, 'utf8');
      const executor = await ResourceBoundedExecutor.forInstalledCompiler(config, logger);
      const evaluator = SubmissionEvaluator.fromConfig(problem, config, executor, logger);

      const record = await evaluator.evaluate(
        { sessionId: 'submit', submissionCount: 0, limits: { maxTurns: 1, maxSubmissions: 1 } },
        source,
      );
      renderer.renderSubmission(record);
      ctx.exitCode = 0;
    });
}
