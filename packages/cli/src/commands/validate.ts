import chalk from 'chalk';
import type { Command } from 'commander';
import { loadProblem } from '@arena/core';
import { CorpusValidationError, type ProblemSpec } from '@arena/shared';
import { OutputRenderer } from '../output/renderer';
import { globalOptions, loadConfig, loggerFor, type CliContext } from './options';

const ICONS = {
  OK: chalk.green('✔'),
  FAIL: chalk.red('✖'),
};

export type ProblemReport =
  | {
      dir: string;
      valid: true;
      id: string;
      subtasks: number;
      tests: number;
      maxScore: number;
      scoring: ProblemSpec['scoring'];
      checker: string | null;
      graders: number;
    }
  | { dir: string; valid: false; issues: string[] };

export function reportFor(dir: string, problem: ProblemSpec): ProblemReport {
  return {
    dir,
    valid: true,
    id: problem.id,
    subtasks: problem.subtasks.length,
    tests: Object.keys(problem.testCases).length,
    maxScore: problem.maxScore,
    scoring: problem.scoring,
    checker: problem.checker ?? null,
    graders: problem.graderSources.length,
  };
}

function printReport(report: ProblemReport): void {
  if (report.valid) {
    console.log(`${ICONS.OK} ${chalk.bold(report.id)} ${chalk.gray(report.dir)}`);
    console.log(
      `    ${report.subtasks} subtasks, ${report.tests} tests, max score ${report.maxScore} (${report.scoring})`,
    );
    if (report.checker) console.log(`    checker: ${report.checker}`);
    if (report.graders > 0) console.log(`    graders: ${report.graders}`);
    return;
  }
  console.log(`${ICONS.FAIL} ${chalk.bold(report.dir)}`);
  report.issues.forEach((issue) => console.log(`    - ${issue}`));
}

export function registerValidateCommand(program: Command, ctx: CliContext): void {
  program
    .command('validate')
    .argument('<problemDirs...>', 'Problem directories')
    .description('Load and check problem directories')
    .action(async (problemDirs: string[]) => {
      const globals = globalOptions(program);
      const renderer = new OutputRenderer(!!globals.json);
      const logger = loggerFor(globals, loadConfig(globals));

      const reports: ProblemReport[] = [];
      for (const dir of problemDirs) {
        try {
          reports.push(reportFor(dir, await loadProblem(dir, { logger })));
        } catch (error) {
          if (!(error instanceof CorpusValidationError)) throw error;
          reports.push({ dir, valid: false, issues: error.issues.length > 0 ? error.issues : [error.message] });
        }
      }

      if (renderer.isJson) {
        renderer.json(reports);
      } else {
        reports.forEach(printReport);
      }
      ctx.exitCode = reports.every((r) => r.valid) ? 0 : 1;
    });
}
