import { readFile } from 'fs-extra';
import {
  FatalError,
  toError,
  type ExecutionOutcome,
  type ResourceLimits,
  type TestCase,
  type TestVerdict,
} from '@arena/shared';
import type { CompiledProgram, ResourceBoundedExecutor } from '@arena/exec';
import type { Checker } from './checker';

export interface TestRunContext {
  executor: ResourceBoundedExecutor;
  program: CompiledProgram;
  limits: ResourceLimits;
  checker: Checker;
  onCheckerFault?: (testCaseId: string, reason: string) => void;
}

const STATUS_MESSAGES: Readonly<Record<ExecutionOutcome['status'], string>> = {
  ok: 'OK',
  compile_error: 'Compilation failed',
  runtime_error: 'Runtime error',
  timeout: 'Time limit exceeded',
  memory_exceeded: 'Memory limit exceeded',
  output_limit_exceeded: 'Output limit exceeded',
  crashed: 'Program crashed',
};

export function describeStatus(status: ExecutionOutcome['status']): string {
  return STATUS_MESSAGES[status];
}

/**
 * Runs one test: feed the input, then let the checker grade the output.
 * Program and checker faults become verdicts; an unreadable input file is a
 * harness failure and is thrown.
 */
export async function runTestCase(ctx: TestRunContext, testCase: TestCase): Promise<TestVerdict> {
  let input: string;
  try {
    input = await readFile(testCase.inputPath, 'utf8');
  } catch (error) {
    throw new FatalError(`Cannot read input for test ${testCase.id}`, { cause: toError(error) });
  }

  const outcome = await ctx.executor.run(ctx.program, input, ctx.limits);
  if (outcome.status !== 'ok') {
    return Object.freeze({
      testCaseId: testCase.id,
      correct: false,
      fraction: 0,
      outcome,
      message: describeStatus(outcome.status),
    });
  }

  const check = await ctx.checker.check({
    testCaseId: testCase.id,
    inputPath: testCase.inputPath,
    expectedOutputPath: testCase.expectedOutputPath,
    producedOutput: outcome.stdout,
  });

  if (!check.ok) {
    ctx.onCheckerFault?.(testCase.id, check.reason);
    return Object.freeze({
      testCaseId: testCase.id,
      correct: false,
      fraction: 0,
      outcome,
      message: check.reason,
      checkerFault: true,
    });
  }

  return Object.freeze({
    testCaseId: testCase.id,
    correct: check.fraction === 1,
    fraction: check.fraction,
    outcome,
    message: check.message ?? (check.fraction === 1 ? 'Correct' : 'Wrong answer'),
  });
}

export function skippedVerdict(testCaseId: string): TestVerdict {
  return Object.freeze({
    testCaseId,
    correct: false,
    fraction: 0,
    outcome: null,
    message: 'Skipped after an earlier failure in the same subtask',
    skipped: true,
  });
}
