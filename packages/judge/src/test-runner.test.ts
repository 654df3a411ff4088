import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { FatalError, type ProblemSpec } from '@arena/shared';
import type { CompiledProgram } from '@arena/exec';
import { BrokenChecker, ExactOutputChecker } from './checker';
import { describeStatus, runTestCase, skippedVerdict, type TestRunContext } from './test-runner';
import { SUM_SOLUTION, createProblemFixture, nodeExecutor } from './testing/problem-fixture';

describe('runTestCase', () => {
  let root = '';
  let problem: ProblemSpec;

  const contextFor = async (code: string, overrides: Partial<TestRunContext> = {}): Promise<TestRunContext> => {
    const executor = nodeExecutor();
    const compiled = await executor.compile({ code }, root);
    if (!compiled.ok) throw new Error(compiled.outcome.stderr);
    const program: CompiledProgram = compiled.program;
    return {
      executor,
      program,
      limits: { timeLimitMs: 1000, memoryLimitBytes: 512 * 1024 * 1024 },
      checker: new ExactOutputChecker(),
      ...overrides,
    };
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'arena-tr-'));
    problem = await createProblemFixture(root, [
      { name: 'only', points: 100, tests: [{ id: 'a', input: '2 3\n', output: '5\n' }] },
    ]);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('marks a matching output correct', async () => {
    const verdict = await runTestCase(await contextFor(SUM_SOLUTION), problem.testCases.a);

    expect(verdict).toMatchObject({ testCaseId: 'a', correct: true, fraction: 1, message: 'Correct' });
    expect(verdict.outcome?.status).toBe('ok');
  });

  it('reports wrong output with the first differing line', async () => {
    const verdict = await runTestCase(await contextFor('console.log(6)'), problem.testCases.a);

    expect(verdict.correct).toBe(false);
    expect(verdict.message).toBe('Output differs from expected at line 1');
  });

  it('describes a failed run by its status without calling the checker', async () => {
    const checker = new ExactOutputChecker();
    const check = vi.spyOn(checker, 'check');
    const verdict = await runTestCase(await contextFor('process.exit(3)', { checker }), problem.testCases.a);

    expect(verdict.outcome?.status).toBe('runtime_error');
    expect(verdict.message).toBe('Runtime error');
    expect(check).not.toHaveBeenCalled();
  });

  it('flags checker faults and reports them', async () => {
    const onCheckerFault = vi.fn();
    const ctx = await contextFor(SUM_SOLUTION, { checker: new BrokenChecker('no checker'), onCheckerFault });
    const verdict = await runTestCase(ctx, problem.testCases.a);

    expect(verdict).toMatchObject({ correct: false, checkerFault: true, message: 'no checker' });
    expect(onCheckerFault).toHaveBeenCalledWith('a', 'no checker');
  });

  it('throws when the input file is missing', async () => {
    const ctx = await contextFor(SUM_SOLUTION);
    const missing = { id: 'gone', inputPath: path.join(root, 'nope.in'), expectedOutputPath: null };

    await expect(runTestCase(ctx, missing)).rejects.toBeInstanceOf(FatalError);
  });
});

describe('skippedVerdict', () => {
  it('carries no outcome', () => {
    expect(skippedVerdict('7')).toEqual({
      testCaseId: '7',
      correct: false,
      fraction: 0,
      outcome: null,
      message: 'Skipped after an earlier failure in the same subtask',
      skipped: true,
    });
  });
});

describe('describeStatus', () => {
  it('names limit violations', () => {
    expect(describeStatus('timeout')).toBe('Time limit exceeded');
    expect(describeStatus('memory_exceeded')).toBe('Memory limit exceeded');
  });
});
