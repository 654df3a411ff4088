import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { FatalError } from '@arena/shared';
import { ResourceBoundedExecutor, nodeToolchain, withWorkspace } from '@arena/exec';
import { BrokenChecker, ExactOutputChecker, ProgramChecker, parseCheckerOutput } from './checker';

describe('parseCheckerOutput', () => {
  it('reads the first token as the score and stderr as message', () => {
    expect(parseCheckerOutput('0.5\nextra', 'partially correct\n')).toEqual({
      ok: true,
      fraction: 0.5,
      message: 'partially correct',
    });
    expect(parseCheckerOutput('1', '')).toEqual({ ok: true, fraction: 1 });
  });

  it('faults on missing, non-numeric or out-of-range scores', () => {
    expect(parseCheckerOutput('  ', '')).toEqual({ ok: false, reason: 'Checker printed no score' });
    expect(parseCheckerOutput('ok', '')).toEqual({
      ok: false,
      reason: "Checker printed a non-numeric score 'ok'",
    });
    expect(parseCheckerOutput('1.5', '')).toEqual({ ok: false, reason: 'Checker score 1.5 is outside [0, 1]' });
  });
});

describe('ExactOutputChecker', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'arena-exact-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('awards full credit to matching output', async () => {
    const expectedOutputPath = path.join(dir, '1.out');
    await writeFile(expectedOutputPath, '3\n');
    const result = await new ExactOutputChecker().check({
      testCaseId: '1',
      inputPath: path.join(dir, '1.in'),
      expectedOutputPath,
      producedOutput: '3  \n',
    });
    expect(result).toEqual({ ok: true, fraction: 1 });
  });

  it('names the first differing line', async () => {
    const expectedOutputPath = path.join(dir, '1.out');
    await writeFile(expectedOutputPath, '1\n2\n');
    const result = await new ExactOutputChecker().check({
      testCaseId: '1',
      inputPath: '',
      expectedOutputPath,
      producedOutput: '1\n5\n',
    });
    expect(result).toEqual({ ok: true, fraction: 0, message: 'Output differs from expected at line 2' });
  });

  it('raises a fatal error when the expected file is missing', async () => {
    await expect(
      new ExactOutputChecker().check({
        testCaseId: '1',
        inputPath: '',
        expectedOutputPath: path.join(dir, 'missing.out'),
        producedOutput: '',
      }),
    ).rejects.toBeInstanceOf(FatalError);
  });
});

describe('ProgramChecker', () => {
  const executor = new ResourceBoundedExecutor({
    toolchain: nodeToolchain(),
    compileTimeoutMs: 10_000,
    maxOutputBytes: 1024 * 1024,
    memoryPollIntervalMs: 20,
    killGraceMs: 0,
    limitAddressSpace: false,
  });
  const limits = { timeLimitMs: 5_000, memoryLimitBytes: 512 * 1024 * 1024 };

  // Awards half credit when the produced number is within 1 of the expected one.
  const CHECKER = `
const fs = require('fs');
const [, , input, expected, produced] = process.argv;
fs.readFileSync(input);
const want = Number(fs.readFileSync(expected, 'utf8'));
const got = Number(fs.readFileSync(produced, 'utf8'));
if (got === want) { console.log(1); }
else if (Math.abs(got - want) <= 1) { console.log(0.5); console.error('close'); }
else { console.log(0); console.error('wrong'); }
`;

  it('runs the checker with input, expected and produced paths', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'arena-pc-'));
    try {
      const inputPath = path.join(dir, '1.in');
      const expectedOutputPath = path.join(dir, '1.out');
      await writeFile(inputPath, '10\n');
      await writeFile(expectedOutputPath, '42\n');

      await withWorkspace(async (workDir) => {
        const compiled = await executor.compile({ code: CHECKER }, workDir);
        if (!compiled.ok) throw new Error(compiled.outcome.stderr);
        const checker = new ProgramChecker(executor, compiled.program, limits);
        const base = { testCaseId: '1', inputPath, expectedOutputPath };

        expect(await checker.check({ ...base, producedOutput: '42' })).toEqual({ ok: true, fraction: 1 });
        expect(await checker.check({ ...base, producedOutput: '43' })).toEqual({
          ok: true,
          fraction: 0.5,
          message: 'close',
        });
        expect(await checker.check({ ...base, producedOutput: '7' })).toEqual({
          ok: true,
          fraction: 0,
          message: 'wrong',
        });
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('faults when the checker crashes', async () => {
    await withWorkspace(async (workDir) => {
      const compiled = await executor.compile({ code: 'process.exit(3)' }, workDir);
      if (!compiled.ok) throw new Error(compiled.outcome.stderr);
      const checker = new ProgramChecker(executor, compiled.program, limits);
      const result = await checker.check({
        testCaseId: '1',
        inputPath: '/dev/null',
        expectedOutputPath: null,
        producedOutput: '',
      });
      expect(result).toEqual({ ok: false, reason: 'Checker runtime_error' });
    });
  });
});

describe('BrokenChecker', () => {
  it('always faults with its reason', async () => {
    expect(await new BrokenChecker('no build').check()).toEqual({ ok: false, reason: 'no build' });
  });
});
