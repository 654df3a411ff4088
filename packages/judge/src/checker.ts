import path from 'path';
import { readFile, writeFile } from 'fs-extra';
import { FatalError, toError, type ResourceLimits } from '@arena/shared';
import { withWorkspace, type CompiledProgram, type ResourceBoundedExecutor } from '@arena/exec';
import { firstDifferingLine, outputsMatch } from './compare';

export interface CheckInput {
  testCaseId: string;
  inputPath: string;
  expectedOutputPath: string | null;
  producedOutput: string;
}

export type CheckResult =
  | { ok: true; fraction: number; message?: string }
  /** The checker itself misbehaved; the verdict must be forced to incorrect */
  | { ok: false; reason: string };

export interface Checker {
  check(input: CheckInput): Promise<CheckResult>;
}

/**
 * Token-for-token comparison against the expected output file.
 */
export class ExactOutputChecker implements Checker {
  async check(input: CheckInput): Promise<CheckResult> {
    if (input.expectedOutputPath === null) {
      return { ok: false, reason: `No expected output for test ${input.testCaseId}` };
    }
    let expected: string;
    try {
      expected = await readFile(input.expectedOutputPath, 'utf8');
    } catch (error) {
      throw new FatalError(`Cannot read expected output ${input.expectedOutputPath}`, { cause: toError(error) });
    }
    if (outputsMatch(expected, input.producedOutput)) {
      return { ok: true, fraction: 1 };
    }
    const line = firstDifferingLine(expected, input.producedOutput);
    return { ok: true, fraction: 0, message: `Output differs from expected at line ${line ?? '?'}` };
  }
}

/**
 * Reads a checker's reply: the first whitespace-separated token of stdout is
 * a score in [0, 1]; stderr is a message for the contestant.
 */
export function parseCheckerOutput(stdout: string, stderr: string): CheckResult {
  const token = stdout.trim().split(/\s+/)[0] ?? '';
  if (token === '') {
    return { ok: false, reason: 'Checker printed no score' };
  }
  const fraction = Number(token);
  if (!Number.isFinite(fraction)) {
    return { ok: false, reason: `Checker printed a non-numeric score '${token}'` };
  }
  if (fraction < 0 || fraction > 1) {
    return { ok: false, reason: `Checker score ${fraction} is outside [0, 1]` };
  }
  const message = stderr.trim();
  return message ? { ok: true, fraction, message } : { ok: true, fraction };
}

/**
 * Runs a compiled checker as `checker <input> <expected> <produced>`.
 */
export class ProgramChecker implements Checker {
  constructor(
    private readonly executor: ResourceBoundedExecutor,
    private readonly program: CompiledProgram,
    private readonly limits: ResourceLimits,
  ) {}

  async check(input: CheckInput): Promise<CheckResult> {
    return withWorkspace(async (dir) => {
      const producedPath = path.join(dir, 'produced.out');
      await writeFile(producedPath, input.producedOutput, 'utf8');
      let expectedPath = input.expectedOutputPath;
      if (expectedPath === null) {
        expectedPath = path.join(dir, 'expected.out');
        await writeFile(expectedPath, '', 'utf8');
      }

      const outcome = await this.executor.run(this.program, '', this.limits, [
        input.inputPath,
        expectedPath,
        producedPath,
      ]);
      if (outcome.status !== 'ok') {
        return { ok: false, reason: `Checker ${outcome.status}${outcome.stderr ? `: ${outcome.stderr.trim()}` : ''}` };
      }
      return parseCheckerOutput(outcome.stdout, outcome.stderr);
    }, 'arena-check-');
  }
}

/** Stands in for a checker that could not be built; every check faults. */
export class BrokenChecker implements Checker {
  constructor(private readonly reason: string) {}

  async check(): Promise<CheckResult> {
    return { ok: false, reason: this.reason };
  }
}
