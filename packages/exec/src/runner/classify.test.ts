import { describe, it, expect } from 'vitest';
import { classifyRun, compileErrorOutcome, toOutcome } from './classify';
import type { BoundedRunResult } from './process';

const MiB = 1024 * 1024;

function result(overrides: Partial<BoundedRunResult> = {}): BoundedRunResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    durationMs: 5,
    peakMemoryBytes: 10 * MiB,
    truncated: false,
    killedBy: null,
    spawnError: null,
    memorySampleError: null,
    ...overrides,
  };
}

const limited = { memoryLimitBytes: 100 * MiB, addressSpaceLimited: true };
const watchdogOnly = { memoryLimitBytes: 100 * MiB, addressSpaceLimited: false };

describe('classifyRun', () => {
  it('reports a clean exit as ok', () => {
    expect(classifyRun(result(), limited)).toBe('ok');
  });

  it('maps our own kills to their limit', () => {
    expect(classifyRun(result({ killedBy: 'timeout', signal: 'SIGKILL', exitCode: null }), limited)).toBe('timeout');
    expect(classifyRun(result({ killedBy: 'memory', signal: 'SIGKILL', exitCode: null }), limited)).toBe(
      'memory_exceeded',
    );
    expect(classifyRun(result({ killedBy: 'output', signal: 'SIGKILL', exitCode: null }), limited)).toBe(
      'output_limit_exceeded',
    );
  });

  it('separates runtime errors from foreign signals', () => {
    expect(classifyRun(result({ exitCode: 3 }), limited)).toBe('runtime_error');
    expect(classifyRun(result({ exitCode: null, signal: 'SIGSEGV' }), limited)).toBe('crashed');
  });

  it('blames abnormal exits near the address-space limit on memory', () => {
    expect(classifyRun(result({ exitCode: null, signal: 'SIGABRT', peakMemoryBytes: 95 * MiB }), limited)).toBe(
      'memory_exceeded',
    );
    expect(
      classifyRun(result({ exitCode: null, signal: 'SIGABRT', stderr: "what():  std::bad_alloc" }), limited),
    ).toBe('memory_exceeded');
  });

  it('does not apply the near-limit rule without the address-space wrapper', () => {
    expect(classifyRun(result({ exitCode: 1, peakMemoryBytes: 95 * MiB }), watchdogOnly)).toBe('runtime_error');
  });

  it('reports a peak above the limit even after a clean exit', () => {
    expect(classifyRun(result({ peakMemoryBytes: 101 * MiB }), watchdogOnly)).toBe('memory_exceeded');
  });

  it('reports start failures as crashed', () => {
    const outcome = toOutcome(result({ exitCode: null, spawnError: 'spawn nope ENOENT' }), limited);
    expect(outcome.status).toBe('crashed');
    expect(outcome.stderr).toBe('Failed to start process: spawn nope ENOENT');
    expect(Object.isFrozen(outcome)).toBe(true);
  });
});

describe('compileErrorOutcome', () => {
  it('carries the diagnostics in stderr', () => {
    expect(compileErrorOutcome('error: expected ;', 12)).toEqual({
      status: 'compile_error',
      exitCode: null,
      signal: null,
      stdout: '',
      stderr: 'error: expected ;',
      durationMs: 12,
      peakMemoryBytes: null,
      truncated: false,
    });
  });
});
