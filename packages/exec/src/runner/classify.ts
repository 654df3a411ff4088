import type { ExecutionOutcome, ExecutionStatus } from '@arena/shared';
import type { BoundedRunResult } from './process';

/** Fraction of the limit above which an abnormal exit is blamed on memory */
export const MEMORY_NEAR_LIMIT_RATIO = 0.9;

const ALLOCATION_FAILURE = /std::bad_alloc|Cannot allocate memory|out of memory/i;

export interface ClassifyContext {
  memoryLimitBytes: number | null;
  /** The run was wrapped in `ulimit -v`, so allocation failures surface as crashes */
  addressSpaceLimited: boolean;
}

function looksLikeMemoryFailure(result: BoundedRunResult, ctx: ClassifyContext): boolean {
  if (ctx.memoryLimitBytes === null) return false;
  if (result.peakMemoryBytes !== null && result.peakMemoryBytes > ctx.memoryLimitBytes) {
    return true;
  }
  if (!ctx.addressSpaceLimited) return false;
  if (
    result.peakMemoryBytes !== null &&
    result.peakMemoryBytes >= ctx.memoryLimitBytes * MEMORY_NEAR_LIMIT_RATIO
  ) {
    return true;
  }
  return ALLOCATION_FAILURE.test(result.stderr);
}

export function classifyRun(result: BoundedRunResult, ctx: ClassifyContext): ExecutionStatus {
  if (result.spawnError !== null) return 'crashed';

  switch (result.killedBy) {
    case 'timeout':
      return 'timeout';
    case 'memory':
      return 'memory_exceeded';
    case 'output':
      return 'output_limit_exceeded';
    case null:
      break;
  }

  const abnormal = result.signal !== null || result.exitCode !== 0;
  if (abnormal && looksLikeMemoryFailure(result, ctx)) return 'memory_exceeded';
  if (result.signal !== null) return 'crashed';
  if (result.exitCode !== 0) return 'runtime_error';
  // A clean exit whose last sample already exceeded the ceiling.
  if (ctx.memoryLimitBytes !== null && result.peakMemoryBytes !== null && result.peakMemoryBytes > ctx.memoryLimitBytes) {
    return 'memory_exceeded';
  }
  return 'ok';
}

export function toOutcome(result: BoundedRunResult, ctx: ClassifyContext): ExecutionOutcome {
  const status = classifyRun(result, ctx);
  const stderr = result.spawnError !== null ? `Failed to start process: ${result.spawnError}` : result.stderr;
  return Object.freeze({
    status,
    exitCode: result.exitCode,
    signal: result.signal,
    stdout: result.stdout,
    stderr,
    durationMs: result.durationMs,
    peakMemoryBytes: result.peakMemoryBytes,
    truncated: result.truncated,
  });
}

export function compileErrorOutcome(diagnostics: string, durationMs = 0): ExecutionOutcome {
  return Object.freeze({
    status: 'compile_error',
    exitCode: null,
    signal: null,
    stdout: '',
    stderr: diagnostics,
    durationMs,
    peakMemoryBytes: null,
    truncated: false,
  });
}
