/**
 * Final status of one compile-and-run attempt.
 *
 * - `ok`: exited with code 0 within every limit
 * - `compile_error`: the toolchain rejected the source; nothing was run
 * - `runtime_error`: non-zero exit code without a limit violation
 * - `timeout`: killed after the wall-clock limit
 * - `memory_exceeded`: killed (or aborted) at the memory ceiling
 * - `output_limit_exceeded`: killed for writing more than the output cap
 * - `crashed`: terminated by a signal we did not send, or could not be started
 */
export type ExecutionStatus =
  | 'ok'
  | 'compile_error'
  | 'runtime_error'
  | 'timeout'
  | 'memory_exceeded'
  | 'output_limit_exceeded'
  | 'crashed';

export interface ExecutionOutcome {
  readonly status: ExecutionStatus;
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
  /** Peak resident memory seen by the watchdog; null when it could not be sampled */
  readonly peakMemoryBytes: number | null;
  readonly truncated: boolean;
}
