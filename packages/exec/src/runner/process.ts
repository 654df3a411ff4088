import { spawn } from 'child_process';
import { MemoryWatchdog } from './memory';

export interface CommandSpec {
  command: string;
  args: string[];
}

export type KillReason = 'timeout' | 'memory' | 'output';

export interface BoundedRunOptions {
  cwd: string;
  stdin?: string;
  timeLimitMs: number;
  /** Resident memory ceiling enforced by the watchdog; null disables it */
  memoryLimitBytes: number | null;
  /** Per-stream byte cap; exceeding it kills the process group */
  maxOutputBytes: number;
  memoryPollIntervalMs: number;
  /** Run the command under `ulimit -v` sized to the memory limit */
  limitAddressSpace: boolean;
  /** Delay between SIGTERM and SIGKILL; 0 kills immediately */
  killGraceMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface BoundedRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  peakMemoryBytes: number | null;
  truncated: boolean;
  killedBy: KillReason | null;
  /** Set when the process could not be started */
  spawnError: string | null;
  /** Set when memory sampling failed; the peak may then be missing or low */
  memorySampleError: string | null;
}

/**
 * Signals every process in the group led by `pid`. The child must have been
 * spawned detached so that it leads its own group.
 */
export function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGKILL'): void {
  try {
    process.kill(-pid, signal);
  } catch (error) {
    // ESRCH: the whole group is already gone.
    if (error instanceof Error && 'code' in error && error.code === 'ESRCH') return;
    throw error;
  }
}

/**
 * Wraps a command so that the shell lowers its virtual memory limit before
 * replacing itself with the program.
 */
export function withAddressSpaceLimit(spec: CommandSpec, limitBytes: number): CommandSpec {
  const kib = Math.max(1, Math.ceil(limitBytes / 1024));
  return {
    command: '/bin/sh',
    args: ['-c', 'ulimit -v "$1" || exit 125; shift; exec "$@"', 'arena-run', String(kib), spec.command, ...spec.args],
  };
}

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  overflowed = false;

  constructor(private readonly cap: number) {}

  /** Returns false once the cap has been exceeded. */
  push(chunk: Buffer): boolean {
    if (this.overflowed) return false;
    const room = this.cap - this.bytes;
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, Math.max(0, room)));
      this.bytes = this.cap;
      this.overflowed = true;
      return false;
    }
    this.chunks.push(chunk);
    this.bytes += chunk.length;
    return true;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Spawns a command in its own process group and enforces the wall-clock,
 * memory and output limits. Start failures are reported in `spawnError`
 * rather than as a rejection.
 */
export function runBounded(spec: CommandSpec, options: BoundedRunOptions): Promise<BoundedRunResult> {
  const effective =
    options.limitAddressSpace && options.memoryLimitBytes !== null
      ? withAddressSpaceLimit(spec, options.memoryLimitBytes)
      : spec;

  return new Promise<BoundedRunResult>((resolve, reject) => {
    const start = Date.now();
    const stdout = new OutputBuffer(options.maxOutputBytes);
    const stderr = new OutputBuffer(options.maxOutputBytes);
    let killedBy: KillReason | null = null;
    let spawnError: string | null = null;
    let settled = false;
    let graceTimer: NodeJS.Timeout | null = null;

    const child = spawn(effective.command, effective.args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
      detached: true,
    });

    const terminate = (reason: KillReason) => {
      if (killedBy !== null || child.pid === undefined) return;
      killedBy = reason;
      const pid = child.pid;
      if (options.killGraceMs > 0) {
        killProcessTree(pid, 'SIGTERM');
        graceTimer = setTimeout(() => killProcessTree(pid, 'SIGKILL'), options.killGraceMs);
      } else {
        killProcessTree(pid, 'SIGKILL');
      }
    };

    const watchdog =
      child.pid === undefined
        ? null
        : new MemoryWatchdog({
            pid: child.pid,
            limitBytes: options.memoryLimitBytes,
            pollIntervalMs: options.memoryPollIntervalMs,
            onExceeded: () => terminate('memory'),
          });
    watchdog?.start();

    const timeoutTimer = setTimeout(() => terminate('timeout'), options.timeLimitMs);

    child.stdout.on('data', (chunk: Buffer) => {
      if (!stdout.push(chunk)) terminate('output');
    });
    child.stderr.on('data', (chunk: Buffer) => {
      if (!stderr.push(chunk)) terminate('output');
    });

    // The program may exit without reading its input.
    child.stdin.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code !== 'EPIPE' && err.code !== 'ECONNRESET') {
        stderr.push(Buffer.from(`\n[stdin] ${err.message}\n`));
      }
    });
    child.stdin.end(options.stdin ?? '');

    const finish = (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutTimer);
      if (graceTimer) clearTimeout(graceTimer);
      const durationMs = Date.now() - start;
      const peakMemoryBytes = watchdog ? watchdog.stop() : null;
      // Reap anything the program left behind in its group.
      if (child.pid !== undefined && spawnError === null) {
        try {
          killProcessTree(child.pid, 'SIGKILL');
        } catch (error) {
          reject(error);
          return;
        }
      }
      resolve({
        exitCode,
        signal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        durationMs,
        peakMemoryBytes,
        truncated: stdout.overflowed || stderr.overflowed,
        killedBy,
        spawnError,
        memorySampleError: watchdog?.error?.message ?? null,
      });
    };

    child.on('error', (err) => {
      spawnError = err.message;
      finish(null, null);
    });

    child.on('close', (code, signal) => {
      finish(code, signal);
    });
  });
}
