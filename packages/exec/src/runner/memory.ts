import { readFile } from 'fs/promises';

const KIB = 1024;

/**
 * Parses `/proc/<pid>/status` and returns the larger of the high-water mark
 * (`VmHWM`) and the current resident set (`VmRSS`), in bytes.
 */
export function parseProcStatus(status: string): number | null {
  let peak: number | null = null;
  for (const line of status.split('\n')) {
    const match = /^(VmHWM|VmRSS):\s+(\d+)\s+kB/.exec(line);
    if (!match) continue;
    const bytes = Number(match[2]) * KIB;
    peak = peak === null ? bytes : Math.max(peak, bytes);
  }
  return peak;
}

export async function sampleMemory(pid: number): Promise<number | null> {
  try {
    return parseProcStatus(await readFile(`/proc/${pid}/status`, 'utf8'));
  } catch (error) {
    // The process exited between samples, or there is no procfs.
    if (isMissingProcessError(error)) return null;
    throw error;
  }
}

function isMissingProcessError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ESRCH' || error.code === 'EACCES';
}

export interface MemoryWatchdogOptions {
  pid: number;
  limitBytes: number | null;
  pollIntervalMs: number;
  onExceeded: (peakBytes: number) => void;
  /** Reads one sample; defaults to `/proc/<pid>/status` */
  sample?: (pid: number) => Promise<number | null>;
}

/**
 * Polls a process's resident memory and reports the first sample above the
 * limit. Sampling is best effort: short spikes between polls can be missed.
 */
export class MemoryWatchdog {
  private timer: NodeJS.Timeout | null = null;
  private peak: number | null = null;
  private sampling = false;
  private fired = false;
  private failure: Error | null = null;

  constructor(private readonly options: MemoryWatchdogOptions) {}

  get peakBytes(): number | null {
    return this.peak;
  }

  get error(): Error | null {
    return this.failure;
  }

  start(): void {
    if (this.timer || process.platform !== 'linux') return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.pollIntervalMs);
    void this.tick();
  }

  /** Stops polling and returns the highest sample seen. */
  stop(): number | null {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    return this.peak;
  }

  private async tick(): Promise<void> {
    if (this.sampling) return;
    this.sampling = true;
    try {
      const sample = await (this.options.sample ?? sampleMemory)(this.options.pid);
      if (sample === null) return;
      this.peak = this.peak === null ? sample : Math.max(this.peak, sample);
      const { limitBytes } = this.options;
      if (!this.fired && limitBytes !== null && this.peak > limitBytes) {
        this.fired = true;
        this.options.onExceeded(this.peak);
      }
    } catch (error) {
      this.failure = error instanceof Error ? error : new Error(String(error));
    } finally {
      this.sampling = false;
    }
  }
}
