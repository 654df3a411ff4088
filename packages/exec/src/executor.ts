import path from 'path';
import { copy, writeFile } from 'fs-extra';
import {
  FatalError,
  SilentLogger,
  type ArenaConfig,
  type ExecutionOutcome,
  type Logger,
  type ResourceLimits,
} from '@arena/shared';
import { runBounded, type BoundedRunOptions, type CommandSpec } from './runner/process';
import { compileErrorOutcome, toOutcome } from './runner/classify';
import { artifactName, GccToolchain, type BuildInput, type Toolchain } from './toolchain/toolchain';
import { requireCompiler } from './toolchain/resolve';
import { withWorkspace } from './workspace';

export interface ExecutorOptions {
  toolchain: Toolchain;
  compileTimeoutMs: number;
  maxOutputBytes: number;
  memoryPollIntervalMs: number;
  killGraceMs: number;
  limitAddressSpace: boolean;
  logger?: Logger;
}

export interface ProgramSources {
  code: string;
  /** Files copied next to the solution before building (graders, headers) */
  supportFiles?: readonly string[];
  /** Extra header search directories */
  includeDirs?: readonly string[];
}

export interface CompiledProgram {
  readonly toolchain: string;
  readonly command: CommandSpec;
  readonly workDir: string;
}

export type CompileResult =
  | { ok: true; program: CompiledProgram; durationMs: number }
  | { ok: false; outcome: ExecutionOutcome };

/**
 * Compiles and runs untrusted programs under wall-clock, memory and output
 * limits. Program misbehaviour always comes back as an `ExecutionOutcome`;
 * only environment failures (a missing compiler, an unwritable temp dir)
 * are thrown.
 */
export class ResourceBoundedExecutor {
  private readonly logger: Logger;

  constructor(private readonly options: ExecutorOptions) {
    this.logger = options.logger ?? new SilentLogger();
  }

  static fromConfig(config: ArenaConfig, logger?: Logger, toolchain?: Toolchain): ResourceBoundedExecutor {
    return new ResourceBoundedExecutor({
      toolchain: toolchain ?? new GccToolchain(config.toolchain),
      compileTimeoutMs: config.toolchain.compileTimeoutMs,
      limitAddressSpace: config.toolchain.limitAddressSpace,
      maxOutputBytes: config.executor.maxOutputBytes,
      memoryPollIntervalMs: config.executor.memoryPollIntervalMs,
      killGraceMs: config.executor.killGraceMs,
      logger,
    });
  }

  /** `fromConfig` for the configured compiler, which must be installed. */
  static async forInstalledCompiler(config: ArenaConfig, logger?: Logger): Promise<ResourceBoundedExecutor> {
    await requireCompiler(config.toolchain.compiler);
    return ResourceBoundedExecutor.fromConfig(config, logger);
  }

  get toolchain(): Toolchain {
    return this.options.toolchain;
  }

  /**
   * Builds `sources` inside `workDir`, which must outlive every run of the
   * returned program.
   */
  async compile(sources: ProgramSources, workDir: string): Promise<CompileResult> {
    if (sources.code.trim() === '') {
      return { ok: false, outcome: compileErrorOutcome('Empty source code') };
    }

    const { toolchain } = this.options;
    const mainSource = path.join(workDir, toolchain.sourceFileName);
    await writeFile(mainSource, sources.code, 'utf8');

    const extraSources: string[] = [];
    for (const file of sources.supportFiles ?? []) {
      const target = path.join(workDir, path.basename(file));
      await copy(file, target);
      if (toolchain.isTranslationUnit(target)) extraSources.push(target);
    }

    const input: BuildInput = {
      mainSource,
      extraSources,
      includeDirs: [workDir, ...(sources.includeDirs ?? [])],
      outputPath: path.join(workDir, artifactName(toolchain)),
    };

    const build = toolchain.buildCommand(input);
    let durationMs = 0;
    if (build) {
      this.logger.debug(`Compiling with ${build.command}`);
      const result = await runBounded(build, {
        ...this.baseRunOptions(workDir),
        timeLimitMs: this.options.compileTimeoutMs,
        memoryLimitBytes: null,
        limitAddressSpace: false,
      });
      durationMs = result.durationMs;

      if (result.spawnError !== null) {
        throw new FatalError(`Failed to start compiler '${build.command}': ${result.spawnError}`);
      }
      if (result.killedBy === 'timeout') {
        return {
          ok: false,
          outcome: compileErrorOutcome(`Compilation timed out after ${this.options.compileTimeoutMs}ms`, durationMs),
        };
      }
      if (result.killedBy !== null || result.exitCode !== 0) {
        const diagnostics = [result.stderr, result.stdout].filter((s) => s.length > 0).join('\n');
        return { ok: false, outcome: compileErrorOutcome(diagnostics || 'Compilation failed', durationMs) };
      }
    }

    return {
      ok: true,
      durationMs,
      program: Object.freeze({ toolchain: toolchain.name, command: toolchain.runCommand(input), workDir }),
    };
  }

  /**
   * Runs a compiled program once, in its own scratch directory, with
   * `extraArgs` appended to its command line.
   */
  async run(
    program: CompiledProgram,
    stdin: string,
    limits: ResourceLimits,
    extraArgs: readonly string[] = [],
  ): Promise<ExecutionOutcome> {
    return withWorkspace(async (cwd) => {
      const spec: CommandSpec = { command: program.command.command, args: [...program.command.args, ...extraArgs] };
      const limitAddressSpace = this.options.limitAddressSpace;
      const result = await runBounded(spec, {
        ...this.baseRunOptions(cwd),
        stdin,
        timeLimitMs: limits.timeLimitMs,
        memoryLimitBytes: limits.memoryLimitBytes,
        limitAddressSpace,
      });
      if (result.memorySampleError !== null) {
        this.logger.warn(`Memory sampling failed; peak memory may be under-reported: ${result.memorySampleError}`);
      }
      const outcome = toOutcome(result, {
        memoryLimitBytes: limits.memoryLimitBytes,
        addressSpaceLimited: limitAddressSpace,
      });
      this.logger.debug(`Run finished: ${outcome.status} in ${outcome.durationMs}ms`);
      return outcome;
    }, 'arena-run-');
  }

  /** Compile and run a single program in a throwaway workspace. */
  async execute(sourceCode: string, stdin: string, limits: ResourceLimits): Promise<ExecutionOutcome> {
    return withWorkspace(async (workDir) => {
      const compiled = await this.compile({ code: sourceCode }, workDir);
      if (!compiled.ok) {
        return compiled.outcome;
      }
      return this.run(compiled.program, stdin, limits);
    });
  }

  private baseRunOptions(cwd: string): Pick<
    BoundedRunOptions,
    'cwd' | 'maxOutputBytes' | 'memoryPollIntervalMs' | 'killGraceMs'
  > {
    return {
      cwd,
      maxOutputBytes: this.options.maxOutputBytes,
      memoryPollIntervalMs: this.options.memoryPollIntervalMs,
      killGraceMs: this.options.killGraceMs,
    };
  }
}
