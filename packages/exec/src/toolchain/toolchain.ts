import path from 'path';
import type { ToolchainConfig } from '@arena/shared';
import type { CommandSpec } from '../runner/process';

export interface BuildInput {
  /** Absolute path of the contestant's source file */
  mainSource: string;
  /** Additional translation units compiled together with the main source */
  extraSources: readonly string[];
  /** Directories searched for headers */
  includeDirs: readonly string[];
  /** Where the build should place its artifact */
  outputPath: string;
}

/**
 * Knows how to build a program from source and how to start the result.
 */
export interface Toolchain {
  readonly name: string;
  /** File name the contestant's source is written to */
  readonly sourceFileName: string;
  /** True for files the toolchain compiles as their own translation unit */
  isTranslationUnit(fileName: string): boolean;
  /** Null when the source runs as-is */
  buildCommand(input: BuildInput): CommandSpec | null;
  runCommand(input: BuildInput): CommandSpec;
}

const CPP_UNIT = /\.(cpp|cc|cxx|c\+\+)$/i;

export class GccToolchain implements Toolchain {
  readonly name: string;
  readonly sourceFileName: string;

  constructor(private readonly config: Pick<ToolchainConfig, 'compiler' | 'flags' | 'sourceFileName'>) {
    this.name = config.compiler;
    this.sourceFileName = config.sourceFileName;
  }

  isTranslationUnit(fileName: string): boolean {
    return CPP_UNIT.test(fileName);
  }

  buildCommand(input: BuildInput): CommandSpec {
    return {
      command: this.config.compiler,
      args: [
        ...this.config.flags,
        ...input.includeDirs.map((dir) => `-I${dir}`),
        input.mainSource,
        ...input.extraSources,
        '-o',
        input.outputPath,
      ],
    };
  }

  runCommand(input: BuildInput): CommandSpec {
    return { command: input.outputPath, args: [] };
  }
}

export interface CommandToolchainOptions {
  name: string;
  sourceFileName: string;
  /** Optional build or syntax-check step, given the main source path */
  check?: (mainSource: string) => CommandSpec;
  run: (mainSource: string) => CommandSpec;
  translationUnit?: RegExp;
}

/**
 * A toolchain for interpreted programs: the source is the artifact.
 */
export class CommandToolchain implements Toolchain {
  readonly name: string;
  readonly sourceFileName: string;

  constructor(private readonly options: CommandToolchainOptions) {
    this.name = options.name;
    this.sourceFileName = options.sourceFileName;
  }

  isTranslationUnit(fileName: string): boolean {
    return this.options.translationUnit?.test(fileName) ?? false;
  }

  buildCommand(input: BuildInput): CommandSpec | null {
    return this.options.check ? this.options.check(input.mainSource) : null;
  }

  runCommand(input: BuildInput): CommandSpec {
    return this.options.run(input.mainSource);
  }
}

/** Node.js programs: `node --check` stands in for compilation. */
export function nodeToolchain(sourceFileName = 'solution.cjs'): CommandToolchain {
  return new CommandToolchain({
    name: 'node',
    sourceFileName,
    check: (source) => ({ command: process.execPath, args: ['--check', source] }),
    run: (source) => ({ command: process.execPath, args: [source] }),
  });
}

export function artifactName(toolchain: Toolchain): string {
  return path.parse(toolchain.sourceFileName).name;
}
