import { describe, it, expect } from 'vitest';
import { GccToolchain, nodeToolchain, artifactName } from './toolchain';
import { FatalError } from '@arena/shared';
import { requireCompiler, resolveCompiler } from './resolve';

describe('GccToolchain', () => {
  const gcc = new GccToolchain({
    compiler: 'g++',
    flags: ['-std=c++20', '-O2'],
    sourceFileName: 'solution.cpp',
  });

  it('compiles the solution with extra units and include dirs', () => {
    expect(
      gcc.buildCommand({
        mainSource: '/w/solution.cpp',
        extraSources: ['/w/grader.cpp'],
        includeDirs: ['/w'],
        outputPath: '/w/solution',
      }),
    ).toEqual({
      command: 'g++',
      args: ['-std=c++20', '-O2', '-I/w', '/w/solution.cpp', '/w/grader.cpp', '-o', '/w/solution'],
    });
  });

  it('runs the produced binary', () => {
    expect(
      gcc.runCommand({ mainSource: '/w/solution.cpp', extraSources: [], includeDirs: [], outputPath: '/w/solution' }),
    ).toEqual({ command: '/w/solution', args: [] });
  });

  it('only treats C++ sources as translation units', () => {
    expect(gcc.isTranslationUnit('grader.cpp')).toBe(true);
    expect(gcc.isTranslationUnit('tree.h')).toBe(false);
  });

  it('names the artifact after the source file', () => {
    expect(artifactName(gcc)).toBe('solution');
  });
});

describe('nodeToolchain', () => {
  it('syntax-checks and runs the source with the current node', () => {
    const toolchain = nodeToolchain();
    const input = { mainSource: '/w/solution.cjs', extraSources: [], includeDirs: [], outputPath: '/w/solution' };
    expect(toolchain.buildCommand(input)).toEqual({ command: process.execPath, args: ['--check', '/w/solution.cjs'] });
    expect(toolchain.runCommand(input)).toEqual({ command: process.execPath, args: ['/w/solution.cjs'] });
    expect(toolchain.isTranslationUnit('helper.cjs')).toBe(false);
  });
});

describe('resolveCompiler', () => {
  it('returns null for a missing compiler', async () => {
    expect(await resolveCompiler('arena-no-such-compiler-xyz')).toBeNull();
  });
});

describe('requireCompiler', () => {
  it('resolves an installed program to its path', async () => {
    expect(await requireCompiler(process.execPath)).toBe(process.execPath);
  });

  it('raises a fatal error for a missing compiler', async () => {
    const attempt = requireCompiler('arena-no-such-compiler-xyz');
    await expect(attempt).rejects.toBeInstanceOf(FatalError);
    await expect(attempt).rejects.toThrow("Compiler 'arena-no-such-compiler-xyz' was not found on PATH");
  });
});
