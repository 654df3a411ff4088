import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { runCli } from './program';

const SUM_PROBLEM = fileURLToPath(new URL('../../core/src/__fixtures__/problems/sum', import.meta.url));

describe('runCli', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let tmp = '';

  const jsonOutput = (): unknown => JSON.parse(logSpy.mock.calls.map((c) => String(c[0])).join('\n'));
  const arena = (...args: string[]) => runCli(['node', 'arena', ...args]);

  beforeEach(async () => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    tmp = await mkdtemp(path.join(os.tmpdir(), 'arena-cli-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmp, { recursive: true, force: true });
  });

  describe('validate', () => {
    it('summarizes a valid problem', async () => {
      const code = await arena('--json', 'validate', SUM_PROBLEM);

      expect(code).toBe(0);
      expect(jsonOutput()).toEqual([
        {
          dir: SUM_PROBLEM,
          valid: true,
          id: 'sum',
          subtasks: 2,
          tests: 4,
          maxScore: 100,
          scoring: 'all_or_nothing',
          checker: null,
          graders: 0,
        },
      ]);
    });

    it('fails for a missing directory', async () => {
      const missing = path.join(tmp, 'nope');
      const code = await arena('--json', 'validate', missing);

      expect(code).toBe(1);
      expect(jsonOutput()).toEqual([
        { dir: missing, valid: false, issues: [`Problem directory not found: ${missing}`] },
      ]);
    });
  });

  describe('run', () => {
    // Sessions that never compile only need the configured compiler to exist.
    const toolchainConfig = async (compiler: string) => {
      const config = path.join(tmp, 'arena.yaml');
      await writeFile(config, `toolchain:\n  compiler: ${JSON.stringify(compiler)}\n`);
      return config;
    };

    it('runs a session with the fake provider', async () => {
      const code = await arena(
        '--json',
        '--config',
        await toolchainConfig(process.execPath),
        'run',
        SUM_PROBLEM,
        '--provider',
        'fake',
        '--results-dir',
        tmp,
        '--session-id',
        'cli-1',
      );

      expect(code).toBe(0);
      expect(jsonOutput()).toMatchObject({
        statistics: { sessionId: 'cli-1', problemId: 'sum', terminationReason: 'agent_finished', totalTurns: 1 },
        submissions: [],
        summaryPath: path.join(tmp, 'sum', 'cli-1', 'summary.json'),
      });
    });

    it('replays a script', async () => {
      const script = path.join(tmp, 'script.json');
      await writeFile(script, JSON.stringify([{ text: 'Thinking.' }, { tool: 'finish' }]));

      const config = await toolchainConfig(process.execPath);
      const code = await arena('--json', '--config', config, 'run', SUM_PROBLEM, '--script', script, '--results-dir', tmp);

      expect(code).toBe(0);
      expect(jsonOutput()).toMatchObject({
        statistics: { totalTurns: 2, actionCounts: { execute: 0, submit: 0, finish: 1, none: 1 } },
      });
    });

    it('fails before the session starts when the compiler is missing', async () => {
      const config = await toolchainConfig('arena-no-such-compiler-xyz');
      const code = await arena('--json', '--config', config, 'run', SUM_PROBLEM, '--provider', 'fake', '--results-dir', tmp);

      expect(code).toBe(1);
      expect(await readdir(tmp)).toEqual(['arena.yaml']);
    });
  });

  describe('exit codes', () => {
    it('returns 2 for invalid configuration', async () => {
      const config = path.join(tmp, 'arena.yaml');
      await writeFile(config, 'session:\n  maxTurns: -1\n');

      const code = await arena('--json', '--config', config, 'validate', SUM_PROBLEM);

      expect(code).toBe(2);
      expect(jsonOutput()).toMatchObject({ error: { code: 'ConfigError' } });
    });

    it('returns 2 for conflicting provider flags', async () => {
      const code = await arena('--json', 'run', SUM_PROBLEM, '--provider', 'openai', '--script', 'replies.json');

      expect(code).toBe(2);
      expect(jsonOutput()).toMatchObject({ error: { code: 'UsageError' } });
    });

    it('returns 2 for a bad option value', async () => {
      expect(await arena('run', SUM_PROBLEM, '--max-turns', 'many')).toBe(2);
    });

    it('returns 2 for an unknown command', async () => {
      expect(await arena('serve')).toBe(2);
    });
  });
});
