import { describe, it, expect } from 'vitest';
import { ArenaConfigSchema, defaultConfig } from './schema';

describe('ArenaConfigSchema', () => {
  it('fills every default from an empty document', () => {
    const config = defaultConfig();

    expect(config.session).toEqual({
      maxTurns: 100,
      maxSubmissions: 50,
      endOnSubmissionQuota: true,
      maxToolCallRetries: 3,
    });
    expect(config.toolchain.flags).toEqual(['-std=c++20', '-O2', '-include', 'bits/stdc++.h']);
    expect(config.experiment).toEqual({ timeLimitMs: 180_000, memoryLimitBytes: 2147483648 });
    expect(config.executor.maxOutputBytes).toBe(67108864);
    expect(config.evaluation).toEqual({ concurrency: 4, shortCircuit: true, checkerTimeLimitMs: 10_000 });
    expect(config.logging).toEqual({ level: 'info', maxMessageLength: 1000 });
    expect(config.results.dir).toBe('.arena/results');
    expect(config.provider.api_key_env).toBe('OPENAI_API_KEY');
  });

  it('keeps defaults for keys a partial section omits', () => {
    const config = ArenaConfigSchema.parse({ session: { maxSubmissions: 5 } });
    expect(config.session.maxSubmissions).toBe(5);
    expect(config.session.maxTurns).toBe(100);
  });

  it('rejects non-positive quotas and unknown providers', () => {
    expect(ArenaConfigSchema.safeParse({ session: { maxTurns: 0 } }).success).toBe(false);
    expect(ArenaConfigSchema.safeParse({ provider: { type: 'other' } }).success).toBe(false);
  });
});
