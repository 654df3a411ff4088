import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  CorpusValidationError,
  QuotaExceededError,
  SessionTerminatedError,
  FatalError,
  ProviderError,
  ToolCallError,
  toError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProviderError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('FatalError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('ConfigError', () => {
  it('should create a ConfigError with correct code', () => {
    const error = new ConfigError('Invalid config');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Invalid config');
    expect(error.name).toBe('ConfigError');
  });
});

describe('UsageError', () => {
  it('should create a UsageError with correct code', () => {
    const error = new UsageError('Invalid usage');
    expect(error.code).toBe('UsageError');
  });
});

describe('CorpusValidationError', () => {
  it('lists every issue under the message', () => {
    const error = new CorpusValidationError('Invalid corpus', ['a is orphaned', 'b is duplicated']);
    expect(error.code).toBe('CorpusError');
    expect(error.issues).toEqual(['a is orphaned', 'b is duplicated']);
    expect(error.message).toBe('Invalid corpus\n- a is orphaned\n- b is duplicated');
  });

  it('keeps the bare message when there are no issues', () => {
    expect(new CorpusValidationError('Missing problem.json').message).toBe('Missing problem.json');
  });
});

describe('QuotaExceededError', () => {
  it('records quota, limit and usage', () => {
    const error = new QuotaExceededError('submissions', 50, 50);
    expect(error.code).toBe('QuotaExceeded');
    expect(error.message).toBe('Maximum submissions (50) exceeded.');
    expect(error.quota).toBe('submissions');
    expect(error.limit).toBe(50);
    expect(error.used).toBe(50);
    expect(error.details).toEqual({ quota: 'submissions', limit: 50, used: 50 });
  });
});

describe('SessionTerminatedError', () => {
  it('carries the termination reason', () => {
    const error = new SessionTerminatedError('agent_finished');
    expect(error.code).toBe('SessionTerminated');
    expect(error.reason).toBe('agent_finished');
    expect(error.message).toBe('Session already terminated (agent_finished)');
  });
});

describe('remaining error classes', () => {
  it('assign their codes', () => {
    expect(new FatalError('x').code).toBe('FatalError');
    expect(new ProviderError('x').code).toBe('ProviderError');
    expect(new ToolCallError('x').code).toBe('ToolCallError');
  });
});

describe('toError', () => {
  it('wraps non-errors', () => {
    const original = new Error('boom');
    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});
