export const name = '@arena/shared';

export * from './types/events';
export * from './types/problem';
export * from './types/execution';
export * from './types/submission';
export * from './types/session';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/io';
export * from './config/schema';
export * from './summary/summary';
export * from './observability';
export * from './string-utils';
