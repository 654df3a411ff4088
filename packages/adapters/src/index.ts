export const name = '@arena/adapters';

export * from './types';
export * from './adapter';
export * from './errors';
export * from './base-adapter';
export { OpenAIAdapter } from './openai/adapter';
export { FakeAdapter, FakeReplySchema, FakeScriptSchema } from './fake/adapter';
export type { FakeReply, FakeAdapterOptions } from './fake/adapter';
export { createProviderAdapter } from './factory';
