import type { ProviderConfig } from '@arena/shared';
import type { ProviderAdapter } from './adapter';
import { FakeAdapter } from './fake/adapter';
import { OpenAIAdapter } from './openai/adapter';

/**
 * Builds the adapter named by `provider.type`. The fake provider replays
 * `provider.script` when one is configured and answers EXIT otherwise.
 */
export async function createProviderAdapter(
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ProviderAdapter> {
  switch (config.type) {
    case 'openai':
      return new OpenAIAdapter(config, env);
    case 'fake':
      return config.script ? FakeAdapter.fromFile(config.script) : new FakeAdapter([]);
  }
}
