import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@arena/shared';
import type { AdapterContext } from './types';

/**
 * The conversational model under evaluation. Adapters hide the provider's
 * wire format behind one request/response shape.
 *
 * @example
 * ```typescript
 * class EchoAdapter implements ProviderAdapter {
 *   id() { return 'echo'; }
 *   capabilities() { return { supportsToolCalling: false, requiresApiKey: false }; }
 *   async generate(req) { return { text: req.messages.at(-1)?.content }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /** Unique identifier for this adapter instance */
  id(): string;
  capabilities(): ProviderCapabilities;
  /**
   * Generate the next assistant message.
   * Rejects with a `ProviderError` (or subclass) when the provider fails.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
