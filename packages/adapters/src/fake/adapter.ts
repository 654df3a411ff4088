import { readFile } from 'fs-extra';
import { z } from 'zod';
import {
  ConfigError,
  ProviderError,
  toError,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
} from '@arena/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

/**
 * One scripted model reply. `tool` makes it a tool call; `arguments` may be
 * an object (serialized for the call) or raw text, which lets a script feed
 * malformed JSON. `error` makes the call fail instead.
 */
export const FakeReplySchema = z
  .object({
    text: z.string().optional(),
    tool: z.string().min(1).optional(),
    arguments: z.union([z.string(), z.record(z.unknown())]).optional(),
    error: z.string().optional(),
  })
  .strict();

export const FakeScriptSchema = z.array(FakeReplySchema);

export type FakeReply = z.infer<typeof FakeReplySchema>;

export interface FakeAdapterOptions {
  /** Reply once the script runs out. Default: the text `EXIT`. */
  whenExhausted?: FakeReply;
}

/**
 * Replays a fixed list of replies, one per `generate` call. Used for
 * deterministic sessions in tests and by `arena run --script`.
 */
export class FakeAdapter implements ProviderAdapter {
  /** Every request received, in order */
  readonly requests: ModelRequest[] = [];
  private cursor = 0;

  constructor(
    private readonly script: readonly FakeReply[],
    private readonly options: FakeAdapterOptions = {},
  ) {}

  static async fromFile(scriptPath: string, options?: FakeAdapterOptions): Promise<FakeAdapter> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(scriptPath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Cannot read fake provider script ${scriptPath}: ${toError(error).message}`, {
        cause: error,
      });
    }
    const result = FakeScriptSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new ConfigError(`Invalid fake provider script ${scriptPath}:\n${issues}`);
    }
    return new FakeAdapter(result.data, options);
  }

  id(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsToolCalling: true,
      requiresApiKey: false,
    };
  }

  get remaining(): number {
    return Math.max(0, this.script.length - this.cursor);
  }

  async generate(request: ModelRequest, _ctx: AdapterContext): Promise<ModelResponse> {
    this.requests.push(request);
    const index = this.cursor++;
    const reply = this.script[index] ?? this.options.whenExhausted ?? { text: 'EXIT' };

    if (reply.error !== undefined) {
      throw new ProviderError(reply.error);
    }
    if (reply.tool === undefined) {
      return { text: reply.text ?? '' };
    }
    const args = reply.arguments ?? {};
    return {
      text: reply.text,
      toolCalls: [
        {
          name: reply.tool,
          arguments: typeof args === 'string' ? args : JSON.stringify(args),
          id: `fake_call_${index + 1}`,
        },
      ],
    };
  }
}
