import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import {
  ConfigError,
  ProviderError,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
  type ToolCall,
  type ToolSpec,
} from '@arena/shared';
import type { ProviderAdapter } from '../adapter';
import { BaseProviderAdapter, type ErrorTypeConfig } from '../base-adapter';
import type { AdapterContext } from '../types';

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private readonly client: OpenAI;
  private readonly model: string;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIError => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  constructor(
    private readonly config: Pick<ProviderConfig, 'model' | 'api_key' | 'api_key_env' | 'baseUrl' | 'timeoutMs'>,
    env: NodeJS.ProcessEnv = process.env,
  ) {
    super();
    const apiKey = config.api_key || env[config.api_key_env];
    if (!apiKey) {
      throw new ConfigError(
        `Missing API key for OpenAI provider. Checked provider.api_key and env var ${config.api_key_env}`,
      );
    }
    this.model = config.model;
    this.client = new OpenAI({ apiKey, baseURL: config.baseUrl });
  }

  id(): string {
    return 'openai';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsToolCalling: true,
      requiresApiKey: true,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    try {
      const tools = this.mapTools(req.tools);
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: this.mapMessages(req.messages),
          tools: tools.length > 0 ? tools : undefined,
          tool_choice: tools.length > 0 ? req.toolChoice : undefined,
          max_tokens: req.maxTokens,
          temperature: req.temperature,
        },
        {
          signal: ctx.abortSignal,
          timeout: ctx.timeoutMs ?? this.config.timeoutMs,
          maxRetries: ctx.retryOptions?.maxRetries,
        },
      );

      const choice = completion.choices[0];
      if (!choice) {
        throw new ProviderError('OpenAI returned no choices');
      }
      const usage = completion.usage
        ? {
            inputTokens: completion.usage.prompt_tokens,
            outputTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : undefined;

      const toolCalls: ToolCall[] = (choice.message.tool_calls ?? [])
        .filter((tc) => tc.type === 'function')
        .map((tc) => ({ name: tc.function.name, arguments: tc.function.arguments, id: tc.id }));

      return {
        text: choice.message.content ?? undefined,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
        usage,
        raw: completion,
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private mapMessages(messages: ChatMessage[]): OpenAIMessage[] {
    return messages.map((m): OpenAIMessage => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
        case 'tool':
          if (!m.toolCallId) {
            throw new ProviderError('Tool result message is missing its tool call id');
          }
          return { role: 'tool', content: m.content, tool_call_id: m.toolCallId };
        case 'assistant':
          if (m.toolCalls && m.toolCalls.length > 0) {
            return {
              role: 'assistant',
              content: m.content || null,
              tool_calls: m.toolCalls.map((tc, i) => ({
                id: tc.id ?? `call_${i}`,
                type: 'function',
                function: { name: tc.name, arguments: tc.arguments },
              })),
            };
          }
          return { role: 'assistant', content: m.content };
      }
    });
  }

  private mapTools(tools?: ToolSpec[]): OpenAI.Chat.ChatCompletionTool[] {
    if (!tools) return [];
    return tools.map((t) => ({
      type: 'function',
      function: {
        name: t.name,
        description: t.description,
        parameters: t.inputSchema,
      },
    }));
  }
}
