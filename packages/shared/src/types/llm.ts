/**
 * A message in a conversation with the model under evaluation.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  /** Tool calls made by the assistant in this message */
  toolCalls?: ToolCall[];
  /** ID of the tool call this message answers (tool role) */
  toolCallId?: string;
}

/**
 * A tool the model may call, with a JSON Schema for its arguments.
 *
 * @example
 * ```typescript
 * const finish: ToolSpec = {
 *   name: 'finish',
 *   description: 'End the session',
 *   inputSchema: { type: 'object', properties: {} },
 * };
 * ```
 */
export interface ToolSpec {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCall {
  name: string;
  /** Raw JSON text of the arguments as produced by the model */
  arguments: string;
  id?: string;
}

export interface ModelRequest {
  messages: ChatMessage[];
  tools?: ToolSpec[];
  toolChoice?: 'auto' | 'none' | 'required';
  maxTokens?: number;
  temperature?: number;
}

export interface Usage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface ModelResponse {
  text?: string;
  toolCalls?: ToolCall[];
  usage?: Usage;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Describes what a provider adapter can do.
 */
export interface ProviderCapabilities {
  supportsToolCalling: boolean;
  /** Whether an API key must be configured before use */
  requiresApiKey: boolean;
  maxContextTokens?: number;
}
