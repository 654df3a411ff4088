import {
  FatalError,
  SilentLogger,
  ToolCallError,
  toError,
  truncate,
  type AgentTurn,
  type ChatMessage,
  type Logger,
  type ModelResponse,
  type ProblemSpec,
  type SessionStatistics,
  type ToolCall,
  type TurnResult,
} from '@arena/shared';
import type { AdapterContext, ProviderAdapter } from '@arena/adapters';
import type { SessionStateMachine } from '../session/state-machine';
import { buildPrompt } from './prompt';
import {
  AGENT_TOOLS,
  formatToolResult,
  IGNORED_CALL_MESSAGE,
  parseToolCall,
  requestsExit,
  unknownToolMessage,
} from './tools';

export interface ConversationOptions {
  session: SessionStateMachine;
  problem: Pick<ProblemSpec, 'statement'>;
  adapter: ProviderAdapter;
  /** Malformed tool calls discarded in a row before the session is failed */
  maxToolCallRetries: number;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  logger?: Logger;
  abortSignal?: AbortSignal;
}

export interface ConversationResult {
  statistics: SessionStatistics;
  messages: ChatMessage[];
}

export interface PlannedTurn {
  turn: AgentTurn;
  /** The tool call this turn answers, if any */
  call?: ToolCall;
  /** Set when the call names a tool that does not exist */
  unknownTool?: string;
  ignoredCalls: ToolCall[];
}

/**
 * Drives a session with a conversational model until the session
 * terminates. Each model reply is one turn; only its first tool call is
 * acted on.
 */
export async function runConversation(options: ConversationOptions): Promise<ConversationResult> {
  const { session, adapter } = options;
  const logger = options.logger ?? new SilentLogger();
  const ctx: AdapterContext = {
    runId: session.sessionId,
    logger,
    abortSignal: options.abortSignal,
    timeoutMs: options.timeoutMs,
  };
  const messages: ChatMessage[] = [
    { role: 'user', content: await buildPrompt(options.problem, session.snapshot().limits) },
  ];
  session.start();
  let malformed = 0;

  while (!session.isTerminated) {
    let response: ModelResponse;
    try {
      response = await adapter.generate(
        {
          messages,
          tools: [...AGENT_TOOLS],
          toolChoice: 'auto',
          maxTokens: options.maxTokens,
          temperature: options.temperature,
        },
        ctx,
      );
    } catch (error) {
      logger.error(toError(error), 'Model provider failed');
      session.abort(error);
      break;
    }

    let planned: PlannedTurn;
    try {
      planned = planTurn(response);
    } catch (error) {
      if (!(error instanceof ToolCallError)) throw error;
      malformed += 1;
      if (malformed > options.maxToolCallRetries) {
        session.abort(new FatalError(`Gave up after ${malformed} malformed tool calls in a row: ${error.message}`));
        break;
      }
      logger.warn(
        `Discarding reply with a malformed tool call (${malformed}/${options.maxToolCallRetries}): ${error.message}`,
      );
      continue;
    }
    malformed = 0;

    messages.push({
      role: 'assistant',
      content: response.text ?? '',
      ...(response.toolCalls && response.toolCalls.length > 0 ? { toolCalls: response.toolCalls } : {}),
    });
    if (response.text) {
      logger.debug(`Model: ${truncate(response.text, 500)}`);
    }

    let result: TurnResult;
    try {
      result = await session.dispatch(planned.turn);
    } catch (error) {
      if (error instanceof FatalError && session.isTerminated) {
        logger.error(error, 'Session ended by a fatal error');
        break;
      }
      throw error;
    }

    if (planned.call) {
      const content =
        planned.unknownTool !== undefined
          ? unknownToolMessage(planned.unknownTool)
          : formatToolResult(result.outcome, result.state);
      messages.push({ role: 'tool', content, toolCallId: planned.call.id });
    }
    for (const ignored of planned.ignoredCalls) {
      messages.push({ role: 'tool', content: IGNORED_CALL_MESSAGE, toolCallId: ignored.id });
    }
  }

  return { statistics: session.statistics(), messages };
}

/**
 * Maps a model reply onto a turn. A text reply saying EXIT finishes the
 * session; an unknown tool still uses up the turn.
 */
export function planTurn(response: ModelResponse): PlannedTurn {
  const reasoning = response.text;
  const [call, ...ignoredCalls] = response.toolCalls ?? [];

  if (call === undefined) {
    return requestsExit(reasoning)
      ? { turn: { reasoning, action: { kind: 'finish' } }, ignoredCalls: [] }
      : { turn: { reasoning }, ignoredCalls: [] };
  }

  const parsed = parseToolCall(call);
  if (parsed.kind === 'unknown') {
    return { turn: { reasoning }, call, unknownTool: parsed.name, ignoredCalls };
  }
  return { turn: { reasoning, action: parsed.action }, call, ignoredCalls };
}
