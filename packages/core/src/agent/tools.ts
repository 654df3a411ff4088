import { z } from 'zod';
import {
  extractCode,
  ToolCallError,
  type AgentAction,
  type ExecutionOutcome,
  type SessionState,
  type SubmissionRecord,
  type ToolCall,
  type ToolSpec,
  type TurnOutcome,
} from '@arena/shared';

export const EXECUTE_TOOL = 'cpp_executor';
export const SUBMIT_TOOL = 'submission';
export const FINISH_TOOL = 'finish';

export const AGENT_TOOLS: readonly ToolSpec[] = [
  {
    name: EXECUTE_TOOL,
    description:
      'Compile and run a C++ program and return its output or any compilation/runtime errors. ' +
      'The code may be a full reply with fenced code blocks; the last block is used. ' +
      'Provide test input through stdin or hardcode it in main.',
    inputSchema: {
      type: 'object',
      properties: {
        cpp_code: { type: 'string', description: 'The C++ program, or text containing it in a fenced block' },
        stdin: { type: 'string', description: 'Standard input for the run' },
      },
      required: ['cpp_code'],
    },
  },
  {
    name: SUBMIT_TOOL,
    description:
      'Submit a C++ solution for evaluation against the hidden tests. ' +
      'You get the points of a subtask only if all of its tests pass. ' +
      'Returns the score of this submission per subtask and the best score per subtask so far.',
    inputSchema: {
      type: 'object',
      properties: {
        cpp_code: { type: 'string', description: 'The C++ solution, or text containing it in a fenced block' },
      },
      required: ['cpp_code'],
    },
  },
  {
    name: FINISH_TOOL,
    description: 'End the session. Call this when you do not want to make more submissions.',
    inputSchema: { type: 'object', properties: {} },
  },
];

const ExecuteArgs = z.object({ cpp_code: z.string(), stdin: z.string().optional() });
const SubmitArgs = z.object({ cpp_code: z.string() });

export type ParsedToolCall = { kind: 'action'; action: AgentAction } | { kind: 'unknown'; name: string };

/** A text reply asking to end the session. */
export const EXIT_PATTERN = /\bEXIT\b/i;

export function requestsExit(text: string | undefined): boolean {
  return text !== undefined && EXIT_PATTERN.test(text);
}

/**
 * Turns a model tool call into an agent action.
 * @throws ToolCallError when the arguments are not valid JSON or miss a field
 */
export function parseToolCall(call: ToolCall): ParsedToolCall {
  if (!AGENT_TOOLS.some((t) => t.name === call.name)) {
    return { kind: 'unknown', name: call.name };
  }

  let raw: unknown;
  try {
    raw = call.arguments.trim() === '' ? {} : JSON.parse(call.arguments);
  } catch {
    throw new ToolCallError(`Could not parse tool call arguments for ${call.name}: ${call.arguments}`);
  }

  switch (call.name) {
    case EXECUTE_TOOL: {
      const args = parseArgs(call.name, ExecuteArgs, raw);
      const code = extractCode(args.cpp_code);
      const action: AgentAction =
        args.stdin === undefined ? { kind: 'execute', code } : { kind: 'execute', code, stdin: args.stdin };
      return { kind: 'action', action };
    }
    case SUBMIT_TOOL: {
      const args = parseArgs(call.name, SubmitArgs, raw);
      return { kind: 'action', action: { kind: 'submit', code: extractCode(args.cpp_code) } };
    }
    default:
      return { kind: 'action', action: { kind: 'finish' } };
  }
}

function parseArgs<T>(tool: string, schema: z.ZodType<T>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ToolCallError(`Invalid arguments for ${tool}: ${issues}`);
  }
  return result.data;
}

export function unknownToolMessage(name: string): string {
  return `Tool '${name}' not found. Available tools: ${AGENT_TOOLS.map((t) => t.name).join(', ')}`;
}

export const IGNORED_CALL_MESSAGE = 'Only one tool call is processed per turn; this call was ignored.';

/** JSON text returned to the model for a processed tool call. */
export function formatToolResult(outcome: TurnOutcome, state: SessionState): string {
  switch (outcome.kind) {
    case 'execution':
      return JSON.stringify(describeExecution(outcome.outcome));
    case 'submission':
      return JSON.stringify(describeSubmission(outcome.record, state));
    case 'quota_exceeded':
      return JSON.stringify({
        total_score: 0,
        subtask_scores: {},
        best_total_score: aggregate(state),
        best_subtask_scores: state.bestSubtaskScores,
        submission_count: state.submissionCount,
        max_submissions: state.limits.maxSubmissions,
        submissions_remaining: 0,
        error: outcome.message,
      });
    case 'finished':
      return JSON.stringify({ finished: true });
    case 'none':
      return JSON.stringify({});
  }
}

function describeExecution(outcome: ExecutionOutcome) {
  return {
    success: outcome.status === 'ok',
    status: outcome.status,
    output: outcome.stdout,
    error:
      outcome.status === 'compile_error' ? `Compilation failed:\n${outcome.stderr}` : outcome.stderr || null,
    exit_code: outcome.exitCode,
    duration_ms: outcome.durationMs,
    peak_memory_bytes: outcome.peakMemoryBytes,
    truncated: outcome.truncated,
  };
}

function describeSubmission(record: SubmissionRecord, state: SessionState) {
  const subtaskScores: Record<string, number> = {};
  for (const subtask of record.subtasks) subtaskScores[subtask.name] = subtask.awarded;
  return {
    total_score: record.totalScore,
    subtask_scores: subtaskScores,
    completed_subtasks: record.subtasks.filter((s) => s.passed).map((s) => s.name),
    ...(record.compileError !== null ? { compile_error: record.compileError } : {}),
    best_total_score: aggregate(state),
    best_subtask_scores: state.bestSubtaskScores,
    submission_count: state.submissionCount,
    max_submissions: state.limits.maxSubmissions,
    submissions_remaining: state.limits.maxSubmissions - state.submissionCount,
  };
}

function aggregate(state: SessionState): number {
  return Object.values(state.bestSubtaskScores).reduce((sum, v) => sum + v, 0);
}
