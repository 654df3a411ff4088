export const name = '@arena/core';

export { ConfigLoader, USER_CONFIG_PATH, PROJECT_CONFIG_FILE } from './config/loader';
export type { ConfigOptions } from './config/loader';
export { loadProblem, PROBLEM_MANIFEST, DEFAULT_CHECKER } from './corpus/loader';
export type { LoadProblemOptions } from './corpus/loader';
export { ProblemManifestSchema, SubtaskFileSchema } from './corpus/schema';
export type { ProblemManifest, SubtaskFile } from './corpus/schema';
export { SessionStateMachine } from './session/state-machine';
export type { SessionOptions, ExperimentRunner, SubmissionScorer } from './session/state-machine';
export { computeStatistics } from './session/statistics';
export { buildPrompt } from './agent/prompt';
export {
  AGENT_TOOLS,
  EXECUTE_TOOL,
  SUBMIT_TOOL,
  FINISH_TOOL,
  EXIT_PATTERN,
  parseToolCall,
  formatToolResult,
  requestsExit,
} from './agent/tools';
export { runConversation, planTurn } from './agent/conversation';
export type { ConversationOptions, ConversationResult, PlannedTurn } from './agent/conversation';
export { SessionResultWriter, TRACE_FILENAME, SUBMISSIONS_DIRNAME } from './persistence/result-writer';
export { runArenaSession } from './runner';
export type { ArenaSessionOptions, ArenaSessionResult } from './runner';
