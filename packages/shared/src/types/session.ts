import type { ExecutionOutcome } from './execution';
import type { SubmissionRecord } from './submission';
import type { QuotaKind } from '../errors';

export type TerminationReason =
  | 'agent_finished'
  | 'submission_quota_exhausted'
  | 'turn_quota_exhausted'
  | 'fatal_error';

export type SessionStatus = 'active' | 'terminated';

/**
 * The closed set of things an agent can do on a turn.
 */
export type AgentAction =
  | { kind: 'execute'; code: string; stdin?: string }
  | { kind: 'submit'; code: string }
  | { kind: 'finish' };

export type AgentActionKind = AgentAction['kind'];

export const AGENT_ACTION_KINDS: readonly AgentActionKind[] = ['execute', 'submit', 'finish'];

/**
 * One turn as supplied by the conversational collaborator: free-form text plus
 * at most one structured action. A turn without an action still counts.
 */
export interface AgentTurn {
  reasoning?: string;
  action?: AgentAction;
}

export type TurnOutcome =
  | { kind: 'execution'; outcome: ExecutionOutcome }
  | { kind: 'submission'; record: SubmissionRecord }
  | { kind: 'quota_exceeded'; quota: QuotaKind; limit: number; used: number; message: string }
  | { kind: 'finished' }
  | { kind: 'none' };

export interface SessionLimits {
  maxTurns: number;
  maxSubmissions: number;
}

export interface SessionState {
  readonly sessionId: string;
  readonly problemId: string;
  readonly status: SessionStatus;
  readonly terminationReason: TerminationReason | null;
  readonly turnCount: number;
  readonly submissionCount: number;
  /** Highest total score of any single submission */
  readonly bestScore: number;
  /** Per-subtask maxima across all submissions, keyed by subtask name */
  readonly bestSubtaskScores: Readonly<Record<string, number>>;
  readonly limits: SessionLimits;
}

export interface TurnResult {
  /** 1-based number of the turn that produced this result */
  readonly turn: number;
  readonly outcome: TurnOutcome;
  readonly state: SessionState;
}

export type ActionCounts = Record<AgentActionKind | 'none', number>;

export interface SessionStatistics {
  readonly sessionId: string;
  readonly problemId: string;
  readonly terminationReason: TerminationReason;
  readonly bestScore: number;
  /** Sum of per-subtask maxima (IOI rule) */
  readonly aggregatedScore: number;
  readonly bestSubtaskScores: Readonly<Record<string, number>>;
  readonly maxScore: number;
  readonly totalSubmissions: number;
  readonly totalTurns: number;
  readonly actionCounts: Readonly<ActionCounts>;
  /** ISO 8601 */
  readonly startedAt: string;
  /** ISO 8601 */
  readonly endedAt: string;
  readonly durationMs: number;
  readonly fatalError?: string;
}
