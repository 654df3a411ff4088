import type { ExecutionStatus } from './execution';
import type { AgentActionKind, TerminationReason, SessionStatistics } from './session';

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Base interface for all arena events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Session identifier */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once when a session is created.
 */
export interface SessionStarted extends BaseEvent {
  type: 'SessionStarted';
  payload: {
    problemId: string;
    maxTurns: number;
    maxSubmissions: number;
  };
}

/** Emitted before an agent turn is processed */
export interface TurnStarted extends BaseEvent {
  type: 'TurnStarted';
  payload: {
    turn: number;
  };
}

/** Emitted when a turn's action is routed */
export interface ActionDispatched extends BaseEvent {
  type: 'ActionDispatched';
  payload: {
    turn: number;
    action: AgentActionKind | 'none';
  };
}

/** Emitted after an experimental run */
export interface ExecutionCompleted extends BaseEvent {
  type: 'ExecutionCompleted';
  payload: {
    turn: number;
    status: ExecutionStatus;
    exitCode: number | null;
    durationMs: number;
    peakMemoryBytes: number | null;
  };
}

/** Emitted after a submission has been scored and recorded */
export interface SubmissionEvaluated extends BaseEvent {
  type: 'SubmissionEvaluated';
  payload: {
    sequence: number;
    totalScore: number;
    bestScore: number;
    subtaskScores: Record<string, number>;
    compileError: boolean;
    submissionsRemaining: number;
  };
}

/** Emitted when a submit action hits the quota */
export interface SubmissionRejected extends BaseEvent {
  type: 'SubmissionRejected';
  payload: {
    limit: number;
    used: number;
  };
}

/** Emitted when a custom checker fails on a test */
export interface CheckerFaulted extends BaseEvent {
  type: 'CheckerFaulted';
  payload: {
    testCaseId: string;
    reason: string;
  };
}

/** Emitted exactly once, when the session enters its terminal state */
export interface SessionTerminated extends BaseEvent {
  type: 'SessionTerminated';
  payload: {
    reason: TerminationReason;
    statistics: SessionStatistics;
  };
}

export type ArenaEvent =
  | SessionStarted
  | TurnStarted
  | ActionDispatched
  | ExecutionCompleted
  | SubmissionEvaluated
  | SubmissionRejected
  | CheckerFaulted
  | SessionTerminated;

export type ArenaEventType = ArenaEvent['type'];

/**
 * Sink for structured events (trace files, test spies).
 */
export interface EventWriter {
  write(event: ArenaEvent): void;
  close(): Promise<void>;
}

type EnvelopeKey = 'schemaVersion' | 'timestamp' | 'runId';

/** An event without its envelope fields: `{ type, payload }`. */
export type ArenaEventBody = ArenaEvent extends infer E
  ? E extends ArenaEvent
    ? Omit<E, EnvelopeKey>
    : never
  : never;

export function createEvent(runId: string, body: ArenaEventBody): ArenaEvent {
  return {
    ...body,
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
