import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import rfdc from 'rfdc';
import {
  AGENT_ACTION_KINDS,
  createEvent,
  FatalError,
  QuotaExceededError,
  SessionTerminatedError,
  SilentLogger,
  toError,
  type ActionCounts,
  type AgentAction,
  type AgentTurn,
  type ArenaEventBody,
  type EventWriter,
  type ExecutionOutcome,
  type Logger,
  type ProblemSpec,
  type ResourceLimits,
  type SessionLimits,
  type SessionState,
  type SessionStatistics,
  type SessionStatus,
  type SubmissionRecord,
  type TerminationReason,
  type TurnOutcome,
  type TurnResult,
} from '@arena/shared';
import type { EvaluationSession } from '@arena/judge';
import { computeStatistics } from './statistics';

const clone = rfdc();

/** Runs experimental code; `ResourceBoundedExecutor` satisfies it. */
export interface ExperimentRunner {
  execute(sourceCode: string, stdin: string, limits: ResourceLimits): Promise<ExecutionOutcome>;
}

/** Scores submissions; `SubmissionEvaluator` satisfies it. */
export interface SubmissionScorer {
  evaluate(session: EvaluationSession, sourceCode: string): Promise<SubmissionRecord>;
}

export interface SessionOptions {
  problem: ProblemSpec;
  executor: ExperimentRunner;
  evaluator: SubmissionScorer;
  limits: SessionLimits;
  /** Limits for `execute` actions */
  experimentLimits: ResourceLimits;
  /** Terminate as soon as the last allowed submission is recorded */
  endOnSubmissionQuota: boolean;
  sessionId?: string;
  logger?: Logger;
  events?: EventWriter;
  now?: () => Date;
}

interface RoutedAction {
  outcome: TurnOutcome;
  terminate?: TerminationReason;
}

/**
 * Owns every counter of one evaluation session and routes agent turns to the
 * executor or the evaluator. Turns are strictly sequential.
 *
 * Every arena event is also emitted on this object under its `type`.
 */
export class SessionStateMachine extends EventEmitter {
  readonly sessionId: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly startedAt: Date;

  private status: SessionStatus = 'active';
  private terminationReason: TerminationReason | null = null;
  private turnCount = 0;
  private submissionCount = 0;
  private bestScore = 0;
  private readonly bestSubtaskScores: Record<string, number> = {};
  private readonly submissionLog: SubmissionRecord[] = [];
  private readonly actionCounts: ActionCounts = { execute: 0, submit: 0, finish: 0, none: 0 };
  private finalStatistics: SessionStatistics | null = null;
  private started = false;
  private busy = false;

  constructor(private readonly options: SessionOptions) {
    super();
    this.sessionId = options.sessionId ?? randomUUID();
    this.logger = (options.logger ?? new SilentLogger()).child({ sessionId: this.sessionId });
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
    for (const subtask of options.problem.subtasks) {
      this.bestSubtaskScores[subtask.name] = 0;
    }
  }

  /** Announces the session; called implicitly by the first dispatch. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.record({
      type: 'SessionStarted',
      payload: {
        problemId: this.options.problem.id,
        maxTurns: this.options.limits.maxTurns,
        maxSubmissions: this.options.limits.maxSubmissions,
      },
    });
  }

  get isTerminated(): boolean {
    return this.status === 'terminated';
  }

  /**
   * Processes one agent turn. Every call consumes a turn, including turns
   * without an action and turns that fail.
   *
   * @throws SessionTerminatedError if the session already ended
   * @throws FatalError after terminating the session with `fatal_error`
   */
  async dispatch(turn: AgentTurn): Promise<TurnResult> {
    if (this.status === 'terminated') {
      throw new SessionTerminatedError(this.terminationReason ?? 'unknown');
    }
    if (this.busy) {
      throw new FatalError('A turn is already in progress');
    }
    this.start();
    this.busy = true;
    const turnNumber = this.turnCount + 1;
    const kind = turn.action?.kind ?? 'none';
    // Turns may come from untyped sources (parsed tool calls, scripts).
    const recognized = kind === 'none' || AGENT_ACTION_KINDS.includes(kind);

    try {
      this.record({ type: 'TurnStarted', payload: { turn: turnNumber } });
      if (recognized) {
        this.record({ type: 'ActionDispatched', payload: { turn: turnNumber, action: kind } });
      }

      let routed: RoutedAction;
      try {
        if (!recognized) {
          throw new FatalError(`Unknown action: ${JSON.stringify(turn.action)}`);
        }
        routed = await this.route(turnNumber, turn.action);
      } catch (error) {
        const fatal =
          error instanceof FatalError ? error : new FatalError(toError(error).message, { cause: error });
        this.countTurn(recognized ? kind : null);
        this.terminate('fatal_error', fatal.message);
        throw fatal;
      }

      this.countTurn(kind);
      if (routed.terminate) {
        this.terminate(routed.terminate);
      } else if (this.turnCount >= this.options.limits.maxTurns) {
        this.terminate('turn_quota_exhausted');
      }
      return Object.freeze({ turn: turnNumber, outcome: routed.outcome, state: this.snapshot() });
    } finally {
      this.busy = false;
    }
  }

  /**
   * Ends an active session with `fatal_error`, e.g. when the model provider
   * fails. Returns the final statistics either way.
   */
  abort(error: unknown): SessionStatistics {
    if (this.status === 'active') {
      this.start();
      this.terminate('fatal_error', toError(error).message);
    }
    return this.statistics();
  }

  /** Read-only copy of the current state. */
  snapshot(): SessionState {
    return Object.freeze(
      clone({
        sessionId: this.sessionId,
        problemId: this.options.problem.id,
        status: this.status,
        terminationReason: this.terminationReason,
        turnCount: this.turnCount,
        submissionCount: this.submissionCount,
        bestScore: this.bestScore,
        bestSubtaskScores: this.bestSubtaskScores,
        limits: this.options.limits,
      }),
    );
  }

  /** The append-only submission log. */
  submissions(): readonly SubmissionRecord[] {
    return Object.freeze([...this.submissionLog]);
  }

  /**
   * Final statistics, computed once at termination.
   * @throws FatalError while the session is still active
   */
  statistics(): SessionStatistics {
    if (!this.finalStatistics) {
      throw new FatalError('Statistics are only available once the session has terminated');
    }
    return this.finalStatistics;
  }

  private async route(turnNumber: number, action: AgentAction | undefined): Promise<RoutedAction> {
    if (action === undefined) {
      return { outcome: { kind: 'none' } };
    }
    switch (action.kind) {
      case 'execute':
        return this.runExperiment(turnNumber, action.code, action.stdin ?? '');
      case 'submit':
        return this.submit(action.code);
      case 'finish':
        return { outcome: { kind: 'finished' }, terminate: 'agent_finished' };
    }
  }

  private async runExperiment(turnNumber: number, code: string, stdin: string): Promise<RoutedAction> {
    const outcome = await this.options.executor.execute(code, stdin, this.options.experimentLimits);
    this.record({
      type: 'ExecutionCompleted',
      payload: {
        turn: turnNumber,
        status: outcome.status,
        exitCode: outcome.exitCode,
        durationMs: outcome.durationMs,
        peakMemoryBytes: outcome.peakMemoryBytes,
      },
    });
    return { outcome: { kind: 'execution', outcome } };
  }

  private async submit(code: string): Promise<RoutedAction> {
    const { maxSubmissions } = this.options.limits;
    let record: SubmissionRecord;
    try {
      record = await this.options.evaluator.evaluate(
        { sessionId: this.sessionId, submissionCount: this.submissionCount, limits: this.options.limits },
        code,
      );
    } catch (error) {
      if (!(error instanceof QuotaExceededError)) throw error;
      this.logger.warn(error.message);
      this.record({ type: 'SubmissionRejected', payload: { limit: error.limit, used: error.used } });
      return {
        outcome: {
          kind: 'quota_exceeded',
          quota: error.quota,
          limit: error.limit,
          used: error.used,
          message: error.message,
        },
        terminate: 'submission_quota_exhausted',
      };
    }

    this.submissionLog.push(record);
    this.submissionCount += 1;
    this.bestScore = Math.max(this.bestScore, record.totalScore);
    const subtaskScores: Record<string, number> = {};
    for (const subtask of record.subtasks) {
      subtaskScores[subtask.name] = subtask.awarded;
      this.bestSubtaskScores[subtask.name] = Math.max(this.bestSubtaskScores[subtask.name] ?? 0, subtask.awarded);
    }
    this.record({
      type: 'SubmissionEvaluated',
      payload: {
        sequence: record.sequence,
        totalScore: record.totalScore,
        bestScore: this.bestScore,
        subtaskScores,
        compileError: record.compileError !== null,
        submissionsRemaining: maxSubmissions - this.submissionCount,
      },
    });

    const exhausted = this.submissionCount >= maxSubmissions && this.options.endOnSubmissionQuota;
    return {
      outcome: { kind: 'submission', record },
      terminate: exhausted ? 'submission_quota_exhausted' : undefined,
    };
  }

  private countTurn(kind: keyof ActionCounts | null): void {
    this.turnCount += 1;
    if (kind !== null) this.actionCounts[kind] += 1;
  }

  private terminate(reason: TerminationReason, fatalError?: string): void {
    if (this.status === 'terminated') return;
    this.status = 'terminated';
    this.terminationReason = reason;
    this.finalStatistics = computeStatistics({
      sessionId: this.sessionId,
      problemId: this.options.problem.id,
      terminationReason: reason,
      bestScore: this.bestScore,
      bestSubtaskScores: this.bestSubtaskScores,
      maxScore: this.options.problem.maxScore,
      totalSubmissions: this.submissionCount,
      totalTurns: this.turnCount,
      actionCounts: this.actionCounts,
      startedAt: this.startedAt,
      endedAt: this.now(),
      fatalError,
    });
    if (fatalError !== undefined) {
      this.logger.error(new FatalError(fatalError), 'Session failed');
    }
    this.logger.info(`Session terminated (${reason}) after ${this.turnCount} turns, best score ${this.bestScore}`);
    this.record({ type: 'SessionTerminated', payload: { reason, statistics: this.finalStatistics } });
  }

  private record(body: ArenaEventBody): void {
    const event = createEvent(this.sessionId, body);
    this.options.events?.write(event);
    this.emit(event.type, event);
  }
}
