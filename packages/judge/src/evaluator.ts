import path from 'path';
import { emptyDir, readFile } from 'fs-extra';
import { hash } from 'ohash';
import {
  createEvent,
  problemLimits,
  QuotaExceededError,
  SilentLogger,
  toError,
  type ArenaConfig,
  type EventWriter,
  type Logger,
  type ProblemSpec,
  type SessionState,
  type SubmissionRecord,
  type TestCase,
  type TestVerdict,
} from '@arena/shared';
import { withWorkspace, type CompiledProgram, type ResourceBoundedExecutor } from '@arena/exec';
import { BrokenChecker, ExactOutputChecker, ProgramChecker, type Checker } from './checker';
import { runPool } from './pool';
import { failedBreakdown, score, settlesSubtask } from './scorer';
import { runTestCase, skippedVerdict } from './test-runner';

export interface EvaluatorOptions {
  executor: ResourceBoundedExecutor;
  /** Test runs in flight at once */
  concurrency: number;
  /** Skip the rest of a subtask once one of its tests settles its award at zero */
  shortCircuit: boolean;
  checkerTimeLimitMs: number;
  logger?: Logger;
  events?: EventWriter;
}

/** The slice of session state the evaluator reads; it never writes it. */
export type EvaluationSession = Pick<SessionState, 'sessionId' | 'submissionCount' | 'limits'>;

interface ScheduledTest {
  testCase: TestCase;
  subtaskIndex: number;
}

/**
 * Compiles a submission once, runs it against every test of the problem and
 * scores the result. Returns the record; appending it to the session is the
 * caller's job.
 */
export class SubmissionEvaluator {
  private readonly logger: Logger;

  constructor(
    private readonly problem: ProblemSpec,
    private readonly options: EvaluatorOptions,
  ) {
    this.logger = options.logger ?? new SilentLogger();
  }

  static fromConfig(
    problem: ProblemSpec,
    config: ArenaConfig,
    executor: ResourceBoundedExecutor,
    logger?: Logger,
    events?: EventWriter,
  ): SubmissionEvaluator {
    return new SubmissionEvaluator(problem, {
      executor,
      concurrency: config.evaluation.concurrency,
      shortCircuit: config.evaluation.shortCircuit,
      checkerTimeLimitMs: config.evaluation.checkerTimeLimitMs,
      logger,
      events,
    });
  }

  async evaluate(session: EvaluationSession, sourceCode: string): Promise<SubmissionRecord> {
    const { maxSubmissions } = session.limits;
    if (session.submissionCount >= maxSubmissions) {
      throw new QuotaExceededError('submissions', maxSubmissions, session.submissionCount);
    }

    const sequence = session.submissionCount + 1;
    const started = Date.now();
    const timestamp = new Date(started).toISOString();
    const sourceHash = hash(sourceCode);
    const { executor } = this.options;
    this.logger.info(`Evaluating submission #${sequence}`);

    return withWorkspace(async (workDir) => {
      const solutionDir = path.join(workDir, 'solution');
      await emptyDir(solutionDir);
      const compiled = await executor.compile(
        { code: sourceCode, supportFiles: this.problem.graderSources },
        solutionDir,
      );

      if (!compiled.ok) {
        const breakdown = failedBreakdown(this.problem);
        this.logger.info(`Submission #${sequence} did not compile`);
        return freezeRecord({
          sequence,
          source: sourceCode,
          sourceHash,
          subtasks: breakdown.subtasks,
          totalScore: 0,
          maxScore: this.problem.maxScore,
          compileError: compiled.outcome.stderr,
          verdicts: [],
          timestamp,
          durationMs: Date.now() - started,
        });
      }

      const checker = await this.buildChecker(path.join(workDir, 'checker'));
      const verdicts = await this.runAll(session.sessionId, compiled.program, checker);
      const breakdown = score(this.problem, verdicts);
      this.logger.info(`Submission #${sequence} scored ${breakdown.totalScore}/${this.problem.maxScore}`);

      return freezeRecord({
        sequence,
        source: sourceCode,
        sourceHash,
        subtasks: breakdown.subtasks,
        totalScore: breakdown.totalScore,
        maxScore: this.problem.maxScore,
        compileError: null,
        verdicts,
        timestamp,
        durationMs: Date.now() - started,
      });
    }, 'arena-submit-');
  }

  private schedule(): ScheduledTest[] {
    const scheduled: ScheduledTest[] = [];
    for (const subtask of this.problem.subtasks) {
      for (const id of subtask.testCaseIds) {
        scheduled.push({ testCase: this.problem.testCases[id], subtaskIndex: subtask.index });
      }
    }
    return scheduled;
  }

  private async runAll(sessionId: string, program: CompiledProgram, checker: Checker): Promise<TestVerdict[]> {
    const settledSubtasks = new Set<number>();
    const limits = problemLimits(this.problem);
    const context = {
      executor: this.options.executor,
      program,
      limits,
      checker,
      onCheckerFault: (testCaseId: string, reason: string) => {
        this.logger.warn(`Checker fault on test ${testCaseId}: ${reason}`);
        this.options.events?.write(createEvent(sessionId, { type: 'CheckerFaulted', payload: { testCaseId, reason } }));
      },
    };

    return runPool(this.schedule(), this.options.concurrency, async ({ testCase, subtaskIndex }) => {
      if (this.options.shortCircuit && settledSubtasks.has(subtaskIndex)) {
        return skippedVerdict(testCase.id);
      }
      const verdict = await runTestCase(context, testCase);
      if (settlesSubtask(this.problem.scoring, verdict)) settledSubtasks.add(subtaskIndex);
      return verdict;
    });
  }

  private async buildChecker(checkerDir: string): Promise<Checker> {
    const checkerPath = this.problem.checker;
    if (checkerPath === undefined) {
      return new ExactOutputChecker();
    }

    await emptyDir(checkerDir);
    let code: string;
    try {
      code = await readFile(checkerPath, 'utf8');
    } catch (error) {
      return new BrokenChecker(`Cannot read checker source: ${toError(error).message}`);
    }

    const compiled = await this.options.executor.compile(
      { code, includeDirs: [path.dirname(checkerPath)] },
      checkerDir,
    );
    if (!compiled.ok) {
      this.logger.warn(`Checker failed to compile: ${compiled.outcome.stderr}`);
      return new BrokenChecker('Checker failed to compile');
    }
    return new ProgramChecker(this.options.executor, compiled.program, {
      timeLimitMs: this.options.checkerTimeLimitMs,
      memoryLimitBytes: this.problem.memoryLimitBytes,
    });
  }
}

function freezeRecord(record: SubmissionRecord): SubmissionRecord {
  return Object.freeze({ ...record, verdicts: Object.freeze([...record.verdicts]) });
}
