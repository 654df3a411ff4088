import { randomUUID } from 'crypto';
import {
  SilentLogger,
  type ArenaConfig,
  type Logger,
  type SessionStatistics,
  type SubmissionRecord,
} from '@arena/shared';
import { ResourceBoundedExecutor } from '@arena/exec';
import { SubmissionEvaluator } from '@arena/judge';
import { createProviderAdapter, type ProviderAdapter } from '@arena/adapters';
import { runConversation } from './agent/conversation';
import { loadProblem } from './corpus/loader';
import { SessionResultWriter } from './persistence/result-writer';
import { SessionStateMachine } from './session/state-machine';

export interface ArenaSessionOptions {
  config: ArenaConfig;
  problemDir: string;
  logger?: Logger;
  /** Overrides the adapter built from `config.provider` */
  adapter?: ProviderAdapter;
  /** Overrides the executor built from `config.toolchain` */
  executor?: ResourceBoundedExecutor;
  sessionId?: string;
  env?: NodeJS.ProcessEnv;
  abortSignal?: AbortSignal;
  /** Called once the session exists, before the first turn */
  onSession?: (session: SessionStateMachine) => void;
}

export interface ArenaSessionResult {
  statistics: SessionStatistics;
  submissions: readonly SubmissionRecord[];
  sessionDir: string;
  summaryPath: string;
  tracePath: string;
}

/**
 * Runs one complete session of a model against a problem and writes its
 * results: the trace as it happens, then every submission and the summary.
 */
export async function runArenaSession(options: ArenaSessionOptions): Promise<ArenaSessionResult> {
  const { config } = options;
  const logger = options.logger ?? new SilentLogger();
  const sessionId = options.sessionId ?? randomUUID();

  const problem = await loadProblem(options.problemDir, { logger });
  const adapter = options.adapter ?? (await createProviderAdapter(config.provider, options.env));
  const executor = options.executor ?? (await ResourceBoundedExecutor.forInstalledCompiler(config, logger));

  const writer = new SessionResultWriter(config.results.dir, problem.id, sessionId);
  const trace = writer.openTrace();
  const session = new SessionStateMachine({
    problem,
    executor,
    evaluator: SubmissionEvaluator.fromConfig(problem, config, executor, logger, trace),
    limits: { maxTurns: config.session.maxTurns, maxSubmissions: config.session.maxSubmissions },
    experimentLimits: config.experiment,
    endOnSubmissionQuota: config.session.endOnSubmissionQuota,
    sessionId,
    logger,
    events: trace,
  });
  options.onSession?.(session);
  logger.info(`Session ${sessionId}: ${adapter.id()} on problem ${problem.id} (max score ${problem.maxScore})`);

  let failure: unknown;
  try {
    await runConversation({
      session,
      problem,
      adapter,
      maxToolCallRetries: config.session.maxToolCallRetries,
      temperature: config.provider.temperature,
      maxTokens: config.provider.maxTokens,
      timeoutMs: config.provider.timeoutMs,
      logger,
      abortSignal: options.abortSignal,
    });
  } catch (error) {
    failure = error;
    session.abort(error);
  } finally {
    await trace.close();
  }

  const submissions = session.submissions();
  for (const record of submissions) {
    await writer.writeSubmission(record);
  }
  const statistics = session.statistics();
  const summaryPath = await writer.writeSummary({
    statistics,
    submissions,
    provider: { type: config.provider.type, model: config.provider.model },
    config,
  });
  logger.info(`Results written to ${writer.sessionDir}`);

  if (failure !== undefined) {
    throw failure;
  }
  return { statistics, submissions, sessionDir: writer.sessionDir, summaryPath, tracePath: writer.tracePath };
}
