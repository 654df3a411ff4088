import {
  QuotaExceededError,
  type ExecutionOutcome,
  type ProblemSpec,
  type SubmissionRecord,
} from '@arena/shared';
import type { EvaluationSession } from '@arena/judge';
import type { SubmissionScorer } from '../session/state-machine';

export const PROBLEM: ProblemSpec = {
  id: 'two-parts',
  name: 'Two parts',
  corpusDir: '/corpus/two-parts',
  subtasks: [
    { index: 0, name: 'a', points: 30, testCaseIds: ['1'] },
    { index: 1, name: 'b', points: 70, testCaseIds: ['2'] },
  ],
  testCases: {
    '1': { id: '1', inputPath: '/corpus/1.in', expectedOutputPath: '/corpus/1.out' },
    '2': { id: '2', inputPath: '/corpus/2.in', expectedOutputPath: '/corpus/2.out' },
  },
  timeLimitSeconds: 1,
  memoryLimitBytes: 1024,
  maxScore: 100,
  scoring: 'all_or_nothing',
  graderSources: [],
};

export const OK_RUN: ExecutionOutcome = Object.freeze({
  status: 'ok',
  exitCode: 0,
  signal: null,
  stdout: '3\n',
  stderr: '',
  durationMs: 5,
  peakMemoryBytes: 1000,
  truncated: false,
});

/** Awards per subtask, keyed by the submitted source. */
export class ScriptedEvaluator implements SubmissionScorer {
  readonly calls: EvaluationSession[] = [];

  constructor(private readonly awards: Record<string, [number, number]> = {}) {}

  async evaluate(session: EvaluationSession, source: string): Promise<SubmissionRecord> {
    this.calls.push(session);
    const { maxSubmissions } = session.limits;
    if (session.submissionCount >= maxSubmissions) {
      throw new QuotaExceededError('submissions', maxSubmissions, session.submissionCount);
    }
    const [a, b] = this.awards[source] ?? [0, 0];
    return {
      sequence: session.submissionCount + 1,
      source,
      sourceHash: `hash-${source}`,
      subtasks: [
        { index: 0, name: 'a', points: 30, passed: a === 30, awarded: a, failedTestCaseIds: a === 30 ? [] : ['1'] },
        { index: 1, name: 'b', points: 70, passed: b === 70, awarded: b, failedTestCaseIds: b === 70 ? [] : ['2'] },
      ],
      totalScore: a + b,
      maxScore: 100,
      compileError: null,
      verdicts: [],
      timestamp: '2026-01-01T00:00:00.000Z',
      durationMs: 1,
    };
  }
}
