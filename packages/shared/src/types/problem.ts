/**
 * How subtask awards are computed from per-test verdicts.
 *
 * - `all_or_nothing`: full points only when every test of the subtask is correct
 * - `min_fraction`: points scaled by the smallest fractional credit in the subtask
 */
export type ScoringMode = 'all_or_nothing' | 'min_fraction';

export interface TestCase {
  id: string;
  inputPath: string;
  /** Null when a checker judges from the produced output alone */
  expectedOutputPath: string | null;
}

export interface SubtaskSpec {
  /** Zero-based position in the problem's subtask order */
  index: number;
  name: string;
  points: number;
  testCaseIds: readonly string[];
}

export interface ProblemSpec {
  id: string;
  name: string;
  corpusDir: string;
  subtasks: readonly SubtaskSpec[];
  testCases: Readonly<Record<string, TestCase>>;
  timeLimitSeconds: number;
  memoryLimitBytes: number;
  maxScore: number;
  scoring: ScoringMode;
  /** Absolute path of the checker source, if the problem ships one */
  checker?: string;
  /** Extra sources (grader, headers) compiled together with every submission */
  graderSources: readonly string[];
  /** Problem statement text for the agent prompt, when the corpus provides one */
  statement?: string;
}

export interface ResourceLimits {
  timeLimitMs: number;
  memoryLimitBytes: number;
}

export function problemLimits(problem: Pick<ProblemSpec, 'timeLimitSeconds' | 'memoryLimitBytes'>): ResourceLimits {
  return {
    timeLimitMs: Math.round(problem.timeLimitSeconds * 1000),
    memoryLimitBytes: problem.memoryLimitBytes,
  };
}
