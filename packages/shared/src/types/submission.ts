import type { ExecutionOutcome } from './execution';

export interface TestVerdict {
  readonly testCaseId: string;
  /** Always false when `outcome` is missing or its status is not `ok` */
  readonly correct: boolean;
  /** Fractional credit in [0, 1]; exact comparison yields 0 or 1 */
  readonly fraction: number;
  /** Null for tests that were skipped */
  readonly outcome: ExecutionOutcome | null;
  readonly message?: string;
  /** The checker itself failed; the verdict was forced to incorrect */
  readonly checkerFault?: boolean;
  /** Not launched because an earlier test of the same subtask failed */
  readonly skipped?: boolean;
}

export interface SubtaskResult {
  readonly index: number;
  readonly name: string;
  readonly passed: boolean;
  readonly points: number;
  readonly awarded: number;
  readonly failedTestCaseIds: readonly string[];
}

export interface ScoreBreakdown {
  readonly subtasks: readonly SubtaskResult[];
  readonly totalScore: number;
}

export interface SubmissionRecord {
  /** 1-based, strictly increasing within a session */
  readonly sequence: number;
  readonly source: string;
  /** Content hash of `source`, for spotting resubmissions */
  readonly sourceHash: string;
  readonly subtasks: readonly SubtaskResult[];
  readonly totalScore: number;
  readonly maxScore: number;
  /** Compiler diagnostics when the submission did not compile */
  readonly compileError: string | null;
  readonly verdicts: readonly TestVerdict[];
  /** ISO 8601 */
  readonly timestamp: string;
  readonly durationMs: number;
}
