import type { ProblemSpec, ScoreBreakdown, SubtaskResult, TestVerdict } from '@arena/shared';

const EPSILON_DIGITS = 1e9;

function roundScore(value: number): number {
  return Math.round(value * EPSILON_DIGITS) / EPSILON_DIGITS;
}

/** The fraction a verdict contributes under `min_fraction`; failed runs give 0. */
export function creditOf(verdict: TestVerdict | undefined): number {
  if (!verdict || verdict.outcome === null || verdict.outcome.status !== 'ok') return 0;
  return verdict.fraction;
}

/**
 * Turns per-test verdicts into subtask awards. A test without a verdict
 * counts as failed, and a subtask without tests never passes.
 */
export function score(
  problem: Pick<ProblemSpec, 'subtasks' | 'maxScore' | 'scoring'>,
  verdicts: readonly TestVerdict[],
): ScoreBreakdown {
  const byId = new Map<string, TestVerdict>();
  for (const verdict of verdicts) {
    byId.set(verdict.testCaseId, verdict);
  }

  const subtasks: SubtaskResult[] = problem.subtasks.map((subtask) => {
    const failedTestCaseIds = subtask.testCaseIds.filter((id) => !byId.get(id)?.correct);
    const passed = subtask.testCaseIds.length > 0 && failedTestCaseIds.length === 0;

    let awarded: number;
    if (subtask.testCaseIds.length === 0) {
      awarded = 0;
    } else if (problem.scoring === 'min_fraction') {
      const minCredit = subtask.testCaseIds.reduce((min, id) => Math.min(min, creditOf(byId.get(id))), 1);
      awarded = roundScore(subtask.points * minCredit);
    } else {
      awarded = passed ? subtask.points : 0;
    }

    return Object.freeze({
      index: subtask.index,
      name: subtask.name,
      passed,
      points: subtask.points,
      awarded,
      failedTestCaseIds: Object.freeze(failedTestCaseIds),
    });
  });

  const sum = roundScore(subtasks.reduce((total, s) => total + s.awarded, 0));
  return Object.freeze({
    subtasks: Object.freeze(subtasks),
    totalScore: Math.min(sum, problem.maxScore),
  });
}

/** Breakdown for a submission that never ran: every subtask failed, nothing awarded. */
export function failedBreakdown(problem: Pick<ProblemSpec, 'subtasks'>): ScoreBreakdown {
  const subtasks: SubtaskResult[] = problem.subtasks.map((subtask) =>
    Object.freeze({
      index: subtask.index,
      name: subtask.name,
      passed: false,
      points: subtask.points,
      awarded: 0,
      failedTestCaseIds: Object.freeze([...subtask.testCaseIds]),
    }),
  );
  return Object.freeze({ subtasks: Object.freeze(subtasks), totalScore: 0 });
}

/**
 * Whether a verdict already fixes its subtask's award at zero, so the
 * subtask's remaining tests cannot change the score.
 */
export function settlesSubtask(scoring: ProblemSpec['scoring'], verdict: TestVerdict): boolean {
  return scoring === 'min_fraction' ? creditOf(verdict) === 0 : !verdict.correct;
}
