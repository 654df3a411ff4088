import { describe, it, expect } from 'vitest';
import type { ExecutionOutcome, ProblemSpec, TestVerdict } from '@arena/shared';
import { failedBreakdown, score, settlesSubtask } from './scorer';
import { skippedVerdict } from './test-runner';

const okOutcome: ExecutionOutcome = {
  status: 'ok',
  exitCode: 0,
  signal: null,
  stdout: '',
  stderr: '',
  durationMs: 1,
  peakMemoryBytes: null,
  truncated: false,
};

function pass(id: string): TestVerdict {
  return { testCaseId: id, correct: true, fraction: 1, outcome: okOutcome };
}

function fail(id: string, fraction = 0): TestVerdict {
  return { testCaseId: id, correct: false, fraction, outcome: okOutcome };
}

function timedOut(id: string): TestVerdict {
  return { testCaseId: id, correct: false, fraction: 0, outcome: { ...okOutcome, status: 'timeout' } };
}

const problem: Pick<ProblemSpec, 'subtasks' | 'maxScore' | 'scoring'> = {
  scoring: 'all_or_nothing',
  maxScore: 100,
  subtasks: [
    { index: 0, name: 'samples', points: 0, testCaseIds: ['s1'] },
    { index: 1, name: 'small', points: 30, testCaseIds: ['a1', 'a2'] },
    { index: 2, name: 'large', points: 70, testCaseIds: ['b1', 'b2', 'b3'] },
  ],
};

describe('score (all_or_nothing)', () => {
  it('awards a subtask only when every test passes', () => {
    const result = score(problem, [
      pass('s1'),
      pass('a1'),
      pass('a2'),
      pass('b1'),
      fail('b2'),
      pass('b3'),
    ]);

    expect(result.totalScore).toBe(30);
    expect(result.subtasks.map((s) => [s.name, s.passed, s.awarded])).toEqual([
      ['samples', true, 0],
      ['small', true, 30],
      ['large', false, 0],
    ]);
    expect(result.subtasks[2].failedTestCaseIds).toEqual(['b2']);
  });

  it('treats missing and skipped verdicts as failures', () => {
    const result = score(problem, [pass('s1'), pass('a1'), timedOut('b1'), skippedVerdict('b2')]);

    expect(result.subtasks[1].failedTestCaseIds).toEqual(['a2']);
    expect(result.subtasks[2].failedTestCaseIds).toEqual(['b1', 'b2', 'b3']);
    expect(result.totalScore).toBe(0);
  });

  it('gives full marks when everything passes', () => {
    const all = ['s1', 'a1', 'a2', 'b1', 'b2', 'b3'].map(pass);
    expect(score(problem, all).totalScore).toBe(100);
  });

  it('does not depend on verdict order', () => {
    const verdicts = [pass('b3'), pass('a2'), pass('s1'), pass('b1'), pass('a1'), fail('b2')];
    expect(score(problem, verdicts)).toEqual(score(problem, [...verdicts].reverse()));
  });
});

describe('score (min_fraction)', () => {
  const partial = { ...problem, scoring: 'min_fraction' as const };

  it('scales points by the weakest test', () => {
    const result = score(partial, [
      pass('s1'),
      pass('a1'),
      fail('a2', 0.5),
      pass('b1'),
      fail('b2', 0.1),
      fail('b3', 0.3),
    ]);

    expect(result.subtasks[1].awarded).toBe(15);
    expect(result.subtasks[2].awarded).toBe(7);
    expect(result.subtasks[1].passed).toBe(false);
    expect(result.totalScore).toBe(22);
  });

  it('gives no credit to a test whose run failed', () => {
    const result = score(partial, [pass('s1'), pass('a1'), timedOut('a2')]);
    expect(result.subtasks[1].awarded).toBe(0);
  });
});

describe('score with an empty subtask', () => {
  const withEmpty: Pick<ProblemSpec, 'subtasks' | 'maxScore' | 'scoring'> = {
    scoring: 'all_or_nothing',
    maxScore: 100,
    subtasks: [
      { index: 0, name: 'empty', points: 10, testCaseIds: [] },
      { index: 1, name: 'a', points: 90, testCaseIds: ['a1'] },
    ],
  };

  it('never passes a subtask that has no tests', () => {
    for (const scoring of ['all_or_nothing', 'min_fraction'] as const) {
      const result = score({ ...withEmpty, scoring }, []);
      expect(result.subtasks.map((s) => [s.name, s.passed, s.awarded])).toEqual([
        ['empty', false, 0],
        ['a', false, 0],
      ]);
      expect(result.totalScore).toBe(0);
    }
  });
});

describe('failedBreakdown', () => {
  it('fails every subtask with all of its tests', () => {
    const result = failedBreakdown(problem);

    expect(result.totalScore).toBe(0);
    expect(result.subtasks.map((s) => [s.name, s.passed, s.points, s.awarded, s.failedTestCaseIds])).toEqual([
      ['samples', false, 0, 0, ['s1']],
      ['small', false, 30, 0, ['a1', 'a2']],
      ['large', false, 70, 0, ['b1', 'b2', 'b3']],
    ]);
  });
});

describe('settlesSubtask', () => {
  it('settles on any failure under all_or_nothing', () => {
    expect(settlesSubtask('all_or_nothing', fail('a1', 0.5))).toBe(true);
    expect(settlesSubtask('all_or_nothing', pass('a1'))).toBe(false);
  });

  it('settles only on zero credit under min_fraction', () => {
    expect(settlesSubtask('min_fraction', fail('a1', 0.5))).toBe(false);
    expect(settlesSubtask('min_fraction', fail('a1', 0))).toBe(true);
    expect(settlesSubtask('min_fraction', timedOut('a1'))).toBe(true);
    expect(settlesSubtask('min_fraction', pass('a1'))).toBe(false);
  });
});
