import type { ActionCounts, SessionStatistics, TerminationReason } from '@arena/shared';

export interface StatisticsInput {
  sessionId: string;
  problemId: string;
  terminationReason: TerminationReason;
  bestScore: number;
  bestSubtaskScores: Record<string, number>;
  maxScore: number;
  totalSubmissions: number;
  totalTurns: number;
  actionCounts: ActionCounts;
  startedAt: Date;
  endedAt: Date;
  fatalError?: string;
}

/**
 * Final figures for a session. The aggregated score follows the IOI rule:
 * the best award of every subtask, summed across submissions.
 */
export function computeStatistics(input: StatisticsInput): SessionStatistics {
  const aggregated = Object.values(input.bestSubtaskScores).reduce((sum, v) => sum + v, 0);
  const statistics: SessionStatistics = {
    sessionId: input.sessionId,
    problemId: input.problemId,
    terminationReason: input.terminationReason,
    bestScore: input.bestScore,
    aggregatedScore: Math.min(input.maxScore, Math.round(aggregated * 1e9) / 1e9),
    bestSubtaskScores: Object.freeze({ ...input.bestSubtaskScores }),
    maxScore: input.maxScore,
    totalSubmissions: input.totalSubmissions,
    totalTurns: input.totalTurns,
    actionCounts: Object.freeze({ ...input.actionCounts }),
    startedAt: input.startedAt.toISOString(),
    endedAt: input.endedAt.toISOString(),
    durationMs: input.endedAt.getTime() - input.startedAt.getTime(),
    ...(input.fatalError !== undefined ? { fatalError: input.fatalError } : {}),
  };
  return Object.freeze(statistics);
}
