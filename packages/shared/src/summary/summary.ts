import path from 'node:path';
import { atomicWrite } from '../fs/io';
import { redactForLogs } from '../redaction';
import type { SessionStatistics } from '../types/session';
import type { SubmissionRecord } from '../types/submission';

/**
 * Schema version for the session summary.
 */
export const SESSION_SUMMARY_SCHEMA_VERSION = 1;

export const SUMMARY_FILENAME = 'summary.json';

export interface SubmissionDigest {
  sequence: number;
  sourceHash: string;
  totalScore: number;
  subtaskScores: Record<string, number>;
  compileError: boolean;
  durationMs: number;
  timestamp: string;
}

export interface SessionSummary {
  schemaVersion: typeof SESSION_SUMMARY_SCHEMA_VERSION;
  sessionId: string;
  problemId: string;
  provider: {
    type: string;
    model: string;
  };
  statistics: SessionStatistics;
  submissions: SubmissionDigest[];
  /** Configuration in effect for the session, with secrets redacted on write */
  config: unknown;
  artifacts: {
    tracePath: string;
    submissionsDir: string;
  };
}

export function digestSubmission(record: SubmissionRecord): SubmissionDigest {
  const subtaskScores: Record<string, number> = {};
  for (const subtask of record.subtasks) {
    subtaskScores[subtask.name] = subtask.awarded;
  }
  return {
    sequence: record.sequence,
    sourceHash: record.sourceHash,
    totalScore: record.totalScore,
    subtaskScores,
    compileError: record.compileError !== null,
    durationMs: record.durationMs,
    timestamp: record.timestamp,
  };
}

export class SummaryWriter {
  static async write(summary: SessionSummary, sessionDir: string): Promise<string> {
    const summaryPath = path.join(sessionDir, SUMMARY_FILENAME);
    const summaryJson = JSON.stringify(redactForLogs(summary), null, 2);
    await atomicWrite(summaryPath, summaryJson);
    return summaryPath;
  }
}
