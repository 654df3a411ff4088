import path from 'path';
import {
  atomicWriteJson,
  digestSubmission,
  JsonlEventWriter,
  SESSION_SUMMARY_SCHEMA_VERSION,
  SummaryWriter,
  type SessionStatistics,
  type SessionSummary,
  type SubmissionRecord,
} from '@arena/shared';

export const TRACE_FILENAME = 'trace.jsonl';
export const SUBMISSIONS_DIRNAME = 'submissions';

export interface SummaryInput {
  statistics: SessionStatistics;
  submissions: readonly SubmissionRecord[];
  provider: { type: string; model: string };
  config: unknown;
}

/**
 * Lays out one session's results under
 * `<resultsDir>/<problemId>/<sessionId>/`.
 */
export class SessionResultWriter {
  readonly sessionDir: string;
  readonly tracePath: string;
  readonly submissionsDir: string;

  constructor(
    resultsDir: string,
    readonly problemId: string,
    readonly sessionId: string,
  ) {
    this.sessionDir = path.resolve(resultsDir, problemId, sessionId);
    this.tracePath = path.join(this.sessionDir, TRACE_FILENAME);
    this.submissionsDir = path.join(this.sessionDir, SUBMISSIONS_DIRNAME);
  }

  /** Opens `trace.jsonl` for appending; the caller closes it. */
  openTrace(): JsonlEventWriter {
    return new JsonlEventWriter(this.tracePath);
  }

  /** Writes `submissions/<sequence>.json`, source included. */
  async writeSubmission(record: SubmissionRecord): Promise<string> {
    const file = path.join(this.submissionsDir, `${record.sequence}.json`);
    await atomicWriteJson(file, record);
    return file;
  }

  async writeSummary(input: SummaryInput): Promise<string> {
    const summary: SessionSummary = {
      schemaVersion: SESSION_SUMMARY_SCHEMA_VERSION,
      sessionId: this.sessionId,
      problemId: this.problemId,
      provider: input.provider,
      statistics: input.statistics,
      submissions: input.submissions.map(digestSubmission),
      config: input.config,
      artifacts: {
        tracePath: this.tracePath,
        submissionsDir: this.submissionsDir,
      },
    };
    return SummaryWriter.write(summary, this.sessionDir);
  }
}
