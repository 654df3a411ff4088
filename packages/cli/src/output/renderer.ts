import pc from 'picocolors';
import type { ArenaSessionResult, SessionStateMachine } from '@arena/core';
import {
  digestSubmission,
  type ExecutionCompleted,
  type ExecutionOutcome,
  type SubmissionEvaluated,
  type SubmissionRecord,
  type SubmissionRejected,
} from '@arena/shared';
import { formatTable } from './index';

const MIB = 1024 * 1024;

function formatBytes(bytes: number | null): string {
  return bytes === null ? 'n/a' : `${(bytes / MIB).toFixed(1)} MiB`;
}

export class OutputRenderer {
  constructor(readonly isJson: boolean) {}

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /** Prints progress lines while a session runs. Silent in JSON mode. */
  follow(session: SessionStateMachine): void {
    if (this.isJson) return;
    session.on('ExecutionCompleted', (event: ExecutionCompleted) => {
      const { turn, status, durationMs } = event.payload;
      this.log(`turn ${turn}: experiment ${status} (${durationMs} ms)`);
    });
    session.on('SubmissionEvaluated', (event: SubmissionEvaluated) => {
      const { sequence, totalScore, bestScore, submissionsRemaining, compileError } = event.payload;
      const score = compileError ? pc.red('compile error') : pc.bold(String(totalScore));
      console.log(`Submission #${sequence}: ${score} (best ${bestScore}, ${submissionsRemaining} left)`);
    });
    session.on('SubmissionRejected', (event: SubmissionRejected) => {
      console.log(pc.yellow(`Submission rejected: quota of ${event.payload.limit} reached`));
    });
  }

  renderSession(result: ArenaSessionResult): void {
    const { statistics } = result;
    if (this.isJson) {
      this.json({
        statistics,
        submissions: result.submissions.map(digestSubmission),
        sessionDir: result.sessionDir,
        summaryPath: result.summaryPath,
        tracePath: result.tracePath,
      });
      return;
    }

    if (statistics.terminationReason === 'fatal_error') {
      console.log(`\n${pc.red('❌ Session failed.')}`);
      if (statistics.fatalError) console.log(`  ${pc.bold('Error:')} ${statistics.fatalError}`);
    } else {
      console.log(`\n${pc.green('✅ Session finished')} ${pc.gray(`(${statistics.terminationReason})`)}`);
    }

    console.log(pc.bold('\nScore:'));
    console.log(`  ${statistics.aggregatedScore} / ${statistics.maxScore}`);
    console.log(`  Best single submission: ${statistics.bestScore}`);
    console.log(`  Turns: ${statistics.totalTurns}, submissions: ${statistics.totalSubmissions}`);
    const { execute, submit, finish, none } = statistics.actionCounts;
    console.log(`  Actions: execute ${execute}, submit ${submit}, finish ${finish}, none ${none}`);

    const rows = Object.entries(statistics.bestSubtaskScores).map(([subtask, best]) => ({ subtask, best }));
    if (rows.length > 0) {
      console.log(formatTable(rows, { head: ['Subtask', 'Best'] }));
    }

    console.log(pc.bold('\nArtifacts:'));
    console.log(`  Session: ${statistics.sessionId}`);
    console.log(`  Summary: ${result.summaryPath}`);
    console.log(`  Trace: ${result.tracePath}`);
  }

  renderSubmission(record: SubmissionRecord): void {
    if (this.isJson) {
      this.json(record);
      return;
    }
    console.log(`\n${pc.bold('Score:')} ${record.totalScore} / ${record.maxScore}`);
    if (record.compileError !== null) {
      console.log(pc.red('Compilation failed:'));
      console.log(record.compileError);
    }
    const rows = record.subtasks.map((s) => ({
      subtask: s.name,
      points: s.points,
      awarded: s.awarded,
      status: s.passed ? pc.green('passed') : pc.red('failed'),
      failed: s.failedTestCaseIds.length > 0 ? s.failedTestCaseIds.join(', ') : '-',
    }));
    console.log(formatTable(rows, { head: ['Subtask', 'Points', 'Awarded', 'Status', 'Failed tests'] }));
    console.log(pc.gray(`Evaluated in ${record.durationMs} ms`));
  }

  renderExecution(outcome: ExecutionOutcome): void {
    if (this.isJson) {
      this.json(outcome);
      return;
    }
    const status = outcome.status === 'ok' ? pc.green(outcome.status) : pc.red(outcome.status);
    console.log(`${pc.bold('Status:')} ${status}`);
    if (outcome.stdout) {
      console.log(pc.bold('stdout:'));
      console.log(outcome.stdout);
    }
    if (outcome.stderr) {
      console.log(pc.bold('stderr:'));
      console.log(outcome.stderr);
    }
    if (outcome.truncated) {
      console.log(pc.yellow('Output was truncated.'));
    }
    console.log(
      pc.gray(
        `exit code ${outcome.exitCode ?? 'none'}, ${outcome.durationMs} ms, peak memory ${formatBytes(outcome.peakMemoryBytes)}`,
      ),
    );
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
