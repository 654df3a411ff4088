import { fileURLToPath } from 'url';
import { readFile } from 'fs-extra';
import type { ProblemSpec, SessionLimits } from '@arena/shared';

const INSTRUCTIONS_PATH = fileURLToPath(new URL('./prompts/instructions.txt', import.meta.url));

const NO_STATEMENT = '(No statement was provided with this problem.)';

export async function buildPrompt(
  problem: Pick<ProblemSpec, 'statement'>,
  limits: SessionLimits,
): Promise<string> {
  const template = await readFile(INSTRUCTIONS_PATH, 'utf8');
  const values: Record<string, string> = {
    maxSubmissions: String(limits.maxSubmissions),
    maxTurns: String(limits.maxTurns),
    statement: problem.statement?.trim() || NO_STATEMENT,
  };
  // Single pass, so placeholders inside the statement stay as written.
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}
