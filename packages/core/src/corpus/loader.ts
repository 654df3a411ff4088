import path from 'path';
import { pathExists, readdir, readFile, stat } from 'fs-extra';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  CorpusValidationError,
  SilentLogger,
  toError,
  type Logger,
  type ProblemSpec,
  type SubtaskSpec,
  type TestCase,
} from '@arena/shared';
import { ProblemManifestSchema, SubtaskFileSchema, type ProblemManifest } from './schema';

export const PROBLEM_MANIFEST = 'problem.json';
export const DEFAULT_CHECKER = path.join('checker', 'checker.cpp');
const STATEMENT_FILES = ['statement.md', 'statement.txt'];

const byName = (a: string, b: string) => a.localeCompare(b, undefined, { numeric: true });

export interface LoadProblemOptions {
  logger?: Logger;
}

/**
 * Reads a problem directory into an immutable `ProblemSpec`. Every
 * inconsistency found is collected and reported together in one
 * `CorpusValidationError`.
 */
export async function loadProblem(problemDir: string, options: LoadProblemOptions = {}): Promise<ProblemSpec> {
  const logger = options.logger ?? new SilentLogger();
  const dir = path.resolve(problemDir);
  if (!(await isDirectory(dir))) {
    throw new CorpusValidationError(`Problem directory not found: ${dir}`);
  }

  const issues: string[] = [];
  const manifest = await readManifest(dir, issues, logger);
  const checker = await resolveChecker(dir, manifest, issues);
  const inputs = await listTestInputs(dir);

  const subtasks: SubtaskSpec[] = [];
  const testCases: Record<string, TestCase> = {};
  const owner = new Map<string, string>();

  const subtaskDir = path.join(dir, 'subtasks');
  const subtaskFiles = (await isDirectory(subtaskDir))
    ? (await readdir(subtaskDir)).filter((f) => f.endsWith('.json')).sort(byName)
    : [];
  if (subtaskFiles.length === 0) {
    issues.push('no subtasks defined (expected subtasks/*.json)');
  }

  for (const file of subtaskFiles) {
    const parsed = await readJson(dir, path.join(subtaskDir, file), SubtaskFileSchema, issues);
    if (!parsed) continue;
    const name = parsed.name ?? path.basename(file, '.json');

    for (const id of parsed.testcases) {
      const previous = owner.get(id);
      if (previous !== undefined) {
        issues.push(`test ${id} belongs to both subtask ${previous} and subtask ${name}`);
        continue;
      }
      owner.set(id, name);
      if (!inputs.has(id)) {
        issues.push(`subtask ${name}: test ${id} has no input file tests/${id}.in`);
        continue;
      }
      const expected = path.join(dir, 'tests', `${id}.out`);
      const hasExpected = await pathExists(expected);
      if (!hasExpected && checker === undefined) {
        issues.push(`subtask ${name}: test ${id} has no expected output and the problem has no checker`);
      }
      testCases[id] = {
        id,
        inputPath: path.join(dir, 'tests', `${id}.in`),
        expectedOutputPath: hasExpected ? expected : null,
      };
    }

    subtasks.push({ index: subtasks.length, name, points: parsed.score, testCaseIds: parsed.testcases });
  }

  for (const id of [...inputs].sort(byName)) {
    if (!owner.has(id)) issues.push(`test ${id} is not in any subtask`);
  }

  const names = new Set<string>();
  for (const subtask of subtasks) {
    if (names.has(subtask.name)) issues.push(`duplicate subtask name ${subtask.name}`);
    names.add(subtask.name);
  }

  const pointsTotal = subtasks.reduce((sum, s) => sum + s.points, 0);
  if (manifest.max_score !== undefined && Math.abs(pointsTotal - manifest.max_score) > 1e-9) {
    issues.push(`subtask points add up to ${pointsTotal} but max_score is ${manifest.max_score}`);
  }

  if (issues.length > 0) {
    throw new CorpusValidationError(`Invalid problem at ${dir}`, issues);
  }

  const problem: ProblemSpec = {
    id: manifest.id ?? path.basename(dir),
    name: manifest.name ?? manifest.id ?? path.basename(dir),
    corpusDir: dir,
    subtasks,
    testCases,
    timeLimitSeconds: manifest.time_limit,
    memoryLimitBytes: manifest.memory_limit,
    maxScore: manifest.max_score ?? pointsTotal,
    scoring: manifest.scoring,
    checker,
    graderSources: await listGraders(dir),
    statement: await readStatement(dir),
  };
  logger.debug(`Loaded problem ${problem.id}: ${subtasks.length} subtasks, ${owner.size} tests`);
  return deepFreeze(problem);
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function readJson<T>(
  dir: string,
  file: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  issues: string[],
): Promise<T | null> {
  const label = path.relative(dir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, 'utf8'));
  } catch (error) {
    issues.push(`${label}: ${toError(error).message}`);
    return null;
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push(`${label}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return null;
  }
  return result.data;
}

async function readManifest(dir: string, issues: string[], logger: Logger): Promise<ProblemManifest> {
  const file = path.join(dir, PROBLEM_MANIFEST);
  if (!(await pathExists(file))) {
    logger.warn(`${file} not found; using default limits`);
    return ProblemManifestSchema.parse({});
  }
  return (await readJson(dir, file, ProblemManifestSchema, issues)) ?? ProblemManifestSchema.parse({});
}

async function resolveChecker(dir: string, manifest: ProblemManifest, issues: string[]): Promise<string | undefined> {
  if (manifest.checker !== undefined) {
    const configured = path.resolve(dir, manifest.checker);
    if (!(await pathExists(configured))) {
      issues.push(`checker ${manifest.checker} does not exist`);
      return undefined;
    }
    return configured;
  }
  const fallback = path.join(dir, DEFAULT_CHECKER);
  return (await pathExists(fallback)) ? fallback : undefined;
}

async function listTestInputs(dir: string): Promise<Set<string>> {
  const testsDir = path.join(dir, 'tests');
  if (!(await isDirectory(testsDir))) return new Set();
  const files = await readdir(testsDir);
  return new Set(files.filter((f) => f.endsWith('.in')).map((f) => f.slice(0, -'.in'.length)));
}

async function listGraders(dir: string): Promise<string[]> {
  const gradersDir = path.join(dir, 'graders');
  if (!(await isDirectory(gradersDir))) return [];
  const files = (await readdir(gradersDir)).sort(byName);
  const graders: string[] = [];
  for (const file of files) {
    const full = path.join(gradersDir, file);
    if ((await stat(full)).isFile()) graders.push(full);
  }
  return graders;
}

/**
 * The statement file when there is one; otherwise the text files under
 * `attachments/`, each behind a header line.
 */
async function readStatement(dir: string): Promise<string | undefined> {
  for (const name of STATEMENT_FILES) {
    const file = path.join(dir, name);
    if (await pathExists(file)) return readFile(file, 'utf8');
  }

  const attachmentsDir = path.join(dir, 'attachments');
  if (!(await isDirectory(attachmentsDir))) return undefined;
  const parts: string[] = [];
  for (const rel of (await listFiles(attachmentsDir)).sort(byName)) {
    const content = await readFile(path.join(attachmentsDir, rel), 'utf8');
    parts.push(`--- ${rel} ---\n${content}`);
  }
  return parts.length > 0 ? parts.join('\n\n') : undefined;
}

async function listFiles(root: string, prefix = ''): Promise<string[]> {
  const out: string[] = [];
  for (const entry of await readdir(path.join(root, prefix), { withFileTypes: true })) {
    const rel = path.join(prefix, entry.name);
    if (entry.isDirectory()) out.push(...(await listFiles(root, rel)));
    else if (entry.isFile()) out.push(rel);
  }
  return out;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
