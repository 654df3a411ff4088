export { SubmissionEvaluator } from './evaluator';
export type { EvaluatorOptions, EvaluationSession } from './evaluator';
export { score } from './scorer';
export { runTestCase, skippedVerdict, describeStatus } from './test-runner';
export type { TestRunContext } from './test-runner';
export { ExactOutputChecker, ProgramChecker, BrokenChecker, parseCheckerOutput } from './checker';
export type { Checker, CheckInput, CheckResult } from './checker';
export { normalizeOutput, outputsMatch, firstDifferingLine } from './compare';
export { runPool } from './pool';
