import { z } from 'zod';

const positiveInt = () => z.number().int().positive();

export const SessionConfigSchema = z
  .object({
    maxTurns: positiveInt().default(100),
    maxSubmissions: positiveInt().default(50),
    /** Terminate as soon as the last allowed submission has been recorded */
    endOnSubmissionQuota: z.boolean().default(true),
    /** Model replies with unparsable tool arguments that may be retried per turn */
    maxToolCallRetries: z.number().int().min(0).default(3),
  })
  .default({});

export const ToolchainConfigSchema = z
  .object({
    compiler: z.string().min(1).default('g++'),
    flags: z.array(z.string()).default(['-std=c++20', '-O2', '-include', 'bits/stdc++.h']),
    sourceFileName: z.string().min(1).default('solution.cpp'),
    compileTimeoutMs: positiveInt().default(60_000),
    /** Wrap runs in `ulimit -v` so allocations beyond the ceiling fail */
    limitAddressSpace: z.boolean().default(true),
  })
  .default({});

export const ExecutorConfigSchema = z
  .object({
    maxOutputBytes: positiveInt().default(64 * 1024 * 1024),
    memoryPollIntervalMs: positiveInt().default(25),
    killGraceMs: z.number().int().min(0).default(0),
  })
  .default({});

export const ExperimentConfigSchema = z
  .object({
    timeLimitMs: positiveInt().default(180_000),
    memoryLimitBytes: positiveInt().default(2 * 1024 * 1024 * 1024),
  })
  .default({});

export const EvaluationConfigSchema = z
  .object({
    concurrency: positiveInt().default(4),
    shortCircuit: z.boolean().default(true),
    checkerTimeLimitMs: positiveInt().default(10_000),
  })
  .default({});

export const LoggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    maxMessageLength: z.number().int().min(0).default(1000),
  })
  .default({});

export const ResultsConfigSchema = z
  .object({
    dir: z.string().min(1).default('.arena/results'),
  })
  .default({});

export const ProviderConfigSchema = z
  .object({
    type: z.enum(['openai', 'fake']).default('openai'),
    model: z.string().min(1).default('gpt-4o'),
    api_key_env: z.string().default('OPENAI_API_KEY'),
    api_key: z.string().optional(),
    baseUrl: z.string().url().optional(),
    temperature: z.number().min(0).max(2).default(1),
    maxTokens: positiveInt().default(65_536),
    timeoutMs: positiveInt().optional(),
    /** JSON file of scripted turns for the fake provider */
    script: z.string().optional(),
  })
  .default({});

export const ArenaConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  session: SessionConfigSchema,
  toolchain: ToolchainConfigSchema,
  executor: ExecutorConfigSchema,
  experiment: ExperimentConfigSchema,
  evaluation: EvaluationConfigSchema,
  logging: LoggingConfigSchema,
  results: ResultsConfigSchema,
  provider: ProviderConfigSchema,
});

export type ArenaConfig = z.infer<typeof ArenaConfigSchema>;
export type ArenaConfigInput = z.input<typeof ArenaConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type ToolchainConfig = z.infer<typeof ToolchainConfigSchema>;
export type ExecutorConfig = z.infer<typeof ExecutorConfigSchema>;
export type ExperimentConfig = z.infer<typeof ExperimentConfigSchema>;
export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

/** Fully defaulted configuration. */
export function defaultConfig(): ArenaConfig {
  return ArenaConfigSchema.parse({});
}
