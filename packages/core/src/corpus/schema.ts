import { z } from 'zod';

/** `problem.json`; unknown keys are tolerated so existing corpora load unchanged. */
export const ProblemManifestSchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().optional(),
    /** Seconds */
    time_limit: z.number().positive().default(2.0),
    /** Bytes */
    memory_limit: z.number().int().positive().default(2 * 1024 * 1024 * 1024),
    scoring: z.enum(['all_or_nothing', 'min_fraction']).default('all_or_nothing'),
    /** When present, the subtask points must add up to it */
    max_score: z.number().nonnegative().optional(),
    /** Checker source, relative to the problem directory */
    checker: z.string().min(1).optional(),
  })
  .passthrough();

export const SubtaskFileSchema = z
  .object({
    score: z.number().nonnegative(),
    testcases: z
      .array(z.union([z.string().min(1), z.number().int()]))
      .min(1, 'a subtask needs at least one test')
      .transform((ids) => ids.map(String)),
    name: z.string().min(1).optional(),
  })
  .passthrough();

export type ProblemManifest = z.infer<typeof ProblemManifestSchema>;
export type SubtaskFile = z.infer<typeof SubtaskFileSchema>;
