import { z } from 'zod';

/** Keys that can provide the time a run is indexed by, in order of preference */
export const RUN_TIME_KEYS = ['runtriggertime', 'runstarttime', 'runfinishtime'] as const;

const metaValue = z.union([z.string(), z.number()]).transform((value) => String(value));

export const runMetadataSchema = z
  .object({
    checkrepo: z.string().min(1),
    origin: z.string().min(1),
    runid: metaValue,
    uniquejobname: z.string().min(1),
  })
  .catchall(metaValue)
  .refine((meta) => RUN_TIME_KEYS.some((key) => /^\d+$/.test(meta[key] ?? '')), {
    message: `One of ${RUN_TIME_KEYS.join(', ')} is required, in epoch seconds`,
  });

export const rawTestOutcomeSchema = z.object({
  name: z.string().min(1),
  /** Raw status symbol, classified on ingest */
  result: z.union([z.number().int(), z.string()]),
  reason: z.string().default(''),
  duration: z.number().int().min(0).default(0),
});

export const ingestRunSchema = z.object({
  meta: runMetadataSchema,
  tests: z.array(rawTestOutcomeSchema),
});

export const commitInfoSchema = z.object({
  commitHash: z.string().regex(/^[0-9a-f]{4,64}$/i, 'Commit hash must be hexadecimal'),
  prevHash: z.string().default(''),
  commitTime: z.number().int(),
  title: z.string().default(''),
  committerEmail: z.string().default(''),
  authorEmail: z.string().default(''),
});

export const ingestCommitsSchema = z.object({
  repo: z.string().min(1),
  branch: z.string().min(1),
  commits: z.array(commitInfoSchema).min(1),
});
