import { z } from 'zod';

import type { AnalysisThresholds } from '../types/analysis.js';

const count = z.number().int().min(1);

/**
 * Analysis thresholds with their consistency rules. Parsing a threshold set
 * that breaks them fails before any analysis runs.
 */
export const analysisThresholdsSchema = z
  .object({
    flakyBuildsMin: count,
    flakyBuildsMax: count,
    flakyFailuresMin: count,
    permafailFailuresMin: z.number().int().min(0),
    reportConsecutiveFailures: z.number().int().min(0),
    analysisHours: z.number().positive(),
  })
  .superRefine((value, ctx) => {
    if (value.flakyBuildsMin < value.flakyFailuresMin * 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['flakyBuildsMin'],
        message: 'flakyBuildsMin must be at least twice flakyFailuresMin',
      });
    }
    if (value.flakyBuildsMin < value.reportConsecutiveFailures * 2 + value.flakyFailuresMin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['flakyBuildsMin'],
        message: 'flakyBuildsMin must be at least reportConsecutiveFailures * 2 + flakyFailuresMin',
      });
    }
    if (value.flakyBuildsMax < value.flakyBuildsMin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['flakyBuildsMax'],
        message: 'flakyBuildsMax must not be less than flakyBuildsMin',
      });
    }
  }) satisfies z.ZodType<AnalysisThresholds>;
