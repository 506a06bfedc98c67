import {
  analysisThresholdsSchema,
  type AnalysisThresholds,
  DEFAULT_ANALYSIS_THRESHOLDS,
  DEFAULT_REPORT_SETTINGS,
} from '@runstreak/shared';
import { z, type ZodError } from 'zod';

import { ConfigurationError } from '../errors.js';

const intFromEnv = (fallback: number) =>
  z.string().regex(/^\d+$/, 'Expected a whole number').transform(Number).default(String(fallback));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: intFromEnv(3000),
  HOST: z.string().default('0.0.0.0'),
  DATABASE_URL: z.string().default('postgresql://localhost:5432/runstreak'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  CHECK_REPO: z.string().default(''),
  BRANCH: z.string().min(1).default('main'),
  // Analysis thresholds
  FLAKY_BUILDS_MIN: intFromEnv(DEFAULT_ANALYSIS_THRESHOLDS.flakyBuildsMin),
  FLAKY_BUILDS_MAX: intFromEnv(DEFAULT_ANALYSIS_THRESHOLDS.flakyBuildsMax),
  FLAKY_FAILURES_MIN: intFromEnv(DEFAULT_ANALYSIS_THRESHOLDS.flakyFailuresMin),
  PERMAFAIL_FAILURES_MIN: intFromEnv(DEFAULT_ANALYSIS_THRESHOLDS.permafailFailuresMin),
  REPORT_CONSECUTIVE_FAILURES: intFromEnv(DEFAULT_ANALYSIS_THRESHOLDS.reportConsecutiveFailures),
  ANALYSIS_HOURS: intFromEnv(DEFAULT_ANALYSIS_THRESHOLDS.analysisHours),
  // Report settings
  OLD_JOB_HOURS: intFromEnv(DEFAULT_REPORT_SETTINGS.OLD_JOB_HOURS),
  DISABLED_JOB_HOURS: intFromEnv(DEFAULT_REPORT_SETTINGS.DISABLED_JOB_HOURS),
});

export type LogLevel = z.output<typeof envSchema>['LOG_LEVEL'];

export interface ReportSettings {
  readonly oldJobHours: number;
  readonly disabledJobHours: number;
}

export interface AppConfig {
  readonly env: 'development' | 'production' | 'test';
  readonly port: number;
  readonly host: string;
  readonly databaseUrl: string;
  readonly logLevel: LogLevel;
  readonly checkRepo: string;
  readonly branch: string;
  readonly thresholds: AnalysisThresholds;
  readonly report: ReportSettings;
}

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validates a threshold set, throwing ConfigurationError when the thresholds
 * are inconsistent with each other
 */
export function validateThresholds(thresholds: AnalysisThresholds): AnalysisThresholds {
  const result = analysisThresholdsSchema.safeParse(thresholds);
  if (!result.success) {
    throw new ConfigurationError(`Invalid analysis thresholds: ${describeIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return Object.freeze(result.data);
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  const env = parsed.data;

  return Object.freeze({
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    databaseUrl: env.DATABASE_URL,
    logLevel: env.LOG_LEVEL,
    checkRepo: env.CHECK_REPO,
    branch: env.BRANCH,
    thresholds: validateThresholds({
      flakyBuildsMin: env.FLAKY_BUILDS_MIN,
      flakyBuildsMax: env.FLAKY_BUILDS_MAX,
      flakyFailuresMin: env.FLAKY_FAILURES_MIN,
      permafailFailuresMin: env.PERMAFAIL_FAILURES_MIN,
      reportConsecutiveFailures: env.REPORT_CONSECUTIVE_FAILURES,
      analysisHours: env.ANALYSIS_HOURS,
    }),
    report: Object.freeze({
      oldJobHours: env.OLD_JOB_HOURS,
      disabledJobHours: env.DISABLED_JOB_HOURS,
    }),
  });
}

export const config = loadConfig();
