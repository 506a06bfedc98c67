import { UNIQUE_JOB_SEPARATOR } from '../constants/index.js';
import type { UniqueJobParts } from '../types/test-results.js';

/**
 * Builds the key that identifies the same configured CI job across runs:
 * account, repo, origin and job name joined by commas.
 */
export function makeUniqueJobKey(parts: UniqueJobParts): string {
  return [parts.account, parts.repo, parts.origin, parts.jobName].join(UNIQUE_JOB_SEPARATOR);
}

/**
 * Reads the key parts from run metadata; missing fields become empty
 */
export function uniqueJobKeyFromMeta(meta: Readonly<Record<string, string | undefined>>): string {
  return makeUniqueJobKey({
    account: meta.account ?? '',
    repo: meta.checkrepo ?? '',
    origin: meta.origin ?? '',
    jobName: meta.uniquejobname ?? '',
  });
}

/**
 * Splits a key back into its parts. The job name is the remainder after the
 * third separator, since job names may themselves contain commas.
 */
export function parseUniqueJobKey(key: string): UniqueJobParts | null {
  const fields = key.split(UNIQUE_JOB_SEPARATOR);
  if (fields.length < 4) {
    return null;
  }
  const [account = '', repo = '', origin = '', ...rest] = fields;
  return { account, repo, origin, jobName: rest.join(UNIQUE_JOB_SEPARATOR) };
}
