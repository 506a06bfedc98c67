import { TestResult } from '@runstreak/shared';

/** Indexed by stored result code */
const RESULTS_BY_CODE: readonly TestResult[] = [
  TestResult.Unknown,
  TestResult.Pass,
  TestResult.Fail,
  TestResult.Skip,
  TestResult.Timeout,
  TestResult.FailIgnored,
  TestResult.Abort,
  TestResult.Error,
];

/**
 * Textual status symbols written by the supported log parsers
 */
const STATUS_SYMBOLS: ReadonlyMap<string, TestResult> = new Map([
  ['pass', TestResult.Pass],
  ['passed', TestResult.Pass],
  ['ok', TestResult.Pass],
  ['success', TestResult.Pass],
  ['fail', TestResult.Fail],
  ['failed', TestResult.Fail],
  ['failure', TestResult.Fail],
  ['not ok', TestResult.Fail],
  ['skip', TestResult.Skip],
  ['skipped', TestResult.Skip],
  ['timeout', TestResult.Timeout],
  ['timedout', TestResult.Timeout],
  ['failignore', TestResult.FailIgnored],
  ['failignored', TestResult.FailIgnored],
  ['xfail', TestResult.FailIgnored],
  ['abort', TestResult.Abort],
  ['aborted', TestResult.Abort],
  ['error', TestResult.Error],
  ['errored', TestResult.Error],
]);

/**
 * Maps a raw status symbol to a result kind. Numbers are the stored result
 * codes; strings are parser symbols, matched case-insensitively. Anything
 * unrecognized is Unknown.
 */
export function classifyResult(raw: string | number): TestResult {
  if (typeof raw === 'number') {
    return RESULTS_BY_CODE[raw] ?? TestResult.Unknown;
  }
  return STATUS_SYMBOLS.get(raw.trim().toLowerCase()) ?? TestResult.Unknown;
}
