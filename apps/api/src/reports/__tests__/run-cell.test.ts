import { describe, it, expect } from 'vitest';

import { BASE_TIME, makeRun } from '../../__tests__/mocks/job-runs.js';
import { classifyRunCell } from '../run-cell.js';

const RECENT = BASE_TIME;

describe('classifyRunCell', () => {
  it('should count successes of a successful run', () => {
    const run = makeRun(1, { succeeded: ['a', 'b'] });

    expect(classifyRunCell(run, RECENT)).toEqual({ cssClass: 'success', count: 2, prefix: '' });
  });

  it('should count failures of a failed run', () => {
    const run = makeRun(1, { succeeded: ['a', 'b'], failed: ['c'] });

    expect(classifyRunCell(run, RECENT)).toEqual({ cssClass: 'failure', count: 1, prefix: '*' });
  });

  it('should mark aborted runs whatever their failures', () => {
    const clean = makeRun(1, { succeeded: ['a'] }, { aborted: true, testResult: 'failure' });
    const failing = makeRun(2, { failed: ['b', 'c'] }, { testResult: 'truncated' });

    expect(classifyRunCell(clean, RECENT)).toEqual({ cssClass: 'aborted', count: 1, prefix: '' });
    expect(classifyRunCell(failing, RECENT)).toEqual({ cssClass: 'aborted', count: 2, prefix: '*' });
  });

  it('should go by the failures of a run without a result code', () => {
    const clean = makeRun(1, { succeeded: ['a'] }, { testResult: 'unknown' });
    const failing = makeRun(2, { failed: ['b'] }, { testResult: 'unknown' });

    expect(classifyRunCell(clean, RECENT)).toEqual({ cssClass: 'success', count: 1, prefix: '' });
    expect(classifyRunCell(failing, RECENT)).toEqual({ cssClass: 'unknown', count: 1, prefix: '*' });
  });

  it('should fade old successes and failures only', () => {
    const later = BASE_TIME + 10_000;

    expect(classifyRunCell(makeRun(1, { succeeded: ['a'] }), later).cssClass).toBe('successold');
    expect(classifyRunCell(makeRun(1, { failed: ['a'] }), later).cssClass).toBe('failureold');
    expect(classifyRunCell(makeRun(1, {}, { aborted: true, testResult: 'failure' }), later).cssClass).toBe('aborted');
  });
});
