import { describe, it, expect } from 'vitest';

import { compareTestNames, sortByTestName, sortTestNames, testNameKey } from '../test-names.js';

describe('test name ordering', () => {
  describe('testNameKey', () => {
    it('should parse integer names as numeric keys', () => {
      expect(testNameKey('1234')).toEqual({ kind: 'numeric', value: 1234, raw: '1234' });
      expect(testNameKey('-5')).toEqual({ kind: 'numeric', value: -5, raw: '-5' });
    });

    it('should keep other names as textual keys', () => {
      expect(testNameKey('test_1')).toEqual({ kind: 'textual', raw: 'test_1' });
      expect(testNameKey('1.5')).toEqual({ kind: 'textual', raw: '1.5' });
      expect(testNameKey('')).toEqual({ kind: 'textual', raw: '' });
    });
  });

  describe('sortTestNames', () => {
    it('should sort numeric names by value', () => {
      expect(sortTestNames(['100', '9', '1000', '20'])).toEqual(['9', '20', '100', '1000']);
    });

    it('should sort textual names lexically', () => {
      expect(sortTestNames(['test_b', 'Test_c', 'test_a'])).toEqual(['Test_c', 'test_a', 'test_b']);
    });

    it('should put numeric names before textual ones in a mixed list', () => {
      expect(sortTestNames(['zeta', '30', 'alpha', '4'])).toEqual(['4', '30', 'alpha', 'zeta']);
    });

    it('should give equal numbers a stable order by their text', () => {
      expect(sortTestNames(['7', '007'])).toEqual(['007', '7']);
      expect(compareTestNames('007', '7')).toBeLessThan(0);
      expect(compareTestNames('7', '7')).toBe(0);
    });

    it('should not modify its input', () => {
      const names = ['2', '1'];
      sortTestNames(names);
      expect(names).toEqual(['2', '1']);
    });
  });

  describe('sortByTestName', () => {
    it('should order items by the name they carry', () => {
      const items = [
        { testName: 'beta', ratio: 0.5 },
        { testName: '12', ratio: 0.1 },
        { testName: '3', ratio: 0.2 },
      ];

      expect(sortByTestName(items, (item) => item.testName).map((item) => item.testName)).toEqual([
        '3',
        '12',
        'beta',
      ]);
    });
  });
});
