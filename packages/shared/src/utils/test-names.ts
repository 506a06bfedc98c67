/**
 * Ordering of test names
 *
 * Test suites name their tests either by number ("1234") or by text
 * ("test_download"), sometimes both within one job. Numeric names sort by
 * value and always before textual ones.
 */

export type TestNameKey =
  | { readonly kind: 'numeric'; readonly value: number; readonly raw: string }
  | { readonly kind: 'textual'; readonly raw: string };

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;

export function testNameKey(name: string): TestNameKey {
  if (INTEGER_RE.test(name)) {
    const value = Number.parseInt(name, 10);
    if (Number.isSafeInteger(value)) {
      return { kind: 'numeric', value, raw: name };
    }
  }
  return { kind: 'textual', raw: name };
}

function compareStrings(a: string, b: string): number {
  if (a < b) {return -1;}
  if (a > b) {return 1;}
  return 0;
}

export function compareTestNameKeys(a: TestNameKey, b: TestNameKey): number {
  if (a.kind === 'numeric' && b.kind === 'numeric') {
    // "7" and "007" are the same number; fall back to the text for a total order
    return a.value - b.value || compareStrings(a.raw, b.raw);
  }
  if (a.kind === 'numeric') {return -1;}
  if (b.kind === 'numeric') {return 1;}
  return compareStrings(a.raw, b.raw);
}

export function compareTestNames(a: string, b: string): number {
  return compareTestNameKeys(testNameKey(a), testNameKey(b));
}

/**
 * Returns a sorted copy of the names
 */
export function sortTestNames(names: Iterable<string>): string[] {
  return Array.from(names, testNameKey)
    .sort(compareTestNameKeys)
    .map((key) => key.raw);
}

/**
 * Returns a copy of the items sorted by the test name each one carries
 */
export function sortByTestName<T>(items: Iterable<T>, nameOf: (item: T) => string): T[] {
  return Array.from(items, (item) => ({ item, key: testNameKey(nameOf(item)) }))
    .sort((a, b) => compareTestNameKeys(a.key, b.key))
    .map(({ item }) => item);
}
