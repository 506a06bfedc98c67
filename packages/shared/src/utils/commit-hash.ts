import { COMMIT_HASH_DISPLAY_LENGTH } from '../constants/index.js';

/**
 * Compares two commit hashes that may be abbreviated to different lengths.
 * The shorter one must be a prefix of the longer one; an empty hash never
 * matches anything, not even another empty hash.
 */
export function hashesMatch(a: string, b: string): boolean {
  if (!a || !b) {
    return false;
  }
  return a.length <= b.length ? b.startsWith(a) : a.startsWith(b);
}

export function shortHash(hash: string): string {
  return hash.slice(0, COMMIT_HASH_DISPLAY_LENGTH);
}
