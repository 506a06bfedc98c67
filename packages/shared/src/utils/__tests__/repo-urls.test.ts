import { describe, it, expect } from 'vitest';

import { commitUrl } from '../repo-urls.js';

const HASH = 'aaaaaabbbbbbbbccccccdddddeeeeeefffffffff';

describe('commitUrl', () => {
  it.each([
    ['https://github.com/user/proj', 'https://github.com/user/proj/commit/'],
    ['https://github.com/user/proj/', 'https://github.com/user/proj/commit/'],
    ['https://github.com/user/proj.git', 'https://github.com/user/proj/commit/'],
    ['https://gitlab.com/user/repo.git', 'https://gitlab.com/user/repo/-/commit/'],
    ['https://gitlab.com/user/repo/', 'https://gitlab.com/user/repo/-/commit/'],
    ['https://invent.kde.org/pim/xyzzy', 'https://invent.kde.org/pim/xyzzy/-/commit/'],
    ['https://invent.kde.org/pim/xyzzy.git', 'https://invent.kde.org/pim/xyzzy/-/commit/'],
    ['https://pagure.io/category/repo.git', 'https://pagure.io/category/repo/c/'],
    ['https://pagure.io/category/repo/', 'https://pagure.io/category/repo/c/'],
    ['https://git.code.sf.net/p/legacy/code', 'https://sourceforge.net/p/legacy/code/ci/'],
    ['https://git.code.sf.net/p/legacy/', 'https://sourceforge.net/p/legacy/code/ci/'],
  ])('should link %s commits under %s', (repo, prefix) => {
    expect(commitUrl(repo, HASH)).toBe(prefix + HASH);
  });

  it('should return an empty string for unknown hosts', () => {
    expect(commitUrl('https://some.unknown.site/xyzzy.git', HASH)).toBe('');
  });

  it('should return an empty string for an incomplete SourceForge URL', () => {
    expect(commitUrl('https://git.code.sf.net/p/', HASH)).toBe('');
  });

  it('should return an empty string for something that is not a URL', () => {
    expect(commitUrl('not a url', HASH)).toBe('');
  });
});
