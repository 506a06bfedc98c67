/**
 * Source repository URL helpers
 */

type CommitUrlBuilder = (base: string, path: string[]) => string;

const GITLAB_STYLE: CommitUrlBuilder = (base) => `${base}/-/commit/`;

const COMMIT_URL_BUILDERS: Readonly<Record<string, CommitUrlBuilder>> = {
  'github.com': (base) => `${base}/commit/`,
  'gitlab.com': GITLAB_STYLE,
  'invent.kde.org': GITLAB_STYLE,
  'pagure.io': (base) => `${base}/c/`,
  'git.code.sf.net': (_base, path) => {
    // git.code.sf.net/p/<project>/<repo> is browsed at sourceforge.net/p/<project>/<repo>/ci/
    const [kind, project, repo = 'code'] = path;
    if (kind !== 'p' || !project) {
      return '';
    }
    return `https://sourceforge.net/p/${project}/${repo}/ci/`;
  },
};

/**
 * Returns a link to a commit on the web page of the repository, or an empty
 * string when the host is not a known forge.
 */
export function commitUrl(repoUrl: string, commitHash: string): string {
  let url: URL;
  try {
    url = new URL(repoUrl);
  } catch {
    return '';
  }
  const builder = COMMIT_URL_BUILDERS[url.host.toLowerCase()];
  if (!builder) {
    return '';
  }
  const path = url.pathname
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
    .split('/')
    .filter((part) => part.length > 0);
  const prefix = builder(`${url.protocol}//${url.host}/${path.join('/')}`, path);
  return prefix ? prefix + commitHash : '';
}

