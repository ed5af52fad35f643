/**
 * Owner/repository extraction from source control URLs.
 *
 * Accepts https, ssh (`git@host:owner/repo.git`), `ssh://` and `git://` forms.
 * A trailing `.git`, slash or deeper path (`/tree/main`) is ignored.
 */

export type RepoCoordinates = {
  owner: string;
  repo: string;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function parseRepoUrl(url: string, host: string): RepoCoordinates | null {
  const pattern = new RegExp(
    `(?:^|[@/])(?:www\\.)?${escapeRegExp(host)}[:/]([^/\\s:]+)/([^/\\s?#]+?)(?:\\.git)?(?:[/?#].*)?$`
  );
  const match = url.trim().match(pattern);
  if (!match) return null;
  return { owner: match[1], repo: match[2] };
}

export function getGitHubUsernameRepo(url: string): RepoCoordinates | null {
  return parseRepoUrl(url, 'github.com');
}

export function getBitbucketUsernameRepo(url: string): RepoCoordinates | null {
  return parseRepoUrl(url, 'bitbucket.org');
}
