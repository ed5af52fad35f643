import { MalformedResponseError } from '../oauth/errors';
import type { OAuthSession } from '../oauth/session';

/**
 * Combine every page of a GitHub list endpoint into one flat list.
 *
 * Follows the `next` relation of the Link header until it is absent.
 * See https://docs.github.com/en/rest/using-the-rest-api/using-pagination-in-the-rest-api
 */
export async function githubPaginate(session: OAuthSession, url: string): Promise<unknown[]> {
  const result: unknown[] = [];
  let next: string | undefined = url;

  while (next) {
    const response = await session.get(next);
    const page = response.json();

    if (!Array.isArray(page)) {
      throw MalformedResponseError.notAList(next);
    }

    result.push(...page);
    next = response.links['next']?.url;
  }

  return result;
}
