import { MalformedResponseError } from '../oauth/errors';
import type { OAuthSession } from '../oauth/session';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collect every page of a Bitbucket 2.0 list endpoint.
 *
 * Follows the `next` URL in each page body. Pages are returned as they came,
 * one element per page; callers read `values` themselves.
 */
export async function bitbucketPaginate(session: OAuthSession, url: string): Promise<unknown[]> {
  const result: unknown[] = [];
  let next: string | undefined = url;

  while (next) {
    const response = await session.get(next);
    const page = response.json();

    if (!isRecord(page)) {
      throw MalformedResponseError.notAnObject(next);
    }

    result.push(page);
    const nextUrl = page['next'];
    next = typeof nextUrl === 'string' && nextUrl !== '' ? nextUrl : undefined;
  }

  return result;
}
