/**
 * OAuth Session Interface and Types
 *
 * A session is an authenticated HTTP client bound to one vendor account.
 * The interface is implemented by:
 * - GitHubOAuth2Session: bearer token over Octokit
 * - BitbucketOAuth1Session: HMAC-SHA1 signed requests over fetch
 * - StubOAuthSession: canned responses for testing (no real API calls)
 *
 * HTTP error statuses never throw; callers inspect the status or the body.
 */

import { MalformedResponseError } from './errors';
import type { OAuthProvider } from './types';

// ============================================================================
// Link header
// ============================================================================

export type LinkRelation = {
  url: string;
  rel: string;
  [param: string]: string;
};

/**
 * Parse an RFC 8288 `Link` header into relations keyed by `rel`.
 */
export function parseLinkHeader(header: string | undefined): Record<string, LinkRelation> {
  const links: Record<string, LinkRelation> = {};
  if (!header) return links;

  for (const match of header.matchAll(/<([^>]*)>([^<]*)/g)) {
    const relation: LinkRelation = { url: match[1], rel: '' };
    const params = match[2].replace(/,\s*$/, '');

    for (const part of params.split(';')) {
      const separator = part.indexOf('=');
      if (separator === -1) continue;
      const key = part.slice(0, separator).trim().toLowerCase();
      const value = part.slice(separator + 1).trim().replace(/^"(.*)"$/, '$1');
      if (key) relation[key] = value;
    }

    links[relation.rel || relation.url] = relation;
  }

  return links;
}

// ============================================================================
// Responses
// ============================================================================

export type ResponseBody = { json: unknown } | { text: string };

export class SessionResponse {
  readonly links: Record<string, LinkRelation>;

  constructor(
    readonly url: string,
    readonly status: number,
    readonly headers: Record<string, string>,
    private readonly body: ResponseBody
  ) {
    this.links = parseLinkHeader(headers['link']);
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  /**
   * Decoded body. Throws MalformedResponseError when the body is not JSON.
   */
  json(): unknown {
    if ('json' in this.body) {
      return this.body.json;
    }

    try {
      const parsed: unknown = JSON.parse(this.body.text);
      return parsed;
    } catch {
      throw MalformedResponseError.invalidJson(this.url);
    }
  }
}

// ============================================================================
// Session Interface
// ============================================================================

export type PostPayload =
  | { json: unknown }
  | { form: Record<string, string> };

export interface OAuthSession {
  readonly provider: OAuthProvider;
  get(url: string): Promise<SessionResponse>;
  post(url: string, payload: PostPayload): Promise<SessionResponse>;
}

/**
 * Encode a post payload as a request body.
 */
export function encodePayload(payload: PostPayload): { contentType: string; body: string } {
  if ('json' in payload) {
    return { contentType: 'application/json', body: JSON.stringify(payload.json) };
  }
  return {
    contentType: 'application/x-www-form-urlencoded',
    body: new URLSearchParams(payload.form).toString()
  };
}

// ============================================================================
// Stub Implementation (for testing)
// ============================================================================

export type StubResponse = {
  status?: number;
  body?: unknown;
  text?: string;
  headers?: Record<string, string>;
};

export type RecordedRequest = {
  method: 'GET' | 'POST';
  url: string;
  payload?: PostPayload;
};

/**
 * Stub implementation of OAuthSession for testing.
 * Responses are queued per method and URL; the last queued response repeats.
 * Unknown URLs answer 404 with a GitHub-style error body.
 */
export class StubOAuthSession implements OAuthSession {
  private readonly routes = new Map<string, StubResponse[]>();
  private readonly requests: RecordedRequest[] = [];

  constructor(readonly provider: OAuthProvider = 'github') {}

  respondTo(method: 'GET' | 'POST', url: string, response: StubResponse): this {
    const key = `${method} ${url}`;
    const queue = this.routes.get(key) ?? [];
    queue.push(response);
    this.routes.set(key, queue);
    return this;
  }

  async get(url: string): Promise<SessionResponse> {
    this.requests.push({ method: 'GET', url });
    return this.reply('GET', url);
  }

  async post(url: string, payload: PostPayload): Promise<SessionResponse> {
    this.requests.push({ method: 'POST', url, payload });
    return this.reply('POST', url);
  }

  // Test helpers
  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  reset(): void {
    this.routes.clear();
    this.requests.length = 0;
  }

  private reply(method: 'GET' | 'POST', url: string): SessionResponse {
    const queue = this.routes.get(`${method} ${url}`) ?? [];
    const stub = queue.length > 1 ? queue.shift() : queue[0];

    if (!stub) {
      return new SessionResponse(url, 404, {}, { json: { message: 'Not Found' } });
    }

    const body: ResponseBody =
      stub.text !== undefined ? { text: stub.text } : { json: stub.body ?? null };
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(stub.headers ?? {})) {
      headers[name.toLowerCase()] = value;
    }

    return new SessionResponse(url, stub.status ?? 200, headers, body);
  }
}
