/**
 * GitHub OAuth2 Session
 *
 * Implements OAuthSession on top of Octokit. The user's OAuth token is sent
 * as `Authorization: bearer <token>` on every request, including requests to
 * absolute URLs taken from Link headers.
 */

import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import {
  SessionResponse,
  encodePayload,
  type OAuthSession,
  type PostPayload,
  type ResponseBody
} from '../oauth/session';

export type GitHubSessionParams = {
  clientId: string;
  accessToken: string;
  userAgent?: string;
};

type RawResponse = {
  status: number;
  headers: Record<string, string | number | undefined>;
  data: unknown;
};

function normalizeHeaders(headers: Record<string, string | number | undefined>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      normalized[name.toLowerCase()] = String(value);
    }
  }
  return normalized;
}

function toBody(data: unknown): ResponseBody {
  // Octokit parses JSON bodies and hands back everything else as text
  return typeof data === 'string' ? { text: data } : { json: data };
}

export class GitHubOAuth2Session implements OAuthSession {
  readonly provider = 'github' as const;
  readonly clientId: string;
  private readonly octokit: Octokit;

  constructor(params: GitHubSessionParams) {
    this.clientId = params.clientId;
    this.octokit = new Octokit({ userAgent: params.userAgent ?? 'repo-sync' });

    const authorization = `bearer ${params.accessToken}`;
    this.octokit.hook.before('request', (options) => {
      options.headers.authorization = authorization;
    });
  }

  async get(url: string): Promise<SessionResponse> {
    return this.send(url, () => this.octokit.request(`GET ${url}`));
  }

  async post(url: string, payload: PostPayload): Promise<SessionResponse> {
    const { contentType, body } = encodePayload(payload);
    return this.send(url, () =>
      this.octokit.request(`POST ${url}`, {
        data: body,
        headers: { 'content-type': contentType }
      })
    );
  }

  private async send(url: string, call: () => Promise<RawResponse>): Promise<SessionResponse> {
    try {
      const response = await call();
      return new SessionResponse(url, response.status, normalizeHeaders(response.headers), toBody(response.data));
    } catch (error) {
      // Error statuses are returned like any other response
      if (error instanceof RequestError && error.response) {
        return new SessionResponse(
          url,
          error.status,
          normalizeHeaders(error.response.headers),
          toBody(error.response.data)
        );
      }
      throw error;
    }
  }
}
