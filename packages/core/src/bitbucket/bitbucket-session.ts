/**
 * Bitbucket OAuth1 Session
 *
 * Signs every request with HMAC-SHA1 using the OAuth application's consumer
 * key/secret and the user's resource-owner key/secret. Form bodies are part
 * of the signature base string; JSON bodies are not.
 */

import { createHmac } from 'crypto';
import OAuth from 'oauth-1.0a';
import {
  SessionResponse,
  encodePayload,
  type OAuthSession,
  type PostPayload
} from '../oauth/session';

export type BitbucketSessionParams = {
  consumerKey: string;
  consumerSecret: string;
  resourceOwnerKey: string;
  resourceOwnerSecret: string;
};

export class BitbucketOAuth1Session implements OAuthSession {
  readonly provider = 'bitbucket' as const;
  private readonly oauth: OAuth;
  private readonly owner: OAuth.Token;

  constructor(params: BitbucketSessionParams) {
    this.oauth = new OAuth({
      consumer: { key: params.consumerKey, secret: params.consumerSecret },
      signature_method: 'HMAC-SHA1',
      hash_function: (baseString, key) => createHmac('sha1', key).update(baseString).digest('base64')
    });
    this.owner = { key: params.resourceOwnerKey, secret: params.resourceOwnerSecret };
  }

  async get(url: string): Promise<SessionResponse> {
    return this.send(url, 'GET');
  }

  async post(url: string, payload: PostPayload): Promise<SessionResponse> {
    return this.send(url, 'POST', payload);
  }

  /**
   * Signed `Authorization` header value for a request.
   */
  authorizationHeader(url: string, method: string, form?: Record<string, string>): string {
    const authorization = this.oauth.authorize({ url, method, data: form }, this.owner);
    return this.oauth.toHeader(authorization).Authorization;
  }

  private async send(url: string, method: 'GET' | 'POST', payload?: PostPayload): Promise<SessionResponse> {
    const form = payload && 'form' in payload ? payload.form : undefined;
    const headers: Record<string, string> = {
      Authorization: this.authorizationHeader(url, method, form)
    };

    let body: string | undefined;
    if (payload) {
      const encoded = encodePayload(payload);
      headers['Content-Type'] = encoded.contentType;
      body = encoded.body;
    }

    const response = await fetch(url, { method, headers, body });

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      responseHeaders[name.toLowerCase()] = value;
    });

    return new SessionResponse(url, response.status, responseHeaders, { text: await response.text() });
  }
}
