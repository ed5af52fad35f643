/**
 * OAuth Session Provider
 *
 * Builds an authenticated session for a user from the first credential the
 * social login flow stored for the provider.
 */

import { BitbucketOAuth1Session } from '../bitbucket/bitbucket-session';
import { GitHubOAuth2Session } from '../github/github-session';
import { UnsupportedProviderError } from './errors';
import type { OAuthSession } from './session';
import type { SocialTokenStore } from './stores';
import type { OAuthProvider, SocialToken, User } from './types';

export type SessionFactory = (provider: OAuthProvider, token: SocialToken) => OAuthSession;

/**
 * Create the session matching the provider's OAuth flavour.
 */
export function createOAuthSession(provider: OAuthProvider, token: SocialToken): OAuthSession {
  switch (provider) {
    case 'github':
      return new GitHubOAuth2Session({
        clientId: token.app.clientId,
        accessToken: token.token
      });

    case 'bitbucket':
      return new BitbucketOAuth1Session({
        consumerKey: token.app.clientId,
        consumerSecret: token.app.secret,
        resourceOwnerKey: token.token,
        resourceOwnerSecret: token.tokenSecret
      });

    default: {
      const unsupported: never = provider;
      throw new UnsupportedProviderError(String(unsupported));
    }
  }
}

/** What importers and workers need from the provider. */
export type SessionSource = Pick<OAuthSessionProvider, 'getSession'>;

export class OAuthSessionProvider {
  constructor(
    private readonly tokens: Pick<SocialTokenStore, 'findTokens'>,
    private readonly createSession: SessionFactory = createOAuthSession
  ) {}

  /**
   * Returns null when the user has no credential for the provider.
   */
  async getSession(user: User, provider: OAuthProvider): Promise<OAuthSession | null> {
    const [token] = await this.tokens.findTokens(user.username, provider);
    if (!token) {
      return null;
    }
    return this.createSession(provider, token);
  }
}
