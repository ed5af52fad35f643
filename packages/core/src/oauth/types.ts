/**
 * OAuth Sync Types
 *
 * Entities shared by the session provider, importers and stores:
 * - Users and the social accounts/tokens the login flow stored for them
 * - Remote repository and organization mirrors written by the importers
 * - Projects, read for webhook registration and token lookup
 */

import { UnsupportedProviderError } from './errors';

// ============================================================================
// Providers
// ============================================================================

export const OAUTH_PROVIDERS = ['github', 'bitbucket'] as const;

export type OAuthProvider = (typeof OAUTH_PROVIDERS)[number];

export function isOAuthProvider(value: string): value is OAuthProvider {
  return OAUTH_PROVIDERS.some((provider) => provider === value);
}

/**
 * Narrow an arbitrary provider id (job payloads, config) to a supported provider.
 */
export function parseProvider(value: string): OAuthProvider {
  if (!isOAuthProvider(value)) {
    throw new UnsupportedProviderError(value);
  }
  return value;
}

// ============================================================================
// Users and credentials
// ============================================================================

export type User = {
  id: string;
  username: string;
};

export type SocialApp = {
  id: string;
  provider: OAuthProvider;
  clientId: string;
  secret: string;
};

export type SocialAccount = {
  id: string;
  userId: string;
  provider: OAuthProvider;
  uid: string;
};

export type SocialToken = {
  id: string;
  accountId: string;
  token: string;
  tokenSecret: string;
  app: SocialApp;
};

// ============================================================================
// Remote mirrors
// ============================================================================

export type PrivacyLevel = 'public' | 'private';

export type RemoteOrganization = {
  id: string;
  vcsProvider: OAuthProvider;
  slug: string;
  name: string | null;
  email: string | null;
  avatarUrl: string | null;
  url: string | null;
  json: string;
  createdAt: string;
  updatedAt: string;
};

export type RemoteRepository = {
  id: string;
  vcsProvider: OAuthProvider;
  fullName: string;
  name: string;
  description: string | null;
  private: boolean;
  admin: boolean;
  sshUrl: string;
  cloneUrl: string;
  htmlUrl: string;
  avatarUrl: string | null;
  vcs: string;
  organizationId: string | null;
  json: string;
  createdAt: string;
  updatedAt: string;
};

// ============================================================================
// Projects
// ============================================================================

export type Project = {
  id: string;
  slug: string;
  repo: string; // source control URL
  users: User[];
};
