/**
 * Persistence seams of the sync.
 *
 * The importers only talk to these interfaces. `@repo-sync/db` implements
 * them on SQLite; tests use jest.fn fakes.
 */

import type { GitHubOrganizationPayload, GitHubRepositoryPayload } from '../github/schemas';
import type { BitbucketRepositoryPayload } from '../bitbucket/schemas';
import type {
  OAuthProvider,
  RemoteOrganization,
  RemoteRepository,
  SocialAccount,
  SocialToken,
  User
} from './types';

export interface SocialTokenStore {
  /** Tokens of the user's accounts for a provider, oldest first. */
  findTokens(username: string, provider: OAuthProvider): Promise<SocialToken[]>;
  findAccount(userId: string, provider: OAuthProvider): Promise<SocialAccount | null>;
}

/**
 * Upserts keyed by (provider, full name). Returns null when the repository is
 * skipped (privacy level, or already attached to another organization).
 */
export interface RemoteRepositoryStore {
  createFromGitHubApi(
    payload: GitHubRepositoryPayload,
    user: User,
    organization?: RemoteOrganization | null
  ): Promise<RemoteRepository | null>;

  createFromBitbucketApi(
    payload: BitbucketRepositoryPayload,
    user: User,
    organization?: RemoteOrganization | null
  ): Promise<RemoteRepository | null>;
}

export interface RemoteOrganizationStore {
  createFromGitHubApi(payload: GitHubOrganizationPayload, user: User): Promise<RemoteOrganization>;
}
