/**
 * GitHub Importer
 *
 * Mirrors a user's GitHub repositories and organizations:
 * 1. Every repository the user can see (`/user/repos`)
 * 2. Every organization the user belongs to, with its repositories
 *
 * A malformed response in either phase is reported as a RemoteSyncError
 * asking the user to reconnect. Records written before the failure stay.
 */

import { Logger, type LoggerService } from '@nestjs/common';
import { DEFAULT_OAUTH_SYNC_CONFIG, type OAuthSyncConfig } from '../oauth/config';
import { MalformedResponseError, RemoteSyncError } from '../oauth/errors';
import { parsePayload } from '../oauth/payload';
import type { OAuthSession } from '../oauth/session';
import type { SessionSource } from '../oauth/session-provider';
import type { RemoteOrganizationStore, RemoteRepositoryStore } from '../oauth/stores';
import type { RemoteOrganization, User } from '../oauth/types';
import { githubPaginate } from './paginate';
import {
  GitHubOrganizationListSchema,
  GitHubOrganizationSchema,
  GitHubRepositorySchema
} from './schemas';

export type GitHubImporterDeps = {
  sessions: SessionSource;
  repositories: RemoteRepositoryStore;
  organizations: RemoteOrganizationStore;
  config?: Pick<OAuthSyncConfig, 'githubApiUrl'>;
  logger?: LoggerService;
};

export class GitHubImporter {
  private readonly logger: LoggerService;
  private readonly apiUrl: string;

  constructor(private readonly deps: GitHubImporterDeps) {
    this.logger = deps.logger ?? new Logger(GitHubImporter.name);
    this.apiUrl = deps.config?.githubApiUrl ?? DEFAULT_OAUTH_SYNC_CONFIG.githubApiUrl;
  }

  /**
   * Import the user's repositories when `sync` is set.
   * Returns whether the user has a GitHub session, independent of the sync.
   */
  async importRepositories(user: User, sync: boolean): Promise<boolean> {
    const session = await this.deps.sessions.getSession(user, 'github');
    if (!session) {
      return false;
    }

    if (sync) {
      try {
        await this.syncUserRepositories(session, user);
      } catch (error) {
        if (error instanceof MalformedResponseError) {
          throw RemoteSyncError.repositories('GitHub', error);
        }
        throw error;
      }

      try {
        await this.syncOrganizations(session, user);
      } catch (error) {
        if (error instanceof MalformedResponseError) {
          throw RemoteSyncError.organizations('GitHub', error);
        }
        throw error;
      }
    }

    return true;
  }

  private async syncUserRepositories(session: OAuthSession, user: User): Promise<void> {
    const url = `${this.apiUrl}/user/repos?per_page=100`;
    const repos = await githubPaginate(session, url);

    const imported = await this.upsertRepositories(repos, url, user, null);
    this.logger.log(`Synced ${imported}/${repos.length} GitHub repositories for ${user.username}`);
  }

  private async syncOrganizations(session: OAuthSession, user: User): Promise<void> {
    const url = `${this.apiUrl}/user/orgs`;
    const response = await session.get(url);
    const orgs = parsePayload(GitHubOrganizationListSchema, response.json(), url);

    for (const { login } of orgs) {
      const orgUrl = `${this.apiUrl}/orgs/${encodeURIComponent(login)}`;
      const orgResponse = await session.get(orgUrl);
      const organization = await this.deps.organizations.createFromGitHubApi(
        parsePayload(GitHubOrganizationSchema, orgResponse.json(), orgUrl),
        user
      );

      const reposUrl = `${orgUrl}/repos?per_page=100`;
      const repos = await githubPaginate(session, reposUrl);
      const imported = await this.upsertRepositories(repos, reposUrl, user, organization);
      this.logger.log(`Synced ${imported}/${repos.length} repositories of GitHub organization ${login}`);
    }
  }

  private async upsertRepositories(
    repos: unknown[],
    url: string,
    user: User,
    organization: RemoteOrganization | null
  ): Promise<number> {
    let imported = 0;
    for (const item of repos) {
      const repo = parsePayload(GitHubRepositorySchema, item, url);
      const stored = await this.deps.repositories.createFromGitHubApi(repo, user, organization);
      if (stored) imported++;
    }
    return imported;
  }
}
