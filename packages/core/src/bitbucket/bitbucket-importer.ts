/**
 * Bitbucket Importer
 *
 * Mirrors the repositories of a user's Bitbucket account and of every team
 * the user has privileges on. Teams are not stored as organizations.
 */

import { Logger, type LoggerService } from '@nestjs/common';
import { DEFAULT_OAUTH_SYNC_CONFIG, type OAuthSyncConfig } from '../oauth/config';
import { MalformedResponseError, NoLinkedAccountError, RemoteSyncError } from '../oauth/errors';
import { parsePayload } from '../oauth/payload';
import type { OAuthSession } from '../oauth/session';
import type { SessionSource } from '../oauth/session-provider';
import type { RemoteRepositoryStore, SocialTokenStore } from '../oauth/stores';
import type { User } from '../oauth/types';
import { bitbucketPaginate } from './paginate';
import {
  BitbucketPageSchema,
  BitbucketPrivilegesSchema,
  BitbucketRepositorySchema
} from './schemas';

export type BitbucketImporterDeps = {
  sessions: SessionSource;
  accounts: Pick<SocialTokenStore, 'findAccount'>;
  repositories: RemoteRepositoryStore;
  config?: Pick<OAuthSyncConfig, 'bitbucketApiUrl'>;
  logger?: LoggerService;
};

export class BitbucketImporter {
  private readonly logger: LoggerService;
  private readonly apiUrl: string;

  constructor(private readonly deps: BitbucketImporterDeps) {
    this.logger = deps.logger ?? new Logger(BitbucketImporter.name);
    this.apiUrl = deps.config?.bitbucketApiUrl ?? DEFAULT_OAUTH_SYNC_CONFIG.bitbucketApiUrl;
  }

  /**
   * Import the user's repositories when `sync` is set.
   * Returns whether the user has a Bitbucket session, independent of the sync.
   * Throws NoLinkedAccountError when syncing a user without a Bitbucket account.
   */
  async importRepositories(user: User, sync: boolean): Promise<boolean> {
    const session = await this.deps.sessions.getSession(user, 'bitbucket');
    if (!session) {
      return false;
    }

    if (sync) {
      const account = await this.deps.accounts.findAccount(user.id, 'bitbucket');
      if (!account) {
        throw new NoLinkedAccountError(user.username, 'bitbucket');
      }

      try {
        const url = `${this.apiUrl}/2.0/repositories/${encodeURIComponent(account.uid)}`;
        const imported = await this.importPages(session, url, user);
        this.logger.log(`Synced ${imported} Bitbucket repositories for ${user.username}`);
      } catch (error) {
        if (error instanceof MalformedResponseError) {
          throw RemoteSyncError.repositories('Bitbucket', error);
        }
        throw error;
      }

      try {
        await this.syncTeamRepositories(session, user);
      } catch (error) {
        if (error instanceof MalformedResponseError) {
          throw RemoteSyncError.teamRepositories('Bitbucket', error);
        }
        throw error;
      }
    }

    return true;
  }

  private async syncTeamRepositories(session: OAuthSession, user: User): Promise<void> {
    const url = `${this.apiUrl}/1.0/user/privileges/`;
    const response = await session.get(url);
    const { teams } = parsePayload(BitbucketPrivilegesSchema, response.json(), url);

    for (const team of Object.keys(teams)) {
      const teamUrl = `${this.apiUrl}/2.0/teams/${encodeURIComponent(team)}/repositories`;
      const imported = await this.importPages(session, teamUrl, user);
      this.logger.log(`Synced ${imported} repositories of Bitbucket team ${team}`);
    }
  }

  private async importPages(session: OAuthSession, url: string, user: User): Promise<number> {
    const pages = await bitbucketPaginate(session, url);

    let imported = 0;
    for (const page of pages) {
      const { values } = parsePayload(BitbucketPageSchema, page, url);
      for (const item of values) {
        const repo = parsePayload(BitbucketRepositorySchema, item, url);
        const stored = await this.deps.repositories.createFromBitbucketApi(repo, user);
        if (stored) imported++;
      }
    }
    return imported;
  }
}
