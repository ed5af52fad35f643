/**
 * Remote repository mirrors
 *
 * One row per (provider, full name). Re-importing a repository updates the
 * row and adds the importing user to its owners.
 */

import { v4 as uuid } from 'uuid';
import { Logger, type LoggerService } from '@nestjs/common';
import {
  parseProvider,
  type BitbucketRepositoryPayload,
  type GitHubRepositoryPayload,
  type OAuthProvider,
  type PrivacyLevel,
  type RemoteOrganization,
  type RemoteRepository,
  type RemoteRepositoryStore,
  type User
} from '@repo-sync/core';
import type { DatabaseType } from '../connection';

// --- Row mapping ---

interface RemoteRepositoryRow {
  id: string;
  vcs_provider: string;
  full_name: string;
  name: string;
  description: string | null;
  private: number;
  admin: number;
  ssh_url: string;
  clone_url: string;
  html_url: string;
  avatar_url: string | null;
  vcs: string;
  organization_id: string | null;
  json: string;
  created_at: string;
  updated_at: string;
}

export function rowToRemoteRepository(row: RemoteRepositoryRow): RemoteRepository {
  return {
    id: row.id,
    vcsProvider: parseProvider(row.vcs_provider),
    fullName: row.full_name,
    name: row.name,
    description: row.description,
    private: row.private !== 0,
    admin: row.admin !== 0,
    sshUrl: row.ssh_url,
    cloneUrl: row.clone_url,
    htmlUrl: row.html_url,
    avatarUrl: row.avatar_url,
    vcs: row.vcs,
    organizationId: row.organization_id,
    json: row.json,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

const COLUMNS = [
  'id', 'vcs_provider', 'full_name', 'name', 'description', 'private', 'admin', 'ssh_url',
  'clone_url', 'html_url', 'avatar_url', 'vcs', 'organization_id', 'json', 'created_at', 'updated_at'
];

type RepositoryFields = Omit<RemoteRepository, 'id' | 'organizationId' | 'createdAt' | 'updatedAt'>;

type UpsertParams = [
  string, string, string, string, string | null, number, number, string,
  string, string, string | null, string, string | null, string
];

/**
 * A repository is imported when it is public, or when the privacy level lets
 * private repositories in.
 */
export function isImportable(isPrivate: boolean, privacyLevel: PrivacyLevel): boolean {
  return privacyLevel === 'private' || !isPrivate;
}

// --- Repository ---

export type RemoteRepositoryRepositoryOptions = {
  privacyLevel?: PrivacyLevel;
  logger?: LoggerService;
};

export class RemoteRepositoryRepository implements RemoteRepositoryStore {
  private readonly privacyLevel: PrivacyLevel;
  private readonly logger: LoggerService;

  constructor(
    private readonly db: DatabaseType,
    options: RemoteRepositoryRepositoryOptions = {}
  ) {
    this.privacyLevel = options.privacyLevel ?? 'public';
    this.logger = options.logger ?? new Logger(RemoteRepositoryRepository.name);
  }

  async createFromGitHubApi(
    payload: GitHubRepositoryPayload,
    user: User,
    organization: RemoteOrganization | null = null
  ): Promise<RemoteRepository | null> {
    if (!isImportable(payload.private, this.privacyLevel)) {
      this.logger.debug?.(`Not importing ${payload.full_name}: private repositories are not imported`);
      return null;
    }

    return this.upsert(
      {
        vcsProvider: 'github',
        fullName: payload.full_name,
        name: payload.name,
        description: payload.description,
        private: payload.private,
        admin: payload.permissions?.admin ?? false,
        sshUrl: payload.ssh_url,
        cloneUrl: payload.private ? payload.ssh_url : payload.clone_url,
        htmlUrl: payload.html_url,
        avatarUrl: payload.owner?.avatar_url ?? null,
        vcs: 'git',
        json: JSON.stringify(payload)
      },
      user,
      organization
    );
  }

  async createFromBitbucketApi(
    payload: BitbucketRepositoryPayload,
    user: User,
    organization: RemoteOrganization | null = null
  ): Promise<RemoteRepository | null> {
    if (!isImportable(payload.is_private, this.privacyLevel)) {
      this.logger.debug?.(`Not importing ${payload.full_name}: private repositories are not imported`);
      return null;
    }

    const cloneUrls = new Map(payload.links.clone.map((link) => [link.name, link.href]));
    const sshUrl = cloneUrls.get('ssh') ?? '';

    return this.upsert(
      {
        vcsProvider: 'bitbucket',
        fullName: payload.full_name,
        name: payload.name,
        description: payload.description,
        private: payload.is_private,
        admin: false,
        sshUrl,
        cloneUrl: payload.is_private ? sshUrl : cloneUrls.get('https') ?? '',
        htmlUrl: payload.links.html.href,
        avatarUrl: payload.links.avatar?.href ?? null,
        vcs: payload.scm,
        json: JSON.stringify(payload)
      },
      user,
      organization
    );
  }

  findByFullName(vcsProvider: OAuthProvider, fullName: string): RemoteRepository | undefined {
    const row = this.db
      .prepare<[string, string], RemoteRepositoryRow>(
        `SELECT ${COLUMNS.join(', ')} FROM remote_repositories WHERE vcs_provider = ? AND full_name = ?`
      )
      .get(vcsProvider, fullName);
    return row ? rowToRemoteRepository(row) : undefined;
  }

  listForUser(userId: string): RemoteRepository[] {
    return this.db
      .prepare<[string], RemoteRepositoryRow>(`
        SELECT ${COLUMNS.map((column) => `r.${column}`).join(', ')}
        FROM remote_repositories r
        JOIN remote_repository_users ru ON ru.repository_id = r.id
        WHERE ru.user_id = ?
        ORDER BY r.full_name
      `)
      .all(userId)
      .map(rowToRemoteRepository);
  }

  private upsert(
    fields: RepositoryFields,
    user: User,
    organization: RemoteOrganization | null
  ): RemoteRepository | null {
    const run = this.db.transaction((): RemoteRepository | null => {
      const existing = this.findByFullName(fields.vcsProvider, fields.fullName);
      const organizationId = organization?.id ?? null;

      if (existing?.organizationId && existing.organizationId !== organizationId) {
        this.logger.debug?.(`Not importing ${fields.fullName}: it belongs to another organization`);
        return null;
      }

      this.db
        .prepare<UpsertParams>(`
          INSERT INTO remote_repositories (
            id, vcs_provider, full_name, name, description, private, admin, ssh_url,
            clone_url, html_url, avatar_url, vcs, organization_id, json
          )
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(vcs_provider, full_name) DO UPDATE SET
            name = excluded.name,
            description = excluded.description,
            private = excluded.private,
            admin = excluded.admin,
            ssh_url = excluded.ssh_url,
            clone_url = excluded.clone_url,
            html_url = excluded.html_url,
            avatar_url = excluded.avatar_url,
            vcs = excluded.vcs,
            organization_id = excluded.organization_id,
            json = excluded.json,
            updated_at = datetime('now')
        `)
        .run(
          existing?.id ?? uuid(),
          fields.vcsProvider,
          fields.fullName,
          fields.name,
          fields.description,
          fields.private ? 1 : 0,
          fields.admin ? 1 : 0,
          fields.sshUrl,
          fields.cloneUrl,
          fields.htmlUrl,
          fields.avatarUrl,
          fields.vcs,
          organizationId,
          fields.json
        );

      const stored = this.findByFullName(fields.vcsProvider, fields.fullName);
      if (!stored) {
        throw new Error(`Repository ${fields.fullName} missing after upsert`);
      }

      this.db
        .prepare<[string, string]>(
          'INSERT OR IGNORE INTO remote_repository_users (repository_id, user_id) VALUES (?, ?)'
        )
        .run(stored.id, user.id);

      return stored;
    });

    return run();
  }
}
