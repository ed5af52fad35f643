import { v4 as uuid } from 'uuid';
import {
  parseProvider,
  type GitHubOrganizationPayload,
  type OAuthProvider,
  type RemoteOrganization,
  type RemoteOrganizationStore,
  type User
} from '@repo-sync/core';
import type { DatabaseType } from '../connection';

interface RemoteOrganizationRow {
  id: string;
  vcs_provider: string;
  slug: string;
  name: string | null;
  email: string | null;
  avatar_url: string | null;
  url: string | null;
  json: string;
  created_at: string;
  updated_at: string;
}

export function rowToRemoteOrganization(row: RemoteOrganizationRow): RemoteOrganization {
  return {
    id: row.id,
    vcsProvider: parseProvider(row.vcs_provider),
    slug: row.slug,
    name: row.name,
    email: row.email,
    avatarUrl: row.avatar_url,
    url: row.url,
    json: row.json,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

const COLUMNS = 'id, vcs_provider, slug, name, email, avatar_url, url, json, created_at, updated_at';

export class RemoteOrganizationRepository implements RemoteOrganizationStore {
  constructor(private readonly db: DatabaseType) {}

  async createFromGitHubApi(payload: GitHubOrganizationPayload, user: User): Promise<RemoteOrganization> {
    const upsert = this.db.transaction((): RemoteOrganization => {
      this.db
        .prepare<[string, string, string | null, string | null, string | null, string | null, string]>(`
          INSERT INTO remote_organizations (id, vcs_provider, slug, name, email, avatar_url, url, json)
          VALUES (?, 'github', ?, ?, ?, ?, ?, ?)
          ON CONFLICT(vcs_provider, slug) DO UPDATE SET
            name = excluded.name,
            email = excluded.email,
            avatar_url = excluded.avatar_url,
            url = excluded.url,
            json = excluded.json,
            updated_at = datetime('now')
        `)
        .run(
          uuid(),
          payload.login,
          payload.name ?? null,
          payload.email ?? null,
          payload.avatar_url ?? null,
          payload.html_url ?? null,
          JSON.stringify(payload)
        );

      const organization = this.findBySlug('github', payload.login);
      if (!organization) {
        throw new Error(`Organization ${payload.login} missing after upsert`);
      }

      this.db
        .prepare<[string, string]>(
          'INSERT OR IGNORE INTO remote_organization_users (organization_id, user_id) VALUES (?, ?)'
        )
        .run(organization.id, user.id);

      return organization;
    });

    return upsert();
  }

  findBySlug(vcsProvider: OAuthProvider, slug: string): RemoteOrganization | undefined {
    const row = this.db
      .prepare<[string, string], RemoteOrganizationRow>(
        `SELECT ${COLUMNS} FROM remote_organizations WHERE vcs_provider = ? AND slug = ?`
      )
      .get(vcsProvider, slug);
    return row ? rowToRemoteOrganization(row) : undefined;
  }

  listForUser(userId: string): RemoteOrganization[] {
    return this.db
      .prepare<[string], RemoteOrganizationRow>(`
        SELECT ${COLUMNS.split(', ').map((column) => `o.${column}`).join(', ')}
        FROM remote_organizations o
        JOIN remote_organization_users ou ON ou.organization_id = o.id
        WHERE ou.user_id = ?
        ORDER BY o.slug
      `)
      .all(userId)
      .map(rowToRemoteOrganization);
  }
}
