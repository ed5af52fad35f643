export type Migration = {
  version: number;
  name: string;
  sql: string;
};

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_users_and_social_accounts',
    sql: `
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        username TEXT NOT NULL UNIQUE,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS social_apps (
        id TEXT PRIMARY KEY,
        provider TEXT NOT NULL,
        client_id TEXT NOT NULL,
        secret TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS social_accounts (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        provider TEXT NOT NULL,
        uid TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE(provider, uid)
      );
      CREATE INDEX IF NOT EXISTS idx_social_accounts_user_id ON social_accounts(user_id);

      CREATE TABLE IF NOT EXISTS social_tokens (
        id TEXT PRIMARY KEY,
        app_id TEXT NOT NULL REFERENCES social_apps(id) ON DELETE CASCADE,
        account_id TEXT NOT NULL REFERENCES social_accounts(id) ON DELETE CASCADE,
        token TEXT NOT NULL,
        token_secret TEXT NOT NULL DEFAULT '',
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE(app_id, account_id)
      );
    `
  },
  {
    version: 2,
    name: 'create_projects',
    sql: `
      CREATE TABLE IF NOT EXISTS projects (
        id TEXT PRIMARY KEY,
        slug TEXT NOT NULL UNIQUE,
        repo TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS project_users (
        project_id TEXT NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY (project_id, user_id)
      );
    `
  },
  {
    version: 3,
    name: 'create_remote_organizations',
    sql: `
      CREATE TABLE IF NOT EXISTS remote_organizations (
        id TEXT PRIMARY KEY,
        vcs_provider TEXT NOT NULL,
        slug TEXT NOT NULL,
        name TEXT,
        email TEXT,
        avatar_url TEXT,
        url TEXT,
        json TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE(vcs_provider, slug)
      );

      CREATE TABLE IF NOT EXISTS remote_organization_users (
        organization_id TEXT NOT NULL REFERENCES remote_organizations(id) ON DELETE CASCADE,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        PRIMARY KEY (organization_id, user_id)
      );
    `
  },
  {
    version: 4,
    name: 'create_remote_repositories',
    sql: `
      CREATE TABLE IF NOT EXISTS remote_repositories (
        id TEXT PRIMARY KEY,
        vcs_provider TEXT NOT NULL,
        full_name TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        private INTEGER NOT NULL DEFAULT 0,
        admin INTEGER NOT NULL DEFAULT 0,
        ssh_url TEXT NOT NULL,
        clone_url TEXT NOT NULL,
        html_url TEXT NOT NULL,
        avatar_url TEXT,
        vcs TEXT NOT NULL,
        organization_id TEXT REFERENCES remote_organizations(id) ON DELETE SET NULL,
        json TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE(vcs_provider, full_name)
      );
      CREATE INDEX IF NOT EXISTS idx_remote_repositories_organization_id ON remote_repositories(organization_id);

      CREATE TABLE IF NOT EXISTS remote_repository_users (
        repository_id TEXT NOT NULL REFERENCES remote_repositories(id) ON DELETE CASCADE,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        PRIMARY KEY (repository_id, user_id)
      );
    `
  }
];
