/**
 * Social accounts, OAuth applications and tokens
 *
 * Rows are written by the social login flow; the sync only reads them
 * through the SocialTokenStore methods.
 */

import { v4 as uuid } from 'uuid';
import {
  parseProvider,
  type OAuthProvider,
  type SocialAccount,
  type SocialApp,
  type SocialToken,
  type SocialTokenStore
} from '@repo-sync/core';
import type { DatabaseType } from '../connection';

// --- Row mapping ---

interface SocialAccountRow {
  id: string;
  user_id: string;
  provider: string;
  uid: string;
}

interface SocialTokenRow {
  id: string;
  account_id: string;
  token: string;
  token_secret: string;
  app_id: string;
  provider: string;
  client_id: string;
  secret: string;
}

function rowToAccount(row: SocialAccountRow): SocialAccount {
  return {
    id: row.id,
    userId: row.user_id,
    provider: parseProvider(row.provider),
    uid: row.uid
  };
}

function rowToToken(row: SocialTokenRow): SocialToken {
  return {
    id: row.id,
    accountId: row.account_id,
    token: row.token,
    tokenSecret: row.token_secret,
    app: {
      id: row.app_id,
      provider: parseProvider(row.provider),
      clientId: row.client_id,
      secret: row.secret
    }
  };
}

// --- Repository ---

export type SaveTokenParams = {
  appId: string;
  accountId: string;
  token: string;
  tokenSecret?: string;
};

export class SocialAccountRepository implements SocialTokenStore {
  constructor(private readonly db: DatabaseType) {}

  createApp(params: Omit<SocialApp, 'id'>): SocialApp {
    const app: SocialApp = { id: uuid(), ...params };
    this.db
      .prepare<[string, string, string, string]>(
        'INSERT INTO social_apps (id, provider, client_id, secret) VALUES (?, ?, ?, ?)'
      )
      .run(app.id, app.provider, app.clientId, app.secret);
    return app;
  }

  linkAccount(userId: string, provider: OAuthProvider, uid: string): SocialAccount {
    const account: SocialAccount = { id: uuid(), userId, provider, uid };
    this.db
      .prepare<[string, string, string, string]>(
        'INSERT INTO social_accounts (id, user_id, provider, uid) VALUES (?, ?, ?, ?)'
      )
      .run(account.id, account.userId, account.provider, account.uid);
    return account;
  }

  /**
   * Store a token, replacing the one the account already has for the app.
   */
  saveToken(params: SaveTokenParams): void {
    this.db
      .prepare<[string, string, string, string, string]>(`
        INSERT INTO social_tokens (id, app_id, account_id, token, token_secret)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(app_id, account_id) DO UPDATE SET
          token = excluded.token,
          token_secret = excluded.token_secret
      `)
      .run(uuid(), params.appId, params.accountId, params.token, params.tokenSecret ?? '');
  }

  async findTokens(username: string, provider: OAuthProvider): Promise<SocialToken[]> {
    const rows = this.db
      .prepare<[string, string], SocialTokenRow>(`
        SELECT t.id, t.account_id, t.token, t.token_secret,
               p.id AS app_id, p.provider, p.client_id, p.secret
        FROM social_tokens t
        JOIN social_apps p ON p.id = t.app_id
        JOIN social_accounts a ON a.id = t.account_id
        JOIN users u ON u.id = a.user_id
        WHERE u.username = ? AND p.provider = ?
        ORDER BY t.rowid
      `)
      .all(username, provider);

    return rows.map(rowToToken);
  }

  async findAccount(userId: string, provider: OAuthProvider): Promise<SocialAccount | null> {
    const row = this.db
      .prepare<[string, string], SocialAccountRow>(`
        SELECT id, user_id, provider, uid
        FROM social_accounts
        WHERE user_id = ? AND provider = ?
        ORDER BY rowid
        LIMIT 1
      `)
      .get(userId, provider);

    return row ? rowToAccount(row) : null;
  }
}
