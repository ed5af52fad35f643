/**
 * OAuth Sync Configuration
 *
 * Environment Variables:
 *   ALLOW_PRIVATE_REPOS     - Enable project token lookup (default false)
 *   DONT_HIT_DB             - Resolve project tokens through the project API (default true)
 *   PRODUCTION_DOMAIN       - Host the vendor webhooks point at
 *   DEFAULT_PRIVACY_LEVEL   - public|private, which repositories get imported
 *   GITHUB_API_URL          - GitHub REST base URL (GitHub Enterprise)
 *   BITBUCKET_API_URL       - Bitbucket listing API base URL
 *   BITBUCKET_HOOKS_API_URL - Bitbucket services API base URL
 *   PROJECT_API_URL         - Project API host used for token lookup
 *   PROJECT_API_USERNAME    - Optional basic auth for the project API
 *   PROJECT_API_PASSWORD
 *   DATABASE_PATH           - SQLite file
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { PrivacyLevel } from './types';

export type ProjectApiConfig = {
  url: string;
  username?: string;
  password?: string;
};

export type OAuthSyncConfig = {
  allowPrivateRepos: boolean;
  dontHitDb: boolean;
  productionDomain: string;
  defaultPrivacyLevel: PrivacyLevel;
  githubApiUrl: string;
  bitbucketApiUrl: string;
  bitbucketHooksApiUrl: string;
  projectApi: ProjectApiConfig;
  databasePath: string;
};

export const DEFAULT_OAUTH_SYNC_CONFIG: OAuthSyncConfig = {
  allowPrivateRepos: false,
  dontHitDb: true,
  productionDomain: 'localhost:8000',
  defaultPrivacyLevel: 'public',
  githubApiUrl: 'https://api.github.com',
  bitbucketApiUrl: 'https://bitbucket.org/api',
  bitbucketHooksApiUrl: 'https://api.bitbucket.org',
  projectApi: { url: 'http://localhost:8000' },
  databasePath: 'repo-sync.sqlite'
};

// ============================================================================
// Environment parsing
// ============================================================================

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

function envBoolean(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx): boolean => {
      if (value === undefined || value.trim() === '') return defaultValue;

      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(normalized)) return true;
      if (FALSE_VALUES.includes(normalized)) return false;

      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected a boolean, got "${value}"`
      });
      return z.NEVER;
    });
}

function envUrl(defaultValue: string) {
  return z
    .string()
    .url()
    .default(defaultValue)
    .transform((value) => value.replace(/\/+$/, ''));
}

const EnvSchema = z.object({
  ALLOW_PRIVATE_REPOS: envBoolean(DEFAULT_OAUTH_SYNC_CONFIG.allowPrivateRepos),
  DONT_HIT_DB: envBoolean(DEFAULT_OAUTH_SYNC_CONFIG.dontHitDb),
  PRODUCTION_DOMAIN: z.string().min(1).default(DEFAULT_OAUTH_SYNC_CONFIG.productionDomain),
  DEFAULT_PRIVACY_LEVEL: z
    .enum(['public', 'private'])
    .default(DEFAULT_OAUTH_SYNC_CONFIG.defaultPrivacyLevel),
  GITHUB_API_URL: envUrl(DEFAULT_OAUTH_SYNC_CONFIG.githubApiUrl),
  BITBUCKET_API_URL: envUrl(DEFAULT_OAUTH_SYNC_CONFIG.bitbucketApiUrl),
  BITBUCKET_HOOKS_API_URL: envUrl(DEFAULT_OAUTH_SYNC_CONFIG.bitbucketHooksApiUrl),
  PROJECT_API_URL: envUrl(DEFAULT_OAUTH_SYNC_CONFIG.projectApi.url),
  PROJECT_API_USERNAME: z.string().optional(),
  PROJECT_API_PASSWORD: z.string().optional(),
  DATABASE_PATH: z.string().min(1).default(DEFAULT_OAUTH_SYNC_CONFIG.databasePath)
});

/**
 * Load the sync configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadOAuthSyncConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): OAuthSyncConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    allowPrivateRepos: vars.ALLOW_PRIVATE_REPOS,
    dontHitDb: vars.DONT_HIT_DB,
    productionDomain: vars.PRODUCTION_DOMAIN,
    defaultPrivacyLevel: vars.DEFAULT_PRIVACY_LEVEL,
    githubApiUrl: vars.GITHUB_API_URL,
    bitbucketApiUrl: vars.BITBUCKET_API_URL,
    bitbucketHooksApiUrl: vars.BITBUCKET_HOOKS_API_URL,
    projectApi: {
      url: vars.PROJECT_API_URL,
      username: vars.PROJECT_API_USERNAME,
      password: vars.PROJECT_API_PASSWORD
    },
    databasePath: vars.DATABASE_PATH
  };
}
