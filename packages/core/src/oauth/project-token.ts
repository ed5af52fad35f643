/**
 * Project Token Lookup
 *
 * Resolves the GitHub token used to clone a project's private repository,
 * either through the project API or from the project users' stored tokens.
 */

import { Logger, type LoggerService } from '@nestjs/common';
import { z } from 'zod';
import type { OAuthSyncConfig, ProjectApiConfig } from './config';
import type { SocialTokenStore } from './stores';
import type { Project } from './types';

// ============================================================================
// Project API
// ============================================================================

export interface ProjectApiClient {
  getProjectToken(projectId: string): Promise<string | null>;
}

const ProjectTokenResponseSchema = z.object({
  token: z.string().nullable()
});

/**
 * ProjectApiClient over the project API's REST endpoint
 * `GET /api/v2/project/{id}/token/`.
 */
export class HttpProjectApiClient implements ProjectApiClient {
  constructor(private readonly config: ProjectApiConfig) {}

  async getProjectToken(projectId: string): Promise<string | null> {
    const url = `${this.config.url}/api/v2/project/${encodeURIComponent(projectId)}/token/`;
    const headers: Record<string, string> = { Accept: 'application/json' };

    if (this.config.username && this.config.password) {
      const credentials = Buffer.from(`${this.config.username}:${this.config.password}`).toString('base64');
      headers.Authorization = `Basic ${credentials}`;
    }

    const response = await fetch(url, { headers });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Project API error: ${response.status} - ${errorText}`);
    }

    const data = ProjectTokenResponseSchema.parse(await response.json());
    return data.token;
  }
}

// ============================================================================
// Resolver
// ============================================================================

export type ProjectTokenResolverDeps = {
  config: Pick<OAuthSyncConfig, 'allowPrivateRepos' | 'dontHitDb'>;
  api: ProjectApiClient;
  tokens: Pick<SocialTokenStore, 'findTokens'>;
  logger?: LoggerService;
};

export type TokenLookupOptions = {
  /** Read the local token store even when the project API is configured. */
  forceLocal?: boolean;
};

export class ProjectTokenResolver {
  private readonly logger: LoggerService;

  constructor(private readonly deps: ProjectTokenResolverDeps) {
    this.logger = deps.logger ?? new Logger(ProjectTokenResolver.name);
  }

  /**
   * Returns null when private repositories are disabled, when no token is
   * found, or when the lookup fails (the failure is logged).
   */
  async getTokenForProject(project: Project, options: TokenLookupOptions = {}): Promise<string | null> {
    const { config, api, tokens } = this.deps;

    if (!config.allowPrivateRepos) {
      return null;
    }

    try {
      if (config.dontHitDb && !options.forceLocal) {
        return await api.getProjectToken(project.id);
      }

      // The last project user with a GitHub token wins
      let token: string | null = null;
      for (const user of project.users) {
        const [stored] = await tokens.findTokens(user.username, 'github');
        if (stored) {
          token = stored.token;
        }
      }
      return token;
    } catch (error) {
      this.logger.error(
        `Failed to get token for project ${project.slug}`,
        error instanceof Error ? error.stack : String(error)
      );
      return null;
    }
  }
}
