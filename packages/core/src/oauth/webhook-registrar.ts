/**
 * Webhook Registrar
 *
 * Registers the application's push webhook on a project's vendor repository.
 * There is no existence check: calling twice may create two webhooks.
 */

import { Logger, type LoggerService } from '@nestjs/common';
import type { OAuthSyncConfig } from './config';
import { InvalidRepoUrlError } from './errors';
import { getBitbucketUsernameRepo, getGitHubUsernameRepo } from './repo-url';
import type { OAuthSession, SessionResponse } from './session';
import type { Project } from './types';

export type WebhookRegistrarConfig = Pick<
  OAuthSyncConfig,
  'productionDomain' | 'githubApiUrl' | 'bitbucketHooksApiUrl'
>;

export class WebhookRegistrar {
  private readonly logger: LoggerService;

  constructor(
    private readonly config: WebhookRegistrarConfig,
    logger?: LoggerService
  ) {
    this.logger = logger ?? new Logger(WebhookRegistrar.name);
  }

  async addGitHubWebhook(session: OAuthSession, project: Project): Promise<SessionResponse> {
    const coordinates = getGitHubUsernameRepo(project.repo);
    if (!coordinates) {
      throw new InvalidRepoUrlError(project.repo, 'GitHub');
    }

    const { owner, repo } = coordinates;
    const response = await session.post(`${this.config.githubApiUrl}/repos/${owner}/${repo}/hooks`, {
      json: {
        name: 'web',
        active: true,
        config: {
          url: `https://${this.config.productionDomain}/github`,
          content_type: 'json'
        }
      }
    });

    this.logger.log(`Creating GitHub webhook response code: ${response.status}`);
    return response;
  }

  async addBitbucketWebhook(session: OAuthSession, project: Project): Promise<SessionResponse> {
    const coordinates = getBitbucketUsernameRepo(project.repo);
    if (!coordinates) {
      throw new InvalidRepoUrlError(project.repo, 'Bitbucket');
    }

    const { owner, repo } = coordinates;
    const response = await session.post(
      `${this.config.bitbucketHooksApiUrl}/1.0/repositories/${owner}/${repo}/services`,
      {
        form: {
          type: 'POST',
          url: `https://${this.config.productionDomain}/bitbucket`
        }
      }
    );

    this.logger.log(`Creating Bitbucket webhook response code: ${response.status}`);
    return response;
  }
}
