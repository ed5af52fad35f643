import { Logger } from '@nestjs/common';
import { Processor, WorkerHost } from '@nestjs/bullmq';
import type { Job } from 'bullmq';
import { z } from 'zod';
import {
  OAUTH_PROVIDERS,
  OAuthSessionProvider,
  WebhookRegistrar,
  type OAuthSession,
  type OAuthProvider,
  type Project,
  type SessionResponse
} from '@repo-sync/core';
import { ProjectRepository, UserRepository } from '@repo-sync/db';
import { ADD_WEBHOOK_QUEUE } from '../constants';

const AddWebhookJobSchema = z.object({
  projectId: z.string().min(1),
  userId: z.string().min(1),
  provider: z.enum(OAUTH_PROVIDERS)
});

export type AddWebhookJobData = z.infer<typeof AddWebhookJobSchema>;

export type AddWebhookResult =
  | { created: false; reason: 'no_session' }
  | { created: true; status: number };

@Processor(ADD_WEBHOOK_QUEUE)
export class AddWebhookProcessor extends WorkerHost {
  private readonly logger = new Logger(AddWebhookProcessor.name);

  constructor(
    private readonly users: UserRepository,
    private readonly projects: ProjectRepository,
    private readonly sessions: OAuthSessionProvider,
    private readonly registrar: WebhookRegistrar
  ) {
    super();
  }

  async process(job: Pick<Job<AddWebhookJobData>, 'id' | 'data'>): Promise<AddWebhookResult> {
    const { projectId, userId, provider } = AddWebhookJobSchema.parse(job.data);

    const project = this.projects.findById(projectId);
    if (!project) {
      throw new Error(`Project ${projectId} not found`);
    }

    const user = this.users.findById(userId);
    if (!user) {
      throw new Error(`User ${userId} not found`);
    }

    const session = await this.sessions.getSession(user, provider);
    if (!session) {
      this.logger.warn(`No ${provider} session for ${user.username}, skipping webhook for ${project.slug}`);
      return { created: false, reason: 'no_session' };
    }

    const response = await this.register(provider, session, project);
    return { created: true, status: response.status };
  }

  private register(provider: OAuthProvider, session: OAuthSession, project: Project): Promise<SessionResponse> {
    switch (provider) {
      case 'github':
        return this.registrar.addGitHubWebhook(session, project);
      case 'bitbucket':
        return this.registrar.addBitbucketWebhook(session, project);
      default: {
        const unreachable: never = provider;
        throw new Error(`Unsupported provider: ${String(unreachable)}`);
      }
    }
  }
}
