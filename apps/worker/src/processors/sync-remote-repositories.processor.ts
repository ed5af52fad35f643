import { Logger } from '@nestjs/common';
import { Processor, WorkerHost } from '@nestjs/bullmq';
import type { Job } from 'bullmq';
import { z } from 'zod';
import { BitbucketImporter, GitHubImporter, OAUTH_PROVIDERS, type OAuthProvider } from '@repo-sync/core';
import { UserRepository } from '@repo-sync/db';
import { SYNC_REMOTE_REPOSITORIES_QUEUE } from '../constants';

const SyncRemoteRepositoriesJobSchema = z.object({
  userId: z.string().min(1),
  providers: z.array(z.enum(OAUTH_PROVIDERS)).optional()
});

export type SyncRemoteRepositoriesJobData = z.infer<typeof SyncRemoteRepositoriesJobSchema>;

export type SyncRemoteRepositoriesResult = {
  userId: string;
  /** Whether the user has a session for each provider */
  connected: Record<OAuthProvider, boolean>;
};

@Processor(SYNC_REMOTE_REPOSITORIES_QUEUE)
export class SyncRemoteRepositoriesProcessor extends WorkerHost {
  private readonly logger = new Logger(SyncRemoteRepositoriesProcessor.name);

  constructor(
    private readonly users: UserRepository,
    private readonly github: GitHubImporter,
    private readonly bitbucket: BitbucketImporter
  ) {
    super();
  }

  async process(job: Pick<Job<SyncRemoteRepositoriesJobData>, 'id' | 'data'>): Promise<SyncRemoteRepositoriesResult> {
    const { userId, providers } = SyncRemoteRepositoriesJobSchema.parse(job.data);
    const requested = new Set<OAuthProvider>(providers ?? OAUTH_PROVIDERS);

    const user = this.users.findById(userId);
    if (!user) {
      throw new Error(`User ${userId} not found`);
    }

    this.logger.log(`Syncing remote repositories for ${user.username} (job ${job.id ?? 'n/a'})`);

    const connected: Record<OAuthProvider, boolean> = { github: false, bitbucket: false };
    if (requested.has('github')) {
      connected.github = await this.github.importRepositories(user, true);
    }
    if (requested.has('bitbucket')) {
      connected.bitbucket = await this.bitbucket.importRepositories(user, true);
    }

    this.logger.log(
      `Finished sync for ${user.username}: github=${connected.github} bitbucket=${connected.bitbucket}`
    );
    return { userId, connected };
  }
}
