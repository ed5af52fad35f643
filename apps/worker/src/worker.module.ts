import { Inject, Logger, Module, type OnApplicationShutdown } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import {
  BitbucketImporter,
  GitHubImporter,
  OAuthSessionProvider,
  WebhookRegistrar,
  loadOAuthSyncConfigFromEnv,
  type OAuthSyncConfig
} from '@repo-sync/core';
import {
  DatabaseService,
  ProjectRepository,
  RemoteOrganizationRepository,
  RemoteRepositoryRepository,
  SocialAccountRepository,
  UserRepository
} from '@repo-sync/db';
import { parseRedisUrl } from './redis';
import { ADD_WEBHOOK_QUEUE, OAUTH_SYNC_CONFIG, SYNC_REMOTE_REPOSITORIES_QUEUE } from './constants';
import { SyncRemoteRepositoriesProcessor } from './processors/sync-remote-repositories.processor';
import { AddWebhookProcessor } from './processors/add-webhook.processor';

// Jobs run once; a failed job stays failed
const DEFAULT_JOB_OPTIONS = {
  attempts: 1,
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 50 // Keep last 50 failed jobs
};

function openDatabase(config: OAuthSyncConfig): DatabaseService {
  const logger = new Logger('DatabaseFactory');
  logger.log(`Opening SQLite database at ${config.databasePath}`);
  return DatabaseService.open({ dbPath: config.databasePath });
}

@Module({
  imports: [
    BullModule.forRoot({
      connection: parseRedisUrl(process.env.REDIS_URL || 'redis://localhost:6379')
    }),
    BullModule.registerQueue({ name: SYNC_REMOTE_REPOSITORIES_QUEUE, defaultJobOptions: DEFAULT_JOB_OPTIONS }),
    BullModule.registerQueue({ name: ADD_WEBHOOK_QUEUE, defaultJobOptions: DEFAULT_JOB_OPTIONS })
  ],
  providers: [
    {
      provide: OAUTH_SYNC_CONFIG,
      useFactory: () => loadOAuthSyncConfigFromEnv()
    },
    {
      provide: DatabaseService,
      useFactory: openDatabase,
      inject: [OAUTH_SYNC_CONFIG]
    },
    // Stores
    {
      provide: UserRepository,
      useFactory: (db: DatabaseService) => new UserRepository(db.database),
      inject: [DatabaseService]
    },
    {
      provide: ProjectRepository,
      useFactory: (db: DatabaseService) => new ProjectRepository(db.database),
      inject: [DatabaseService]
    },
    {
      provide: SocialAccountRepository,
      useFactory: (db: DatabaseService) => new SocialAccountRepository(db.database),
      inject: [DatabaseService]
    },
    {
      provide: RemoteOrganizationRepository,
      useFactory: (db: DatabaseService) => new RemoteOrganizationRepository(db.database),
      inject: [DatabaseService]
    },
    {
      provide: RemoteRepositoryRepository,
      useFactory: (db: DatabaseService, config: OAuthSyncConfig) =>
        new RemoteRepositoryRepository(db.database, { privacyLevel: config.defaultPrivacyLevel }),
      inject: [DatabaseService, OAUTH_SYNC_CONFIG]
    },
    // Sync
    {
      provide: OAuthSessionProvider,
      useFactory: (accounts: SocialAccountRepository) => new OAuthSessionProvider(accounts),
      inject: [SocialAccountRepository]
    },
    {
      provide: GitHubImporter,
      useFactory: (
        sessions: OAuthSessionProvider,
        repositories: RemoteRepositoryRepository,
        organizations: RemoteOrganizationRepository,
        config: OAuthSyncConfig
      ) => new GitHubImporter({ sessions, repositories, organizations, config }),
      inject: [OAuthSessionProvider, RemoteRepositoryRepository, RemoteOrganizationRepository, OAUTH_SYNC_CONFIG]
    },
    {
      provide: BitbucketImporter,
      useFactory: (
        sessions: OAuthSessionProvider,
        accounts: SocialAccountRepository,
        repositories: RemoteRepositoryRepository,
        config: OAuthSyncConfig
      ) => new BitbucketImporter({ sessions, accounts, repositories, config }),
      inject: [OAuthSessionProvider, SocialAccountRepository, RemoteRepositoryRepository, OAUTH_SYNC_CONFIG]
    },
    {
      provide: WebhookRegistrar,
      useFactory: (config: OAuthSyncConfig) => new WebhookRegistrar(config),
      inject: [OAUTH_SYNC_CONFIG]
    },
    // Processors
    SyncRemoteRepositoriesProcessor,
    AddWebhookProcessor
  ]
})
export class WorkerModule implements OnApplicationShutdown {
  constructor(@Inject(DatabaseService) private readonly db: DatabaseService) {}

  onApplicationShutdown(): void {
    this.db.close();
  }
}
