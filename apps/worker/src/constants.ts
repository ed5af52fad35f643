export const SYNC_REMOTE_REPOSITORIES_QUEUE = 'sync_remote_repositories';
export const ADD_WEBHOOK_QUEUE = 'add_webhook';

export const OAUTH_SYNC_CONFIG = 'OAUTH_SYNC_CONFIG';
