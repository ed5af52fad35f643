export * from './schemas';
export * from './paginate';
export * from './bitbucket-session';
export * from './bitbucket-importer';
