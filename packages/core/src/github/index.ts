export * from './schemas';
export * from './paginate';
export * from './github-session';
export * from './github-importer';
