export * from './oauth';
export * from './github';
export * from './bitbucket';
