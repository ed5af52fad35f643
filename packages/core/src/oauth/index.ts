export * from './types';
export * from './errors';
export * from './config';
export * from './session';
export * from './session-provider';
export * from './stores';
export * from './payload';
export * from './repo-url';
export * from './webhook-registrar';
export * from './project-token';
