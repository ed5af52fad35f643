export * from './user';
export * from './social-account';
export * from './project';
export * from './remote-organization';
export * from './remote-repository';
