export * from './config';
export * from './errors';
export * from './tar';
export * from './resource';
