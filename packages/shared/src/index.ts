export * from './errors';
export * from './utils';
