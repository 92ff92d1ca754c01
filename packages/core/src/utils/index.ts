export * from './abort';
export * from './retry';
export * from './timeout';
