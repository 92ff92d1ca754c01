export * from './lifecycle';
export * from './errors';
export * from './audio';
export * from './entities';
export * from './contracts';
export * from './ports';
export * from './config';
export * from './utils';
