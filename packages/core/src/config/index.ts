export * from './defaults';
export * from './types';
export * from './resolve';
