export * from './format';
export * from './convert';
