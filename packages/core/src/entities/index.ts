export * from './token';
export * from './clip';
export * from './filter';
export * from './generation';
