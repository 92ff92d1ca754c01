export * from './logger';
export * from './synthesis';
export * from './word-bank-store';
export * from './effects';
