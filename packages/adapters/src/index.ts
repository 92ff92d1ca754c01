export * from './logger/pino';
export * from './logger/fake';
export * from './openai/synthesis';
export * from './synthesis/fake';
export * from './storage/filesystem';
export * from './storage/memory';
export * from './effects/pcm';
export * from './effects/fake';
