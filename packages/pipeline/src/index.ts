export * from './tokenizer';
export * from './archive';
export * from './wordBank';
export * from './pool';
export * from './generator';
export * from './concatenation';
export * from './filter';
export * from './orchestrator';
export * from './engine';
