// src/index.ts
// Entry point
export * from './types';
export * from './lexer';
export * from './nodes';
export * from './radix';
export * from './parser';
export * from './evaluator';
export * from './profiles';
export * from './config';
export * from './errors';
export * from './logger';
export * from './session';
