export * from './types.js';
export * from './builders.js';
export * from './compiler.js';
export * from './sql-functions.js';
