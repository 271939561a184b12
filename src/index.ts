export * from './ast/index.js';
export * from './compile/index.js';
