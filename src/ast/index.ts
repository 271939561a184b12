export * from './types.js';
export * from './diagnostics.js';
export * from './schemas.js';
export * from './type-expression.js';
export * from './load-definitions.js';
