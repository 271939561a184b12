export * from './spec-types.js';
export * from './primitive-specs.js';
export * from './compile-errors.js';
export * from './compile-logger.js';
export * from './compile-type-reference.js';
export * from './field-group.js';
export * from './compile-struct.js';
export * from './compile-typedef.js';
export * from './compile-enum.js';
export * from './compile-service.js';
export * from './compile-definition.js';
export * from './scope.js';
export * from './link.js';
export * from './compile-module.js';
export * from './graph.js';
