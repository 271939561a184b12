import type { FunctionAST, ServiceDefinition } from '../ast/types.js';
import type { CompileLogger } from './compile-logger.js';
import { InvalidFunctionError, withOwner } from './compile-errors.js';
import { compileTypeReference } from './compile-type-reference.js';
import { compileFieldGroup, createNamespace } from './field-group.js';
import type { FunctionSpec, ResultSpec, ServiceSpec } from './spec-types.js';

export interface ServiceCompileOptions {
  readonly logger?: CompileLogger;
}

/**
 * Compiles a service body. `extends` is kept as an unresolved
 * `serviceReference` until linking; inherited functions are never copied in.
 */
export function compileService(definition: ServiceDefinition, options: ServiceCompileOptions = {}): ServiceSpec {
  const names = createNamespace();
  const functions = new Map<string, FunctionSpec>();

  for (const fn of definition.functions) {
    names.claim(fn.name, fn.line);
    functions.set(fn.name, withOwner('compile', fn.name, () => compileFunction(fn, options)));
  }

  return {
    kind: 'service',
    name: definition.name,
    ...(definition.parent !== undefined
      ? { parent: { kind: 'serviceReference', name: definition.parent.name, line: definition.parent.line } }
      : {}),
    functions,
  };
}

export function compileFunction(fn: FunctionAST, options: ServiceCompileOptions = {}): FunctionSpec {
  const logger = options.logger !== undefined ? { logger: options.logger } : {};

  if (fn.oneway) {
    if (fn.returnType !== undefined) {
      throw new InvalidFunctionError(fn.name, 'cannot have a return type');
    }
    if (fn.exceptions.length > 0) {
      throw new InvalidFunctionError(fn.name, 'cannot throw exceptions');
    }
  }

  const args = compileFieldGroup(fn.parameters, logger);
  const exceptions = compileFieldGroup(fn.exceptions, { disallowDefaultValues: true, ...logger });

  let result: ResultSpec | undefined;
  if (fn.returnType !== undefined || exceptions.length > 0) {
    result = {
      ...(fn.returnType !== undefined ? { returnType: compileTypeReference(fn.returnType) } : {}),
      exceptions,
    };
  }

  return {
    name: fn.name,
    args,
    ...(result !== undefined ? { result } : {}),
    oneway: fn.oneway,
  };
}
