import type { DefinitionAST } from '../ast/types.js';
import type { CompileLogger } from './compile-logger.js';
import { compileEnum } from './compile-enum.js';
import { compileService } from './compile-service.js';
import { compileStruct } from './compile-struct.js';
import { compileTypedef } from './compile-typedef.js';
import type { NamedTypeSpec, ServiceSpec } from './spec-types.js';

export interface DefinitionCompileOptions {
  readonly logger?: CompileLogger;
}

export type CompiledDefinition =
  | { readonly kind: 'type'; readonly spec: NamedTypeSpec }
  | { readonly kind: 'service'; readonly spec: ServiceSpec };

/**
 * Compiles one definition in isolation. References to other definitions stay
 * unresolved; only local constraints are checked here.
 */
export function compileDefinition(
  definition: DefinitionAST,
  options: DefinitionCompileOptions = {},
): CompiledDefinition {
  switch (definition.kind) {
    case 'struct':
    case 'union':
    case 'exception':
      return { kind: 'type', spec: compileStruct(definition, options) };
    case 'typedef':
      return { kind: 'type', spec: compileTypedef(definition) };
    case 'enum':
      return { kind: 'type', spec: compileEnum(definition) };
    case 'service':
      return { kind: 'service', spec: compileService(definition, options) };
  }
}
