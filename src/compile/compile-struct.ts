import type { StructDefinition } from '../ast/types.js';
import type { CompileLogger } from './compile-logger.js';
import { withOwner } from './compile-errors.js';
import { compileFieldGroup } from './field-group.js';
import type { StructSpec } from './spec-types.js';

export interface StructCompileOptions {
  readonly logger?: CompileLogger;
}

export function compileStruct(definition: StructDefinition, options: StructCompileOptions = {}): StructSpec {
  const isUnion = definition.kind === 'union';
  const fields = withOwner('compile', definition.name, () =>
    compileFieldGroup(definition.fields, {
      disallowDefaultValues: isUnion,
      disallowRequired: isUnion,
      ...(options.logger !== undefined ? { logger: options.logger } : {}),
    }),
  );

  return {
    kind: 'struct',
    name: definition.name,
    type: definition.kind,
    fields,
  };
}
