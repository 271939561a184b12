import type { TypedefDefinition } from '../ast/types.js';
import { compileTypeReference } from './compile-type-reference.js';
import type { TypedefSpec } from './spec-types.js';

export function compileTypedef(definition: TypedefDefinition): TypedefSpec {
  return {
    kind: 'typedef',
    name: definition.name,
    target: compileTypeReference(definition.target),
  };
}
