import type { TypeReferenceAST } from '../ast/types.js';
import { PRIMITIVE_SPECS } from './primitive-specs.js';
import type { TypeSpec } from './spec-types.js';

export function compileTypeReference(reference: TypeReferenceAST): TypeSpec {
  switch (reference.kind) {
    case 'base':
      return PRIMITIVE_SPECS[reference.name];
    case 'map':
      return {
        kind: 'map',
        keySpec: compileTypeReference(reference.key),
        valueSpec: compileTypeReference(reference.value),
      };
    case 'list':
      return { kind: 'list', valueSpec: compileTypeReference(reference.value) };
    case 'set':
      return { kind: 'set', valueSpec: compileTypeReference(reference.value) };
    case 'named':
      return { kind: 'reference', name: reference.name, line: reference.line };
  }
}
