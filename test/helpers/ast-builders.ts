import type {
  BaseTypeName,
  ConstantValue,
  EnumDefinition,
  FieldAST,
  FunctionAST,
  Requiredness,
  ServiceDefinition,
  StructDefinition,
  StructKind,
  TypeReferenceAST,
  TypedefDefinition,
} from '../../src/ast/index.js';

export const base = (name: BaseTypeName, line = 1): TypeReferenceAST => ({ kind: 'base', name, line });

export const named = (name: string, line = 1): TypeReferenceAST => ({ kind: 'named', name, line });

export const mapOf = (key: TypeReferenceAST, value: TypeReferenceAST, line = 1): TypeReferenceAST => ({
  kind: 'map',
  key,
  value,
  line,
});

export const listOf = (value: TypeReferenceAST, line = 1): TypeReferenceAST => ({ kind: 'list', value, line });

export const setOf = (value: TypeReferenceAST, line = 1): TypeReferenceAST => ({ kind: 'set', value, line });

export interface FieldExtras {
  readonly line?: number;
  readonly requiredness?: Requiredness;
  readonly default?: ConstantValue;
}

export function field(id: number | undefined, name: string, type: TypeReferenceAST, extras: FieldExtras = {}): FieldAST {
  return {
    ...(id !== undefined ? { id } : {}),
    name,
    type,
    ...(extras.requiredness !== undefined ? { requiredness: extras.requiredness } : {}),
    ...(extras.default !== undefined ? { default: extras.default } : {}),
    line: extras.line ?? type.line,
  };
}

export interface FunctionExtras {
  readonly line?: number;
  readonly returnType?: TypeReferenceAST;
  readonly parameters?: readonly FieldAST[];
  readonly exceptions?: readonly FieldAST[];
  readonly oneway?: boolean;
}

export function fn(name: string, extras: FunctionExtras = {}): FunctionAST {
  return {
    name,
    ...(extras.returnType !== undefined ? { returnType: extras.returnType } : {}),
    parameters: extras.parameters ?? [],
    exceptions: extras.exceptions ?? [],
    oneway: extras.oneway ?? false,
    line: extras.line ?? 1,
  };
}

export function service(
  name: string,
  functions: readonly FunctionAST[],
  extras: { readonly line?: number; readonly parent?: string } = {},
): ServiceDefinition {
  const line = extras.line ?? 1;
  return {
    kind: 'service',
    name,
    ...(extras.parent !== undefined ? { parent: { name: extras.parent, line } } : {}),
    functions,
    line,
  };
}

export function struct(kind: StructKind, name: string, fields: readonly FieldAST[], line = 1): StructDefinition {
  return { kind, name, fields, line };
}

export function typedef(name: string, target: TypeReferenceAST, line = 1): TypedefDefinition {
  return { kind: 'typedef', name, target, line };
}

export function enumeration(
  name: string,
  items: readonly (string | { readonly name: string; readonly value?: number; readonly line?: number })[],
  line = 1,
): EnumDefinition {
  return {
    kind: 'enum',
    name,
    items: items.map((item, index) =>
      typeof item === 'string'
        ? { name: item, line: line + index + 1 }
        : {
            name: item.name,
            ...(item.value !== undefined ? { value: item.value } : {}),
            line: item.line ?? line + index + 1,
          },
    ),
    line,
  };
}
