export const BASE_TYPE_NAMES = ['bool', 'byte', 'i8', 'i16', 'i32', 'i64', 'double', 'string', 'binary'] as const;

export type BaseTypeName = (typeof BASE_TYPE_NAMES)[number];

const BASE_TYPE_NAME_SET: ReadonlySet<string> = new Set(BASE_TYPE_NAMES);

export function isBaseTypeName(name: string): name is BaseTypeName {
  return BASE_TYPE_NAME_SET.has(name);
}

export type TypeReferenceAST =
  | { readonly kind: 'base'; readonly name: BaseTypeName; readonly line: number }
  | { readonly kind: 'map'; readonly key: TypeReferenceAST; readonly value: TypeReferenceAST; readonly line: number }
  | { readonly kind: 'list'; readonly value: TypeReferenceAST; readonly line: number }
  | { readonly kind: 'set'; readonly value: TypeReferenceAST; readonly line: number }
  | { readonly kind: 'named'; readonly name: string; readonly line: number };

/** Literal default value, carried through compilation without evaluation. */
export type ConstantValue =
  | string
  | number
  | boolean
  | readonly ConstantValue[]
  | { readonly [key: string]: ConstantValue };

export type Requiredness = 'required' | 'optional';

export interface FieldAST {
  readonly id?: number;
  readonly name: string;
  readonly type: TypeReferenceAST;
  readonly requiredness?: Requiredness;
  readonly default?: ConstantValue;
  readonly line: number;
}

export type StructKind = 'struct' | 'union' | 'exception';

export interface StructDefinition {
  readonly kind: StructKind;
  readonly name: string;
  readonly fields: readonly FieldAST[];
  readonly line: number;
}

export interface TypedefDefinition {
  readonly kind: 'typedef';
  readonly name: string;
  readonly target: TypeReferenceAST;
  readonly line: number;
}

export interface EnumItemAST {
  readonly name: string;
  readonly value?: number;
  readonly line: number;
}

export interface EnumDefinition {
  readonly kind: 'enum';
  readonly name: string;
  readonly items: readonly EnumItemAST[];
  readonly line: number;
}

export interface FunctionAST {
  readonly name: string;
  readonly returnType?: TypeReferenceAST;
  readonly parameters: readonly FieldAST[];
  readonly exceptions: readonly FieldAST[];
  readonly oneway: boolean;
  readonly line: number;
}

export interface ServiceParentAST {
  readonly name: string;
  readonly line: number;
}

export interface ServiceDefinition {
  readonly kind: 'service';
  readonly name: string;
  readonly parent?: ServiceParentAST;
  readonly functions: readonly FunctionAST[];
  readonly line: number;
}

export type DefinitionAST = StructDefinition | TypedefDefinition | EnumDefinition | ServiceDefinition;

export type DefinitionKind = DefinitionAST['kind'];
