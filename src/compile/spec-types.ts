import type { BaseTypeName, ConstantValue, StructKind } from '../ast/types.js';

// Slots that linking rewrites in place (field types, container element types,
// typedef targets, service parents) are the only mutable members below.

export interface PrimitiveSpec {
  readonly kind: 'primitive';
  readonly name: BaseTypeName;
}

/** A by-name reference that has not been linked yet. */
export interface TypeReferenceSpec {
  readonly kind: 'reference';
  readonly name: string;
  readonly line: number;
}

export interface MapSpec {
  readonly kind: 'map';
  keySpec: TypeSpec;
  valueSpec: TypeSpec;
}

export interface ListSpec {
  readonly kind: 'list';
  valueSpec: TypeSpec;
}

export interface SetSpec {
  readonly kind: 'set';
  valueSpec: TypeSpec;
}

export interface FieldSpec {
  readonly id: number;
  readonly name: string;
  type: TypeSpec;
  readonly required: boolean;
  readonly default?: ConstantValue;
}

/** Ordered fields of one struct body, argument list or throws list. */
export type FieldGroup = readonly FieldSpec[];

export interface StructSpec {
  readonly kind: 'struct';
  readonly name: string;
  readonly type: StructKind;
  readonly fields: FieldGroup;
}

export interface TypedefSpec {
  readonly kind: 'typedef';
  readonly name: string;
  target: TypeSpec;
}

export interface EnumItemSpec {
  readonly name: string;
  readonly value: number;
}

export interface EnumSpec {
  readonly kind: 'enum';
  readonly name: string;
  readonly items: readonly EnumItemSpec[];
}

export type NamedTypeSpec = StructSpec | TypedefSpec | EnumSpec;

export type ContainerSpec = MapSpec | ListSpec | SetSpec;

export type TypeSpec = PrimitiveSpec | TypeReferenceSpec | ContainerSpec | NamedTypeSpec;

export type ResolvedTypeSpec = Exclude<TypeSpec, TypeReferenceSpec>;

export interface ResultSpec {
  returnType?: TypeSpec;
  readonly exceptions: FieldGroup;
}

export interface FunctionSpec {
  readonly name: string;
  readonly args: FieldGroup;
  readonly result?: ResultSpec;
  readonly oneway: boolean;
}

export interface ServiceReference {
  readonly kind: 'serviceReference';
  readonly name: string;
  readonly line: number;
}

export interface ServiceSpec {
  readonly kind: 'service';
  readonly name: string;
  parent?: ServiceSpec | ServiceReference;
  /** Functions declared in this service's own body, in declaration order. */
  readonly functions: ReadonlyMap<string, FunctionSpec>;
}

export type Spec = TypeSpec | ServiceSpec;
