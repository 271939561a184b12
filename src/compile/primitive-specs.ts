import type { BaseTypeName } from '../ast/types.js';
import type { PrimitiveSpec } from './spec-types.js';

const primitive = (name: BaseTypeName): PrimitiveSpec => Object.freeze({ kind: 'primitive', name });

export const BOOL_SPEC = primitive('bool');
export const BYTE_SPEC = primitive('byte');
export const I8_SPEC = primitive('i8');
export const I16_SPEC = primitive('i16');
export const I32_SPEC = primitive('i32');
export const I64_SPEC = primitive('i64');
export const DOUBLE_SPEC = primitive('double');
export const STRING_SPEC = primitive('string');
export const BINARY_SPEC = primitive('binary');

export const PRIMITIVE_SPECS: Readonly<Record<BaseTypeName, PrimitiveSpec>> = {
  bool: BOOL_SPEC,
  byte: BYTE_SPEC,
  i8: I8_SPEC,
  i16: I16_SPEC,
  i32: I32_SPEC,
  i64: I64_SPEC,
  double: DOUBLE_SPEC,
  string: STRING_SPEC,
  binary: BINARY_SPEC,
};
