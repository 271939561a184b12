import { z } from 'zod';
import type { ConstantValue } from './types.js';

export const LineSchema = z.number().int().positive();
export const IdentifierSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'expected an identifier');
export const TypeExpressionSchema = z.string().min(1);

export const ConstantValueSchema: z.ZodType<ConstantValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(ConstantValueSchema),
    z.record(z.string(), ConstantValueSchema),
  ]),
);

export const FieldDocumentSchema = z
  .object({
    id: z.number().int().optional(),
    name: IdentifierSchema,
    type: TypeExpressionSchema,
    required: z.boolean().optional(),
    default: ConstantValueSchema.optional(),
    line: LineSchema,
  })
  .strict();

export const FunctionDocumentSchema = z
  .object({
    name: IdentifierSchema,
    returns: TypeExpressionSchema.optional(),
    oneway: z.boolean().default(false),
    args: z.array(FieldDocumentSchema).default([]),
    throws: z.array(FieldDocumentSchema).default([]),
    line: LineSchema,
  })
  .strict();

const structDocumentSchema = <K extends 'struct' | 'union' | 'exception'>(kind: K) =>
  z
    .object({
      kind: z.literal(kind),
      name: IdentifierSchema,
      fields: z.array(FieldDocumentSchema).default([]),
      line: LineSchema,
    })
    .strict();

export const TypedefDocumentSchema = z
  .object({
    kind: z.literal('typedef'),
    name: IdentifierSchema,
    type: TypeExpressionSchema,
    line: LineSchema,
  })
  .strict();

export const EnumItemDocumentSchema = z.union([
  IdentifierSchema,
  z
    .object({
      name: IdentifierSchema,
      value: z.number().int().optional(),
      line: LineSchema,
    })
    .strict(),
]);

export const EnumDocumentSchema = z
  .object({
    kind: z.literal('enum'),
    name: IdentifierSchema,
    items: z.array(EnumItemDocumentSchema).default([]),
    line: LineSchema,
  })
  .strict();

export const ServiceDocumentSchema = z
  .object({
    kind: z.literal('service'),
    name: IdentifierSchema,
    extends: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/, 'expected a service name').optional(),
    functions: z.array(FunctionDocumentSchema).default([]),
    line: LineSchema,
  })
  .strict();

export const DefinitionDocumentSchema = z.discriminatedUnion('kind', [
  structDocumentSchema('struct'),
  structDocumentSchema('union'),
  structDocumentSchema('exception'),
  TypedefDocumentSchema,
  EnumDocumentSchema,
  ServiceDocumentSchema,
]);

export const IdlDocumentSchema = z
  .object({
    definitions: z.array(DefinitionDocumentSchema).default([]),
    line: LineSchema,
  })
  .strict();

export type FieldDocument = z.infer<typeof FieldDocumentSchema>;
export type FunctionDocument = z.infer<typeof FunctionDocumentSchema>;
export type DefinitionDocument = z.infer<typeof DefinitionDocumentSchema>;
export type IdlDocument = z.infer<typeof IdlDocumentSchema>;
