import { LineCounter, isAlias, isMap, isNode, isScalar, isSeq, parseDocument } from 'yaml';
import type { ZodIssue } from 'zod';
import { capDiagnostics, dedupeDiagnostics, hasErrorDiagnostics, type Diagnostic } from './diagnostics.js';
import {
  IdlDocumentSchema,
  type DefinitionDocument,
  type FieldDocument,
  type FunctionDocument,
} from './schemas.js';
import { TypeExpressionError, parseTypeExpression } from './type-expression.js';
import type {
  DefinitionAST,
  EnumItemAST,
  FieldAST,
  FunctionAST,
  Requiredness,
  TypeReferenceAST,
} from './types.js';

export interface ParseDefinitionDocumentOptions {
  readonly maxInputBytes?: number;
  readonly maxDiagnostics?: number;
}

export interface ParseDefinitionDocumentResult {
  readonly definitions: readonly DefinitionAST[] | null;
  readonly diagnostics: readonly Diagnostic[];
}

export const DEFAULT_MAX_INPUT_BYTES = 1024 * 1024;
export const DEFAULT_MAX_DIAGNOSTICS = 100;

/**
 * Reads a YAML definition document into parser-shaped definitions. Every
 * definition, field, function and enum item is stamped with the source line
 * of its mapping so compile errors can point back at the document.
 */
export function parseDefinitionDocument(
  source: string,
  options: ParseDefinitionDocumentOptions = {},
): ParseDefinitionDocumentResult {
  const maxInputBytes = normalizeLimit(options.maxInputBytes, DEFAULT_MAX_INPUT_BYTES);
  const maxDiagnostics = normalizeLimit(options.maxDiagnostics, DEFAULT_MAX_DIAGNOSTICS);
  const diagnostics: Diagnostic[] = [];

  const inputBytes = Buffer.byteLength(source, 'utf8');
  if (inputBytes > maxInputBytes) {
    diagnostics.push({
      code: 'IDL_DOC_MAX_INPUT_BYTES_EXCEEDED',
      path: 'document',
      severity: 'error',
      message: `Input exceeds maxInputBytes (${inputBytes} > ${maxInputBytes}).`,
      suggestion: 'Split the document or increase maxInputBytes.',
    });
    return { definitions: null, diagnostics };
  }

  const lineCounter = new LineCounter();
  const yamlDoc = parseDocument(source, {
    lineCounter,
    schema: 'core',
    strict: true,
    uniqueKeys: true,
  });

  if (yamlDoc.errors.length > 0) {
    for (const error of yamlDoc.errors) {
      const line = error.linePos?.[0]?.line;
      diagnostics.push({
        code: 'IDL_DOC_YAML_PARSE_ERROR',
        path: 'document',
        severity: 'error',
        message: error.message,
        ...(line !== undefined ? { line } : {}),
      });
    }
    return { definitions: null, diagnostics: finalize(diagnostics, maxDiagnostics) };
  }

  const located = yamlDoc.contents === null ? { line: 1 } : toLocated(yamlDoc.contents, lineCounter, 'document', diagnostics);
  if (hasErrorDiagnostics(diagnostics)) {
    return { definitions: null, diagnostics: finalize(diagnostics, maxDiagnostics) };
  }

  const parsed = IdlDocumentSchema.safeParse(located);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      diagnostics.push(schemaIssueDiagnostic(issue, located));
    }
    return { definitions: null, diagnostics: finalize(diagnostics, maxDiagnostics) };
  }

  const definitions = parsed.data.definitions.map((definition, index) =>
    toDefinitionAST(definition, `document.definitions.${index}`, diagnostics),
  );

  return {
    definitions: hasErrorDiagnostics(diagnostics) ? null : definitions,
    diagnostics: finalize(diagnostics, maxDiagnostics),
  };
}

// Bare enum item names are expanded to `{ name, line }` so each keeps its own line.
const ENUM_ITEMS_PATH = /^document\.definitions\.\d+\.items$/;

function toLocated(node: unknown, lineCounter: LineCounter, path: string, diagnostics: Diagnostic[]): unknown {
  if (isAlias(node)) {
    diagnostics.push({
      code: 'IDL_DOC_ALIAS_UNSUPPORTED',
      path,
      severity: 'error',
      message: `YAML alias "*${node.source}" is not supported in definition documents.`,
      ...lineOf(node.range, lineCounter),
    });
    return null;
  }

  if (isMap(node)) {
    const entries: [string, unknown][] = [];
    for (const pair of node.items) {
      const key = isScalar(pair.key) ? String(pair.key.value) : String(pair.key);
      const value: unknown =
        key === 'default'
          ? toPlain(pair.value)
          : toLocated(pair.value, lineCounter, `${path}.${key}`, diagnostics);
      entries.push([key, value]);
    }
    const location = lineOf(node.range, lineCounter);
    if (location.line !== undefined && !entries.some(([key]) => key === 'line')) {
      entries.push(['line', location.line]);
    }
    return Object.fromEntries(entries);
  }

  if (isSeq(node)) {
    const enumItems = ENUM_ITEMS_PATH.test(path);
    return node.items.map((item, index) => {
      if (enumItems && isScalar(item) && typeof item.value === 'string') {
        return { name: item.value, ...lineOf(item.range, lineCounter) };
      }
      return toLocated(item, lineCounter, `${path}.${index}`, diagnostics);
    });
  }

  if (isScalar(node)) {
    return node.value;
  }

  return node;
}

function toPlain(value: unknown): unknown {
  if (isNode(value)) {
    const plain: unknown = value.toJSON();
    return plain;
  }
  return value;
}

function lineOf(
  range: readonly [number, number, number] | null | undefined,
  lineCounter: LineCounter,
): { readonly line?: number } {
  if (range === null || range === undefined) {
    return {};
  }
  return { line: lineCounter.linePos(range[0]).line };
}

function schemaIssueDiagnostic(issue: ZodIssue, located: unknown): Diagnostic {
  const path = ['document', ...issue.path.map(String)].join('.');
  const line = nearestLine(located, issue.path);
  return {
    code: 'IDL_DOC_SCHEMA_INVALID',
    path,
    severity: 'error',
    message: issue.message,
    ...(line !== undefined ? { line } : {}),
  };
}

function nearestLine(located: unknown, path: readonly (string | number)[]): number | undefined {
  let current: unknown = located;
  let line = readLine(current);
  for (const segment of path) {
    if (typeof current !== 'object' || current === null) {
      break;
    }
    current = Reflect.get(current, segment);
    line = readLine(current) ?? line;
  }
  return line;
}

function readLine(value: unknown): number | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  const line: unknown = Reflect.get(value, 'line');
  return typeof line === 'number' ? line : undefined;
}

function toDefinitionAST(definition: DefinitionDocument, path: string, diagnostics: Diagnostic[]): DefinitionAST {
  switch (definition.kind) {
    case 'struct':
    case 'union':
    case 'exception':
      return {
        kind: definition.kind,
        name: definition.name,
        fields: definition.fields.map((field, index) => toFieldAST(field, `${path}.fields.${index}`, diagnostics)),
        line: definition.line,
      };
    case 'typedef':
      return {
        kind: 'typedef',
        name: definition.name,
        target: toTypeReference(definition.type, definition.line, `${path}.type`, diagnostics),
        line: definition.line,
      };
    case 'enum':
      return {
        kind: 'enum',
        name: definition.name,
        items: definition.items.map((item): EnumItemAST =>
          typeof item === 'string' ? { name: item, line: definition.line } : item,
        ),
        line: definition.line,
      };
    case 'service':
      return {
        kind: 'service',
        name: definition.name,
        ...(definition.extends !== undefined ? { parent: { name: definition.extends, line: definition.line } } : {}),
        functions: definition.functions.map((fn, index) => toFunctionAST(fn, `${path}.functions.${index}`, diagnostics)),
        line: definition.line,
      };
  }
}

function toFunctionAST(fn: FunctionDocument, path: string, diagnostics: Diagnostic[]): FunctionAST {
  return {
    name: fn.name,
    ...(fn.returns !== undefined
      ? { returnType: toTypeReference(fn.returns, fn.line, `${path}.returns`, diagnostics) }
      : {}),
    parameters: fn.args.map((field, index) => toFieldAST(field, `${path}.args.${index}`, diagnostics)),
    exceptions: fn.throws.map((field, index) => toFieldAST(field, `${path}.throws.${index}`, diagnostics)),
    oneway: fn.oneway,
    line: fn.line,
  };
}

function toFieldAST(field: FieldDocument, path: string, diagnostics: Diagnostic[]): FieldAST {
  const requiredness: Requiredness | undefined =
    field.required === undefined ? undefined : field.required ? 'required' : 'optional';
  return {
    ...(field.id !== undefined ? { id: field.id } : {}),
    name: field.name,
    type: toTypeReference(field.type, field.line, `${path}.type`, diagnostics),
    ...(requiredness !== undefined ? { requiredness } : {}),
    ...(field.default !== undefined ? { default: field.default } : {}),
    line: field.line,
  };
}

function toTypeReference(
  expression: string,
  line: number,
  path: string,
  diagnostics: Diagnostic[],
): TypeReferenceAST {
  try {
    return parseTypeExpression(expression, line);
  } catch (error) {
    if (!(error instanceof TypeExpressionError)) {
      throw error;
    }
    diagnostics.push({
      code: 'IDL_DOC_TYPE_EXPRESSION_INVALID',
      path,
      severity: 'error',
      message: error.message,
      line,
    });
    return { kind: 'named', name: expression, line };
  }
}

function finalize(diagnostics: readonly Diagnostic[], maxDiagnostics: number): readonly Diagnostic[] {
  const deduped = dedupeDiagnostics(diagnostics);
  if (deduped.length <= maxDiagnostics) {
    return deduped;
  }

  const kept = capDiagnostics(deduped, maxDiagnostics - 1);
  return [
    ...kept,
    {
      code: 'IDL_DOC_DIAGNOSTICS_TRUNCATED',
      path: 'document',
      severity: 'warning',
      message: `Diagnostic limit reached; ${deduped.length - kept.length} additional diagnostic(s) were truncated.`,
    },
  ];
}

function normalizeLimit(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(1, Math.floor(value));
}
