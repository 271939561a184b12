import type { FieldAST } from '../ast/types.js';
import { compileTypeReference } from './compile-type-reference.js';
import {
  DuplicateFieldIdError,
  DuplicateNameError,
  IllegalDefaultValueError,
  IllegalRequirednessError,
  InvalidFieldIdError,
} from './compile-errors.js';
import { NOOP_COMPILE_LOGGER, type CompileLogger } from './compile-logger.js';
import type { FieldSpec } from './spec-types.js';

export const MIN_FIELD_ID = 1;
export const MAX_FIELD_ID = 32767;

export interface Namespace {
  /** Records `name` as declared on `line`; throws if it was declared before. */
  claim(name: string, line: number): void;
}

export function createNamespace(): Namespace {
  const declaredOn = new Map<string, number>();
  return {
    claim(name, line) {
      const originalLine = declaredOn.get(name);
      if (originalLine !== undefined) {
        throw new DuplicateNameError(name, originalLine);
      }
      declaredOn.set(name, line);
    },
  };
}

export interface FieldGroupOptions {
  /** Set for throws lists and union bodies. */
  readonly disallowDefaultValues?: boolean;
  readonly disallowRequired?: boolean;
  readonly logger?: CompileLogger;
}

/**
 * Builds one ordered field group. Fields without an explicit id receive
 * implicit ids counting down from -1 in declaration order, so they can never
 * collide with explicit ids.
 */
export function compileFieldGroup(fields: readonly FieldAST[], options: FieldGroupOptions = {}): FieldSpec[] {
  const logger = options.logger ?? NOOP_COMPILE_LOGGER;
  const names = createNamespace();
  const idLines = new Map<number, number>();
  const compiled: FieldSpec[] = [];
  let nextImplicitId = -1;

  for (const field of fields) {
    names.claim(field.name, field.line);

    let id: number;
    if (field.id === undefined) {
      id = nextImplicitId;
      nextImplicitId -= 1;
      logger.logWarning({ message: `field "${field.name}" has no explicit id; assigned id ${id}`, line: field.line });
    } else {
      if (!Number.isInteger(field.id) || field.id < MIN_FIELD_ID || field.id > MAX_FIELD_ID) {
        throw new InvalidFieldIdError(field.name, field.id);
      }
      id = field.id;
    }

    const originalLine = idLines.get(id);
    if (originalLine !== undefined) {
      throw new DuplicateFieldIdError(id, field.name, originalLine);
    }
    idLines.set(id, field.line);

    if (options.disallowDefaultValues === true && field.default !== undefined) {
      throw new IllegalDefaultValueError(field.name);
    }
    const required = field.requiredness === 'required';
    if (options.disallowRequired === true && required) {
      throw new IllegalRequirednessError(field.name);
    }

    compiled.push({
      id,
      name: field.name,
      type: compileTypeReference(field.type),
      required,
      ...(field.default !== undefined ? { default: field.default } : {}),
    });
  }

  return compiled;
}
