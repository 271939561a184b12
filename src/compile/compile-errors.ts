export type IdlCompileErrorCode =
  | 'DUPLICATE_NAME'
  | 'DUPLICATE_FIELD_ID'
  | 'INVALID_FIELD_ID'
  | 'ILLEGAL_DEFAULT_VALUE'
  | 'ILLEGAL_REQUIREDNESS'
  | 'INVALID_FUNCTION'
  | 'INVALID_ENUM_VALUE'
  | 'UNRESOLVED_REFERENCE'
  | 'WRAPPED';

export abstract class IdlCompileError extends Error {
  abstract readonly code: IdlCompileErrorCode;
}

export class DuplicateNameError extends IdlCompileError {
  readonly code = 'DUPLICATE_NAME';
  readonly duplicateName: string;
  readonly originalLine: number;

  constructor(duplicateName: string, originalLine: number) {
    super(`the name "${duplicateName}" has already been used on line ${originalLine}`);
    this.name = 'DuplicateNameError';
    this.duplicateName = duplicateName;
    this.originalLine = originalLine;
  }
}

export class DuplicateFieldIdError extends IdlCompileError {
  readonly code = 'DUPLICATE_FIELD_ID';
  readonly fieldId: number;
  readonly fieldName: string;
  readonly originalLine: number;

  constructor(fieldId: number, fieldName: string, originalLine: number) {
    super(`the field id ${fieldId} has already been used on line ${originalLine}`);
    this.name = 'DuplicateFieldIdError';
    this.fieldId = fieldId;
    this.fieldName = fieldName;
    this.originalLine = originalLine;
  }
}

export class InvalidFieldIdError extends IdlCompileError {
  readonly code = 'INVALID_FIELD_ID';
  readonly fieldName: string;
  readonly fieldId: number;

  constructor(fieldName: string, fieldId: number) {
    super(`field "${fieldName}" has invalid id ${fieldId}: ids must be between 1 and 32767`);
    this.name = 'InvalidFieldIdError';
    this.fieldName = fieldName;
    this.fieldId = fieldId;
  }
}

export class IllegalDefaultValueError extends IdlCompileError {
  readonly code = 'ILLEGAL_DEFAULT_VALUE';
  readonly fieldName: string;

  constructor(fieldName: string) {
    super(`field "${fieldName}" cannot have a default value`);
    this.name = 'IllegalDefaultValueError';
    this.fieldName = fieldName;
  }
}

export class IllegalRequirednessError extends IdlCompileError {
  readonly code = 'ILLEGAL_REQUIREDNESS';
  readonly fieldName: string;

  constructor(fieldName: string) {
    super(`field "${fieldName}" cannot be required`);
    this.name = 'IllegalRequirednessError';
    this.fieldName = fieldName;
  }
}

export class InvalidFunctionError extends IdlCompileError {
  readonly code = 'INVALID_FUNCTION';
  readonly functionName: string;

  constructor(functionName: string, reason: string) {
    super(`oneway function "${functionName}" ${reason}`);
    this.name = 'InvalidFunctionError';
    this.functionName = functionName;
  }
}

export class InvalidEnumValueError extends IdlCompileError {
  readonly code = 'INVALID_ENUM_VALUE';
  readonly itemName: string;
  readonly value: number;

  constructor(itemName: string, value: number) {
    super(`enum item "${itemName}" has invalid value ${value}: values must be 32-bit integers`);
    this.name = 'InvalidEnumValueError';
    this.itemName = itemName;
    this.value = value;
  }
}

export class UnresolvedReferenceError extends IdlCompileError {
  readonly code = 'UNRESOLVED_REFERENCE';
  readonly referenceName: string;
  readonly line: number;

  constructor(referenceName: string, line: number) {
    super(`${referenceName} is not defined`);
    this.name = 'UnresolvedReferenceError';
    this.referenceName = referenceName;
    this.line = line;
  }
}

export type WrappedErrorPhase = 'compile' | 'link';

/** Chains the owning definition's name in front of a nested failure. */
export class WrappedCompileError extends IdlCompileError {
  readonly code = 'WRAPPED';
  readonly phase: WrappedErrorPhase;
  readonly owner: string;
  override readonly cause: IdlCompileError;

  constructor(phase: WrappedErrorPhase, owner: string, cause: IdlCompileError) {
    super(`cannot ${phase} "${owner}": ${cause.message}`, { cause });
    this.name = 'WrappedCompileError';
    this.phase = phase;
    this.owner = owner;
    this.cause = cause;
  }
}

export function isIdlCompileError(error: unknown): error is IdlCompileError {
  return error instanceof IdlCompileError;
}

export function isIdlCompileErrorCode<C extends IdlCompileErrorCode>(
  error: unknown,
  code: C,
): error is IdlCompileError & { readonly code: C } {
  return isIdlCompileError(error) && error.code === code;
}

/** Follows wrapped errors down to the failure that started the chain. */
export function rootCompileError(error: IdlCompileError): IdlCompileError {
  let current = error;
  while (current instanceof WrappedCompileError) {
    current = current.cause;
  }
  return current;
}

/**
 * Runs `action`, wrapping any compile error it throws with `owner`. Errors that
 * are not compile errors pass through untouched.
 */
export function withOwner<T>(phase: WrappedErrorPhase, owner: string, action: () => T): T {
  try {
    return action();
  } catch (error) {
    if (isIdlCompileError(error)) {
      throw new WrappedCompileError(phase, owner, error);
    }
    throw error;
  }
}
