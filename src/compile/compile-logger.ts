import type { DefinitionKind } from '../ast/types.js';

export interface DefinitionCompiledLogEntry {
  readonly name: string;
  readonly kind: DefinitionKind;
  readonly line: number;
}

export interface ScopeBuiltLogEntry {
  readonly typeCount: number;
  readonly serviceCount: number;
  readonly includes: readonly string[];
}

export interface SpecLinkedLogEntry {
  readonly name: string;
  readonly kind: 'type' | 'service';
}

export interface CompileWarningLogEntry {
  readonly message: string;
  readonly line: number;
}

// ---------------------------------------------------------------------------
// Console abstraction (for testing)
// ---------------------------------------------------------------------------

export interface LoggerConsole {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export interface CompileLogger {
  readonly enabled: boolean;
  logDefinitionCompiled(entry: DefinitionCompiledLogEntry): void;
  logScopeBuilt(entry: ScopeBuiltLogEntry): void;
  logSpecLinked(entry: SpecLinkedLogEntry): void;
  logWarning(entry: CompileWarningLogEntry): void;
}

export const NOOP_COMPILE_LOGGER: CompileLogger = {
  enabled: false,
  logDefinitionCompiled: () => {},
  logScopeBuilt: () => {},
  logSpecLinked: () => {},
  logWarning: () => {},
};

export interface CreateCompileLoggerOptions {
  readonly console?: LoggerConsole;
  readonly prefix?: string;
}

export function createCompileLogger(options: CreateCompileLoggerOptions = {}): CompileLogger {
  const target = options.console ?? console;
  const prefix = options.prefix ?? '[idl-compile]';

  return {
    enabled: true,
    logDefinitionCompiled(entry) {
      target.debug(`${prefix} compiled ${entry.kind} "${entry.name}" (line ${entry.line})`);
    },
    logScopeBuilt(entry) {
      const includes = entry.includes.length === 0 ? '' : ` over includes ${entry.includes.join(', ')}`;
      target.debug(`${prefix} scope built with ${entry.typeCount} type(s), ${entry.serviceCount} service(s)${includes}`);
    },
    logSpecLinked(entry) {
      target.debug(`${prefix} linked ${entry.kind} "${entry.name}"`);
    },
    logWarning(entry) {
      target.warn(`${prefix} line ${entry.line}: ${entry.message}`);
    },
  };
}
