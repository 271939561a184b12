import type { DefinitionAST } from '../ast/types.js';
import { compileDefinition } from './compile-definition.js';
import { NOOP_COMPILE_LOGGER, type CompileLogger } from './compile-logger.js';
import { createNamespace } from './field-group.js';
import { linkServiceSpec, linkTypeSpec } from './link.js';
import { createScope, type Scope } from './scope.js';
import type { NamedTypeSpec, ServiceSpec } from './spec-types.js';

export interface CompileModuleOptions {
  /** Scopes of already compiled units, keyed by the name used to qualify references into them. */
  readonly includes?: Readonly<Record<string, Scope>>;
  readonly logger?: CompileLogger;
}

export interface ResolvedCompileModuleOptions {
  readonly includes: Readonly<Record<string, Scope>>;
  readonly logger: CompileLogger;
}

export interface CompiledModule {
  readonly types: ReadonlyMap<string, NamedTypeSpec>;
  readonly services: ReadonlyMap<string, ServiceSpec>;
  readonly scope: Scope;
}

const INCLUDE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function resolveCompileModuleOptions(options: CompileModuleOptions = {}): ResolvedCompileModuleOptions {
  const includes = options.includes ?? {};
  for (const name of Object.keys(includes)) {
    if (!INCLUDE_NAME_PATTERN.test(name)) {
      throw new Error(`include name "${name}" must be an identifier.`);
    }
  }
  return {
    includes,
    logger: options.logger ?? NOOP_COMPILE_LOGGER,
  };
}

/**
 * Compiles every definition of one unit, then builds its scope, then links
 * every spec against that scope. Because linking starts only after all
 * definitions are compiled, definitions may refer to each other in any order.
 * The first error aborts the session.
 */
export function compileModule(
  definitions: readonly DefinitionAST[],
  options: CompileModuleOptions = {},
): CompiledModule {
  const { includes, logger } = resolveCompileModuleOptions(options);
  const names = createNamespace();
  const types = new Map<string, NamedTypeSpec>();
  const services = new Map<string, ServiceSpec>();

  for (const definition of definitions) {
    names.claim(definition.name, definition.line);
    const compiled = compileDefinition(definition, { logger });
    if (compiled.kind === 'type') {
      types.set(definition.name, compiled.spec);
    } else {
      services.set(definition.name, compiled.spec);
    }
    logger.logDefinitionCompiled({ name: definition.name, kind: definition.kind, line: definition.line });
  }

  const scope = createScope({ types: types.values(), services: services.values(), includes });
  logger.logScopeBuilt({ typeCount: types.size, serviceCount: services.size, includes: Object.keys(includes) });

  for (const spec of types.values()) {
    linkTypeSpec(spec, scope);
    logger.logSpecLinked({ name: spec.name, kind: 'type' });
  }
  for (const spec of services.values()) {
    linkServiceSpec(spec, scope);
    logger.logSpecLinked({ name: spec.name, kind: 'service' });
  }

  return { types, services, scope };
}
