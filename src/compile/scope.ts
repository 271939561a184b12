import type { NamedTypeSpec, ServiceSpec } from './spec-types.js';

/** A spec found by name, with the scope its own references resolve in. */
export interface ScopeEntry<T> {
  readonly spec: T;
  readonly scope: Scope;
}

/** Read-only name registry consulted while linking. */
export interface Scope {
  lookupType(name: string): NamedTypeSpec | undefined;
  lookupService(name: string): ServiceSpec | undefined;
  resolveType(name: string): ScopeEntry<NamedTypeSpec> | undefined;
  resolveService(name: string): ScopeEntry<ServiceSpec> | undefined;
}

export interface ScopeEntries {
  readonly types?: Iterable<NamedTypeSpec>;
  readonly services?: Iterable<ServiceSpec>;
  /** Scopes of included units, addressed as `<include>.<Name>`. */
  readonly includes?: Readonly<Record<string, Scope>>;
}

export const EMPTY_SCOPE: Scope = Object.freeze({
  lookupType: () => undefined,
  lookupService: () => undefined,
  resolveType: () => undefined,
  resolveService: () => undefined,
});

/**
 * Builds an immutable scope. Entries are copied at construction, so later
 * changes to the inputs are not observed. Later entries with a name already
 * present replace earlier ones; duplicate detection belongs to the caller,
 * which knows source lines.
 */
export function createScope(entries: ScopeEntries = {}): Scope {
  const types = new Map<string, NamedTypeSpec>();
  for (const spec of entries.types ?? []) {
    types.set(spec.name, spec);
  }
  const services = new Map<string, ServiceSpec>();
  for (const spec of entries.services ?? []) {
    services.set(spec.name, spec);
  }
  const includes = new Map<string, Scope>(Object.entries(entries.includes ?? {}));

  const resolve = <T>(
    name: string,
    local: ReadonlyMap<string, T>,
    viaInclude: (include: Scope, rest: string) => ScopeEntry<T> | undefined,
  ): ScopeEntry<T> | undefined => {
    const found = local.get(name);
    if (found !== undefined) {
      return { spec: found, scope };
    }
    const separator = name.indexOf('.');
    if (separator <= 0) {
      return undefined;
    }
    const include = includes.get(name.slice(0, separator));
    return include === undefined ? undefined : viaInclude(include, name.slice(separator + 1));
  };

  const scope: Scope = Object.freeze({
    lookupType: (name: string) => scope.resolveType(name)?.spec,
    lookupService: (name: string) => scope.resolveService(name)?.spec,
    resolveType: (name: string) => resolve(name, types, (include, rest) => include.resolveType(rest)),
    resolveService: (name: string) => resolve(name, services, (include, rest) => include.resolveService(rest)),
  });
  return scope;
}
