import type { FunctionSpec, ResolvedTypeSpec, ServiceSpec, TypeSpec, TypedefSpec } from './spec-types.js';

// Read-only traversal helpers for consumers of a linked spec graph.

export class SpecGraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpecGraphError';
  }
}

export type RootTypeSpec = Exclude<ResolvedTypeSpec, TypedefSpec>;

/** Follows typedef targets down to the first non-typedef spec. */
export function rootTypeSpec(spec: TypeSpec): RootTypeSpec {
  const seen: string[] = [];
  let current = spec;
  while (current.kind === 'typedef') {
    if (seen.includes(current.name)) {
      throw new SpecGraphError(`typedef cycle: ${[...seen, current.name].join(' -> ')}`);
    }
    seen.push(current.name);
    current = current.target;
  }
  if (current.kind === 'reference') {
    throw new SpecGraphError(`reference "${current.name}" on line ${current.line} has not been linked`);
  }
  return current;
}

export function isStructType(spec: TypeSpec): boolean {
  return rootTypeSpec(spec).kind === 'struct';
}

/** The service followed by its parent chain, nearest first. */
export function serviceAncestry(service: ServiceSpec): readonly ServiceSpec[] {
  const chain: ServiceSpec[] = [];
  let current: ServiceSpec | undefined = service;
  while (current !== undefined) {
    if (chain.includes(current)) {
      throw new SpecGraphError(
        `service inheritance cycle: ${[...chain, current].map((entry) => entry.name).join(' -> ')}`,
      );
    }
    chain.push(current);
    const parent: ServiceSpec['parent'] = current.parent;
    if (parent?.kind === 'serviceReference') {
      throw new SpecGraphError(`parent "${parent.name}" of service "${current.name}" has not been linked`);
    }
    current = parent;
  }
  return chain;
}

export interface ServiceFunctionMatch {
  readonly service: ServiceSpec;
  readonly fn: FunctionSpec;
}

/** Looks `name` up in the service's own functions, then up the parent chain. */
export function findServiceFunction(service: ServiceSpec, name: string): ServiceFunctionMatch | undefined {
  for (const candidate of serviceAncestry(service)) {
    const fn = candidate.functions.get(name);
    if (fn !== undefined) {
      return { service: candidate, fn };
    }
  }
  return undefined;
}
