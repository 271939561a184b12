import { UnresolvedReferenceError, withOwner } from './compile-errors.js';
import type { Scope, ScopeEntry } from './scope.js';
import type {
  FieldGroup,
  FunctionSpec,
  ListSpec,
  MapSpec,
  ResolvedTypeSpec,
  ServiceReference,
  ServiceSpec,
  SetSpec,
  Spec,
  StructSpec,
  TypeSpec,
  TypedefSpec,
} from './spec-types.js';

// Specs whose references have all been resolved. A spec is added before its
// references are walked so that cyclic graphs terminate. Every spec marked
// during one top-level link call is unmarked again if that call fails, since
// a spec finished inside a cycle may still reach the spec that failed.
const linkedSpecs = new WeakSet<object>();
let pendingSpecs: object[] | undefined;

export function isLinked(spec: Spec | ServiceReference): boolean {
  switch (spec.kind) {
    case 'primitive':
      return true;
    case 'reference':
    case 'serviceReference':
      return false;
    default:
      return linkedSpecs.has(spec);
  }
}

function linkOnce(spec: object, link: () => void): void {
  if (linkedSpecs.has(spec)) {
    return;
  }
  const outermost = pendingSpecs === undefined;
  const pending = pendingSpecs ?? [];
  pendingSpecs = pending;
  linkedSpecs.add(spec);
  pending.push(spec);
  try {
    link();
  } catch (error) {
    for (const marked of pending) {
      linkedSpecs.delete(marked);
    }
    throw error;
  } finally {
    if (outermost) {
      pendingSpecs = undefined;
    }
  }
}

/**
 * Resolves every reference reachable from `spec` through `scope`. A
 * by-name reference is replaced by the spec registered under that name,
 * which is linked in turn against the scope that registered it. The resolved
 * spec is returned so callers can store it in the slot that held the reference.
 */
export function linkTypeSpec(spec: TypeSpec, scope: Scope): ResolvedTypeSpec {
  switch (spec.kind) {
    case 'reference': {
      const target = scope.resolveType(spec.name);
      if (target === undefined) {
        throw new UnresolvedReferenceError(spec.name, spec.line);
      }
      return linkTypeSpec(target.spec, target.scope);
    }
    case 'primitive':
      return spec;
    case 'map':
      return linkMapSpec(spec, scope);
    case 'list':
    case 'set':
      return linkCollectionSpec(spec, scope);
    case 'struct':
      return linkStructSpec(spec, scope);
    case 'typedef':
      return linkTypedefSpec(spec, scope);
    case 'enum':
      linkOnce(spec, () => {});
      return spec;
  }
}

function linkMapSpec(spec: MapSpec, scope: Scope): MapSpec {
  linkOnce(spec, () => {
    spec.keySpec = linkTypeSpec(spec.keySpec, scope);
    spec.valueSpec = linkTypeSpec(spec.valueSpec, scope);
  });
  return spec;
}

function linkCollectionSpec(spec: ListSpec | SetSpec, scope: Scope): ListSpec | SetSpec {
  linkOnce(spec, () => {
    spec.valueSpec = linkTypeSpec(spec.valueSpec, scope);
  });
  return spec;
}

function linkStructSpec(spec: StructSpec, scope: Scope): StructSpec {
  linkOnce(spec, () => {
    withOwner('link', spec.name, () => linkFieldGroup(spec.fields, scope));
  });
  return spec;
}

function linkTypedefSpec(spec: TypedefSpec, scope: Scope): TypedefSpec {
  linkOnce(spec, () => {
    spec.target = withOwner('link', spec.name, () => linkTypeSpec(spec.target, scope));
  });
  return spec;
}

export function linkFieldGroup(fields: FieldGroup, scope: Scope): void {
  for (const field of fields) {
    field.type = linkTypeSpec(field.type, scope);
  }
}

export function linkFunctionSpec(fn: FunctionSpec, scope: Scope): void {
  linkOnce(fn, () => {
    withOwner('link', fn.name, () => {
      linkFieldGroup(fn.args, scope);
      const result = fn.result;
      if (result === undefined) {
        return;
      }
      if (result.returnType !== undefined) {
        result.returnType = linkTypeSpec(result.returnType, scope);
      }
      linkFieldGroup(result.exceptions, scope);
    });
  });
}

/**
 * Links a service. `parent` becomes the exact service instance registered in
 * the scope; the parent's functions stay on the parent.
 */
export function linkServiceSpec(spec: ServiceSpec, scope: Scope): ServiceSpec {
  linkOnce(spec, () => {
    const parent = spec.parent;
    if (parent !== undefined) {
      spec.parent = withOwner('link', spec.name, () => {
        const resolved = resolveService(parent, scope);
        return linkServiceSpec(resolved.spec, resolved.scope);
      });
    }
    for (const fn of spec.functions.values()) {
      linkFunctionSpec(fn, scope);
    }
  });
  return spec;
}

function resolveService(reference: ServiceSpec | ServiceReference, scope: Scope): ScopeEntry<ServiceSpec> {
  if (reference.kind === 'service') {
    return { spec: reference, scope };
  }
  const target = scope.resolveService(reference.name);
  if (target === undefined) {
    throw new UnresolvedReferenceError(reference.name, reference.line);
  }
  return target;
}

export function linkSpec(spec: Spec, scope: Scope): void {
  if (spec.kind === 'service') {
    linkServiceSpec(spec, scope);
    return;
  }
  linkTypeSpec(spec, scope);
}
