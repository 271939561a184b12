import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  EMPTY_SCOPE,
  I32_SPEC,
  STRING_SPEC,
  UnresolvedReferenceError,
  compileService,
  compileStruct,
  compileTypedef,
  createScope,
  isLinked,
  linkServiceSpec,
  linkSpec,
  linkTypeSpec,
  rootCompileError,
  type MapSpec,
  type StructSpec,
} from '../../src/compile/index.js';
import { assertCompileFailure } from '../helpers/compile-error-assertions.js';
import { base, field, fn, listOf, mapOf, named, service, setOf, struct, typedef } from '../helpers/ast-builders.js';

describe('linkTypeSpec', () => {
  it('links a self-referential struct exactly once', () => {
    const node = compileStruct(struct('struct', 'Node', [field(1, 'value', base('i32')), field(2, 'next', named('Node'))]));
    assert.equal(isLinked(node), false);

    linkTypeSpec(node, createScope({ types: [node] }));

    assert.equal(isLinked(node), true);
    assert.equal(node.fields[1]?.type, node);
    assert.equal(node.fields[0]?.type, I32_SPEC);
  });

  it('resolves mutual references declared in any order', () => {
    const tree = compileStruct(struct('struct', 'Tree', [field(1, 'children', listOf(named('Branch')))]));
    const branch = compileStruct(struct('struct', 'Branch', [field(1, 'owner', named('Tree'))]));
    const scope = createScope({ types: [branch, tree] });

    linkTypeSpec(branch, scope);

    assert.equal(isLinked(tree), true);
    assert.equal(branch.fields[0]?.type, tree);
    assert.deepEqual(tree.fields[0]?.type, { kind: 'list', valueSpec: branch });
  });

  it('resolves container element references', () => {
    const user = compileStruct(struct('struct', 'User', []));
    const index = compileStruct(
      struct('struct', 'Index', [
        field(1, 'byName', mapOf(base('string'), named('User'))),
        field(2, 'ids', setOf(named('UserId'))),
      ]),
    );
    const userId = compileTypedef(typedef('UserId', base('i32')));

    linkTypeSpec(index, createScope({ types: [user, userId, index] }));

    const byName = index.fields[0]?.type;
    assert.ok(byName !== undefined && byName.kind === 'map');
    const expectedMap: MapSpec = { kind: 'map', keySpec: STRING_SPEC, valueSpec: user };
    assert.deepEqual(byName, expectedMap);
    assert.equal(byName.valueSpec, user);
    assert.deepEqual(index.fields[1]?.type, { kind: 'set', valueSpec: userId });
    assert.equal(userId.target, I32_SPEC);
  });

  it('returns the spec registered for a by-name reference', () => {
    const user: StructSpec = { kind: 'struct', name: 'User', type: 'struct', fields: [] };

    assert.equal(linkTypeSpec({ kind: 'reference', name: 'User', line: 1 }, createScope({ types: [user] })), user);
  });

  it('reports unresolved names with the owning struct', () => {
    const spec = compileStruct(struct('struct', 'Holder', [field(1, 'missing', named('Missing', 7))]));

    const error = assertCompileFailure({
      run: () => linkTypeSpec(spec, EMPTY_SCOPE),
      message: 'cannot link "Holder": Missing is not defined',
      rootCode: 'UNRESOLVED_REFERENCE',
    });
    const root = rootCompileError(error);
    assert.ok(root instanceof UnresolvedReferenceError);
    assert.equal(root.referenceName, 'Missing');
    assert.equal(root.line, 7);
    assert.equal(isLinked(spec), false);
  });

  it('chains owners when the failure is inside a referenced struct', () => {
    const inner = compileStruct(struct('struct', 'Inner', [field(1, 'gone', named('Gone'))]));
    const outer = compileStruct(struct('struct', 'Outer', [field(1, 'inner', named('Inner'))]));

    assertCompileFailure({
      run: () => linkTypeSpec(outer, createScope({ types: [inner, outer] })),
      message: 'cannot link "Outer": cannot link "Inner": Gone is not defined',
      rootCode: 'UNRESOLVED_REFERENCE',
    });
    assert.equal(isLinked(outer), false);
    assert.equal(isLinked(inner), false);
  });

  it('unmarks every spec linked during a failed attempt', () => {
    const a = compileStruct(struct('struct', 'A', [field(1, 'c', named('C')), field(2, 'm', named('Missing', 5))]));
    const c = compileStruct(struct('struct', 'C', [field(1, 'a', named('A'))]));
    const scope = createScope({ types: [a, c] });

    assertCompileFailure({
      run: () => linkTypeSpec(a, scope),
      message: 'cannot link "A": Missing is not defined',
      rootCode: 'UNRESOLVED_REFERENCE',
    });
    assert.equal(isLinked(a), false);
    assert.equal(isLinked(c), false);

    assertCompileFailure({
      run: () => linkTypeSpec(c, scope),
      message: 'cannot link "C": cannot link "A": Missing is not defined',
      rootCode: 'UNRESOLVED_REFERENCE',
    });
    assert.equal(isLinked(c), false);
  });

  it('links an included spec against the scope that registered it', () => {
    const sharedInner = compileStruct(struct('struct', 'Inner', []));
    const sharedOuter = compileStruct(struct('struct', 'Outer', [field(1, 'inner', named('Inner'))]));
    const localInner = compileStruct(struct('struct', 'Inner', [field(1, 'value', base('i32'))]));
    const holder = compileStruct(struct('struct', 'Holder', [field(1, 'outer', named('shared.Outer'))]));
    const shared = createScope({ types: [sharedInner, sharedOuter] });

    linkTypeSpec(holder, createScope({ types: [localInner, holder], includes: { shared } }));

    assert.equal(holder.fields[0]?.type, sharedOuter);
    assert.equal(sharedOuter.fields[0]?.type, sharedInner);
    assert.equal(isLinked(localInner), false);
  });

  it('reports unresolved typedef targets with the typedef name', () => {
    assertCompileFailure({
      run: () => linkTypeSpec(compileTypedef(typedef('Alias', named('Nowhere'))), EMPTY_SCOPE),
      message: 'cannot link "Alias": Nowhere is not defined',
      rootCode: 'UNRESOLVED_REFERENCE',
    });
  });
});

describe('linkServiceSpec', () => {
  it('is idempotent: a second link is a no-op even against an empty scope', () => {
    const user = compileStruct(struct('struct', 'User', []));
    const spec = compileService(service('Users', [fn('get', { returnType: named('User') })]));

    linkServiceSpec(spec, createScope({ types: [user] }));
    const afterFirst = spec.functions.get('get')?.result?.returnType;
    linkServiceSpec(spec, EMPTY_SCOPE);

    assert.equal(isLinked(spec), true);
    assert.equal(spec.functions.get('get')?.result?.returnType, afterFirst);
    assert.equal(afterFirst, user);
  });

  it('reports unresolved argument types with the function name', () => {
    const spec = compileService(
      service('Store', [fn('put', { parameters: [field(1, 'item', named('Item', 4))] })]),
    );

    assertCompileFailure({
      run: () => linkServiceSpec(spec, EMPTY_SCOPE),
      message: 'cannot link "put": Item is not defined',
      rootCode: 'UNRESOLVED_REFERENCE',
    });
    assert.equal(isLinked(spec), false);
  });

  it('reports a missing parent with the service name', () => {
    const spec = compileService(service('Child', [], { parent: 'Base', line: 3 }));

    assertCompileFailure({
      run: () => linkServiceSpec(spec, EMPTY_SCOPE),
      message: 'cannot link "Child": Base is not defined',
      rootCode: 'UNRESOLVED_REFERENCE',
    });
    assert.deepEqual(spec.parent, { kind: 'serviceReference', name: 'Base', line: 3 });
  });

  it('links the parent service through the same scope', () => {
    const item = compileStruct(struct('struct', 'Item', []));
    const parentService = compileService(service('Base', [fn('get', { returnType: named('Item') })]));
    const child = compileService(service('Child', [], { parent: 'Base' }));

    linkSpec(child, createScope({ types: [item], services: [parentService, child] }));

    assert.equal(child.parent, parentService);
    assert.equal(isLinked(parentService), true);
    assert.equal(parentService.functions.get('get')?.result?.returnType, item);
    assert.equal(child.functions.size, 0);
  });

  it('links an included parent service against its own scope', () => {
    const item = compileStruct(struct('struct', 'Item', []));
    const parentService = compileService(service('Base', [fn('get', { returnType: named('Item') })]));
    const child = compileService(service('Child', [], { parent: 'shared.Base' }));
    const shared = createScope({ types: [item], services: [parentService] });

    linkServiceSpec(child, createScope({ services: [child], includes: { shared } }));

    assert.equal(child.parent, parentService);
    assert.equal(parentService.functions.get('get')?.result?.returnType, item);
  });

  it('terminates on inheritance cycles', () => {
    const a = compileService(service('A', [], { parent: 'B' }));
    const b = compileService(service('B', [], { parent: 'A' }));

    linkServiceSpec(a, createScope({ services: [a, b] }));

    assert.equal(a.parent, b);
    assert.equal(b.parent, a);
  });
});
