import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { NOOP_COMPILE_LOGGER, createCompileLogger, type LoggerConsole } from '../../src/compile/index.js';

function createFakeConsole(): LoggerConsole & { readonly debugs: unknown[][]; readonly warnings: unknown[][] } {
  const debugs: unknown[][] = [];
  const warnings: unknown[][] = [];
  return {
    debugs,
    warnings,
    debug: (...args: unknown[]) => {
      debugs.push(args);
    },
    warn: (...args: unknown[]) => {
      warnings.push(args);
    },
  };
}

describe('compile logger', () => {
  it('writes debug lines for compile, scope and link events', () => {
    const fakeConsole = createFakeConsole();
    const logger = createCompileLogger({ console: fakeConsole });

    logger.logDefinitionCompiled({ name: 'KeyValue', kind: 'service', line: 6 });
    logger.logScopeBuilt({ typeCount: 2, serviceCount: 1, includes: [] });
    logger.logScopeBuilt({ typeCount: 0, serviceCount: 1, includes: ['shared', 'common'] });
    logger.logSpecLinked({ name: 'KeyValue', kind: 'service' });

    assert.equal(logger.enabled, true);
    assert.deepEqual(fakeConsole.debugs, [
      ['[idl-compile] compiled service "KeyValue" (line 6)'],
      ['[idl-compile] scope built with 2 type(s), 1 service(s)'],
      ['[idl-compile] scope built with 0 type(s), 1 service(s) over includes shared, common'],
      ['[idl-compile] linked service "KeyValue"'],
    ]);
    assert.deepEqual(fakeConsole.warnings, []);
  });

  it('writes warnings with their line and a custom prefix', () => {
    const fakeConsole = createFakeConsole();
    const logger = createCompileLogger({ console: fakeConsole, prefix: '[test]' });

    logger.logWarning({ message: 'field "key" has no explicit id; assigned id -1', line: 12 });

    assert.deepEqual(fakeConsole.warnings, [['[test] line 12: field "key" has no explicit id; assigned id -1']]);
  });

  it('noop logger is disabled and accepts every event', () => {
    assert.equal(NOOP_COMPILE_LOGGER.enabled, false);
    NOOP_COMPILE_LOGGER.logDefinitionCompiled({ name: 'A', kind: 'struct', line: 1 });
    NOOP_COMPILE_LOGGER.logWarning({ message: 'ignored', line: 1 });
  });
});
