import type { EnumDefinition } from '../ast/types.js';
import { InvalidEnumValueError, withOwner } from './compile-errors.js';
import { createNamespace } from './field-group.js';
import type { EnumItemSpec, EnumSpec } from './spec-types.js';

const MIN_ENUM_VALUE = -(2 ** 31);
const MAX_ENUM_VALUE = 2 ** 31 - 1;

/** Items without a value take the previous item's value plus one, starting at 0. */
export function compileEnum(definition: EnumDefinition): EnumSpec {
  const items = withOwner('compile', definition.name, () => {
    const names = createNamespace();
    const compiled: EnumItemSpec[] = [];
    let nextValue = 0;

    for (const item of definition.items) {
      names.claim(item.name, item.line);
      const value = item.value ?? nextValue;
      if (!Number.isInteger(value) || value < MIN_ENUM_VALUE || value > MAX_ENUM_VALUE) {
        throw new InvalidEnumValueError(item.name, value);
      }
      compiled.push({ name: item.name, value });
      nextValue = value + 1;
    }

    return compiled;
  });

  return { kind: 'enum', name: definition.name, items };
}
