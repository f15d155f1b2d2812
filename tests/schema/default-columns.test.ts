import { describe, it, expect } from 'vitest';
import { defaultColumns } from '../../src/schema/default-columns.js';
import { SchemaRegistry } from '../../src/schema/registry.js';
import { UnsupportedPathShapeError } from '../../src/errors.js';
import { createSchema } from '../fixtures/schema.js';

describe('defaultColumns', () => {
  it('replaces foreign keys with the referenced natural key', () => {
    const { person, temperature } = createSchema();
    expect(defaultColumns(person)).toEqual(['name', 'parent.name']);
    expect(defaultColumns(temperature)).toEqual(['timestamp', 'city.name', 'value']);
  });

  it('expands natural keys recursively', () => {
    const { alert } = createSchema();
    expect(defaultColumns(alert)).toEqual(['temperature.timestamp', 'temperature.city.name', 'level']);
  });

  it('restricts to the natural key on request', () => {
    const { person, temperature } = createSchema();
    expect(defaultColumns(person, { naturalKeyOnly: true })).toEqual(['name']);
    expect(defaultColumns(temperature, { naturalKeyOnly: true })).toEqual(['timestamp', 'city.name']);
  });

  it('rejects natural keys referencing each other in a cycle', () => {
    const schema = new SchemaRegistry();
    const left = schema.defineTable('left_side', { right: 'int' }, { foreignKeys: { right: 'right_side' } });
    schema.defineTable('right_side', { left: 'int' }, { foreignKeys: { left: 'left_side' } });
    expect(() => defaultColumns(left)).toThrow(UnsupportedPathShapeError);
  });
});
