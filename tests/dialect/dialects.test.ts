import { describe, it, expect, afterEach } from 'vitest';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { SqliteDialect } from '../../src/core/dialect/sqlite/index.js';
import { DialectFactory, resolveDialectInput } from '../../src/core/dialect/dialect-factory.js';
import { columnTypes } from '../../src/query-builder/statement-utils.js';
import { COLUMN_TYPES, createColumn } from '../../src/schema/column-types.js';
import { RelpathError, SchemaDefinitionError } from '../../src/errors.js';
import { createSchema } from '../fixtures/schema.js';

describe('dialect type maps', () => {
  it('maps every column type on both dialects', () => {
    for (const dialect of [new PostgresDialect(), new SqliteDialect()]) {
      expect(Object.keys(dialect.typeMap).sort()).toEqual([...COLUMN_TYPES].sort());
    }
  });

  it('renders native arrays on postgres', () => {
    const { parameter } = createSchema();
    expect(columnTypes(parameter, 'postgres', ['name', 'timestamps', 'readings', 'meta'])).toEqual({
      name: 'VARCHAR',
      timestamps: 'TIMESTAMP[]',
      readings: 'FLOAT[][]',
      meta: 'JSON'
    });
  });

  it('degrades arrays to JSON on sqlite', () => {
    const { parameter } = createSchema();
    expect(columnTypes(parameter, new SqliteDialect(), ['name', 'timestamps', 'readings'])).toEqual({
      name: 'TEXT',
      timestamps: 'JSON',
      readings: 'JSON'
    });
  });

  it('follows dotted names and defaults to the default columns', () => {
    const { temperature } = createSchema();
    expect(columnTypes(temperature, 'sqlite')).toEqual({
      timestamp: 'DATETIME',
      'city.name': 'TEXT',
      value: 'FLOAT'
    });
  });

  it('rejects unknown columns', () => {
    const { temperature } = createSchema();
    expect(() => columnTypes(temperature, 'sqlite', ['humidity'])).toThrow(SchemaDefinitionError);
  });
});

describe('value encoding', () => {
  it('JSON-encodes arrays on sqlite only', () => {
    const { parameter } = createSchema();
    const readings = parameter.columns.readings;
    expect(new SqliteDialect().encodeValue(readings, [[1, 2], [3]])).toBe('[[1,2],[3]]');
    expect(new PostgresDialect().encodeValue(readings, [[1, 2], [3]])).toEqual([[1, 2], [3]]);
  });

  it('JSON-encodes json columns everywhere', () => {
    const { parameter } = createSchema();
    expect(new PostgresDialect().encodeValue(parameter.columns.meta, { unit: 'C' })).toBe('{"unit":"C"}');
  });

  it('writes dates as ISO text on sqlite', () => {
    const { temperature } = createSchema();
    const at = new Date('2024-03-01T12:00:00.000Z');
    expect(new SqliteDialect().encodeValue(temperature.columns.timestamp, at)).toBe('2024-03-01T12:00:00.000Z');
    expect(new PostgresDialect().encodeValue(temperature.columns.timestamp, at)).toBe(at);
  });

  it('writes only the calendar day for date columns on sqlite', () => {
    const day = createColumn('holiday', 'day', 'date');
    const at = new Date('2024-03-01T12:00:00.000Z');
    expect(new SqliteDialect().encodeValue(day, at)).toBe('2024-03-01');
    expect(new PostgresDialect().encodeValue(day, at)).toBe(at);
  });

  it('turns missing values into NULL', () => {
    expect(new SqliteDialect().encodeValue(undefined, undefined)).toBeNull();
  });
});

describe('DialectFactory', () => {
  afterEach(() => DialectFactory.clear());

  it('creates built-in dialects by key', () => {
    expect(DialectFactory.create('sqlite')).toBeInstanceOf(SqliteDialect);
    expect(resolveDialectInput('postgres')).toBeInstanceOf(PostgresDialect);
  });

  it('passes dialect instances through', () => {
    const dialect = new SqliteDialect();
    expect(resolveDialectInput(dialect)).toBe(dialect);
  });

  it('accepts registered keys', () => {
    DialectFactory.register('warehouse', () => new PostgresDialect());
    expect(DialectFactory.create('warehouse')).toBeInstanceOf(PostgresDialect);
  });

  it('rejects unknown keys', () => {
    expect(() => DialectFactory.create('oracle')).toThrow(RelpathError);
  });
});
