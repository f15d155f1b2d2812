import { describe, it, expect } from 'vitest';
import { parseColumnType, runtimeTypeOf, createColumn } from '../../src/schema/column-types.js';
import { SchemaDefinitionError } from '../../src/errors.js';

describe('parseColumnType', () => {
  it.each([
    ['varchar', 'text', 0],
    ['VARCHAR', 'text', 0],
    ['character varying', 'text', 0],
    ['str', 'text', 0],
    ['integer', 'int', 0],
    ['BIGINT', 'bigint', 0],
    ['double precision', 'float', 0],
    ['numeric', 'float', 0],
    ['timestamp without time zone', 'timestamp', 0],
    ['timestamp with time zone', 'timestamptz', 0],
    ['boolean', 'bool', 0],
    ['bytea', 'blob', 0],
    ['int[]', 'int', 1],
    ['float [][]', 'float', 2],
    ['timestamp[ ]', 'timestamp', 1]
  ])('reads %j', (declaration, type, dims) => {
    expect(parseColumnType('t', 'c', declaration)).toEqual({ type, dims });
  });

  it('rejects unknown aliases', () => {
    expect(() => parseColumnType('t', 'c', 'money')).toThrow(SchemaDefinitionError);
    expect(() => parseColumnType('t', 'c', 'Varchar')).toThrow("Table 't': type 'Varchar' not supported (for column 'c')");
    expect(() => parseColumnType('t', 'c', '[]')).toThrow(SchemaDefinitionError);
  });
});

describe('runtimeTypeOf', () => {
  it('describes the value carried by a column', () => {
    expect(runtimeTypeOf(createColumn('t', 'at', 'timestamptz'))).toEqual({ scalar: 'Date', dims: 0 });
    expect(runtimeTypeOf(createColumn('t', 'tags', 'text[]'))).toEqual({ scalar: 'string', dims: 1 });
    expect(runtimeTypeOf(createColumn('t', 'raw', 'blob'))).toEqual({ scalar: 'Buffer', dims: 0 });
    expect(runtimeTypeOf(createColumn('t', 'flag', 'bool'))).toEqual({ scalar: 'boolean', dims: 0 });
  });
});
