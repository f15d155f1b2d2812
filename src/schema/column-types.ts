import { SchemaDefinitionError } from '../errors.js';

/**
 * Canonical, dialect-agnostic column data types.
 * The set is closed; dialects map each one to a native keyword.
 */
export const COLUMN_TYPES = [
  'text',
  'int',
  'bigint',
  'float',
  'timestamp',
  'timestamptz',
  'date',
  'bool',
  'uuid',
  'json',
  'blob'
] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

const BASE_ALIASES: Record<string, ColumnType> = {
  str: 'text',
  varchar: 'text',
  'character varying': 'text',
  text: 'text',
  int: 'int',
  integer: 'int',
  bigint: 'bigint',
  float: 'float',
  'double precision': 'float',
  numeric: 'float',
  timestamp: 'timestamp',
  'timestamp without time zone': 'timestamp',
  timestamptz: 'timestamptz',
  'timestamp with time zone': 'timestamptz',
  date: 'date',
  bool: 'bool',
  boolean: 'bool',
  uuid: 'uuid',
  json: 'json',
  blob: 'blob',
  bytea: 'blob'
};

/**
 * Declared type names accepted in table definitions, lower and upper case.
 */
export const TYPE_ALIASES: ReadonlyMap<string, ColumnType> = new Map(
  Object.entries(BASE_ALIASES).flatMap(([alias, type]) => [
    [alias, type],
    [alias.toUpperCase(), type]
  ])
);

export interface ParsedColumnType {
  type: ColumnType;
  /** Number of array dimensions (`int[][]` → 2) */
  dims: number;
}

/**
 * Definition of a table column
 */
export interface ColumnDef {
  /** Column name */
  readonly name: string;
  /** Semantic data type */
  readonly type: ColumnType;
  /** Array dimension count, 0 for scalars */
  readonly dims: number;
}

const ARRAY_SUFFIX = /(\[\s*\])+$/;

/**
 * Parses a declared type such as `varchar`, `INTEGER` or `timestamp[]`.
 * @param column - Column name, used in the error message
 * @param declaration - Declared type
 * @throws SchemaDefinitionError when the alias is unknown
 */
export const parseColumnType = (table: string, column: string, declaration: string): ParsedColumnType => {
  const trimmed = declaration.trim();
  const suffix = ARRAY_SUFFIX.exec(trimmed);
  const base = suffix ? trimmed.slice(0, suffix.index).trim() : trimmed;
  const dims = suffix ? (suffix[0].match(/\[/g) ?? []).length : 0;
  const type = TYPE_ALIASES.get(base);
  if (!type) {
    throw new SchemaDefinitionError(
      `Table '${table}': type '${declaration}' not supported (for column '${column}')`,
      table,
      column
    );
  }
  return { type, dims };
};

export const createColumn = (table: string, name: string, declaration: string): ColumnDef => {
  const { type, dims } = parseColumnType(table, name, declaration);
  return Object.freeze({ name: name.trim(), type, dims });
};

export type RuntimeScalar = 'number' | 'string' | 'boolean' | 'Date' | 'json' | 'Buffer';

export interface RuntimeType {
  scalar: RuntimeScalar;
  dims: number;
}

const RUNTIME_SCALARS: Record<ColumnType, RuntimeScalar> = {
  text: 'string',
  int: 'number',
  bigint: 'number',
  float: 'number',
  timestamp: 'Date',
  timestamptz: 'Date',
  date: 'Date',
  bool: 'boolean',
  uuid: 'string',
  json: 'json',
  blob: 'Buffer'
};

/**
 * Describes the JS value carried by a column.
 */
export const runtimeTypeOf = (column: ColumnDef): RuntimeType => ({
  scalar: RUNTIME_SCALARS[column.type],
  dims: column.dims
});
