import { createColumn, type ColumnDef } from './column-types.js';
import type { SchemaRegistry } from './registry.js';
import { SchemaDefinitionError } from '../errors.js';

/**
 * Optional parts of a table declaration
 */
export interface TableOptions {
  /** Columns identifying a row; defaults to every column */
  naturalKey?: string[];
  /** Local column name → referenced table name */
  foreignKeys?: Record<string, string>;
  /** Columns that must not be null, in addition to the natural key */
  notNull?: string[];
  /** Relation name → `"<table>.<column>"` of rows pointing back at this table */
  oneToMany?: Record<string, string>;
  /** Defaults to `id` */
  primaryKey?: string;
}

/**
 * Definition of a database table. Immutable once registered.
 */
export interface TableDef {
  /** Name of the table */
  readonly name: string;
  /** Column definitions keyed by name, in declaration order */
  readonly columns: Readonly<Record<string, ColumnDef>>;
  readonly naturalKey: readonly string[];
  readonly foreignKeys: Readonly<Record<string, string>>;
  readonly oneToMany: Readonly<Record<string, string>>;
  /** Natural key plus the explicit not-null columns */
  readonly notNull: ReadonlySet<string>;
  readonly primaryKey: string;
  /** Registry used to resolve foreign-key targets */
  readonly registry: SchemaRegistry;
}

export type TableDefinitionResult =
  | { ok: true; table: TableDef }
  | { ok: false; errors: SchemaDefinitionError[] };

const DEFAULT_PRIMARY_KEY = 'id';

const parseColumns = (
  name: string,
  columns: Record<string, string>,
  errors: SchemaDefinitionError[]
): Record<string, ColumnDef> => {
  const parsed: Record<string, ColumnDef> = {};
  for (const [columnName, declaration] of Object.entries(columns)) {
    try {
      parsed[columnName] = createColumn(name, columnName, declaration);
    } catch (error) {
      if (!(error instanceof SchemaDefinitionError)) throw error;
      errors.push(error);
    }
  }
  return parsed;
};

/**
 * Checks a declaration and builds the table metadata, collecting every
 * problem instead of stopping at the first one. Registration is left to the
 * registry.
 */
export const buildTable = (
  registry: SchemaRegistry,
  name: string,
  columns: Record<string, string>,
  options: TableOptions = {}
): TableDefinitionResult => {
  const errors: SchemaDefinitionError[] = [];
  const parsed = parseColumns(name, columns, errors);
  const declared = new Set(Object.keys(columns));

  const naturalKey = options.naturalKey?.length ? [...options.naturalKey] : Object.keys(columns);
  const foreignKeys = { ...(options.foreignKeys ?? {}) };
  const oneToMany = { ...(options.oneToMany ?? {}) };
  const primaryKey = options.primaryKey ?? DEFAULT_PRIMARY_KEY;

  for (const column of naturalKey) {
    if (!declared.has(column)) {
      errors.push(
        new SchemaDefinitionError(`Table '${name}': natural key column '${column}' is not declared`, name, column)
      );
    }
  }

  for (const column of Object.keys(foreignKeys)) {
    if (!declared.has(column)) {
      errors.push(
        new SchemaDefinitionError(`Table '${name}': foreign key '${column}' is not a declared column`, name, column)
      );
    }
  }

  if (naturalKey.length === 1) {
    const [nk] = naturalKey;
    if (foreignKeys[nk] === name) {
      errors.push(
        new SchemaDefinitionError(`Table '${name}': Foreign key '${nk}' refers to table natural key`, name, nk)
      );
    }
  }

  for (const [relation, target] of Object.entries(oneToMany)) {
    const parts = target.split('.');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      errors.push(
        new SchemaDefinitionError(
          `Table '${name}': one-to-many relation '${relation}' must be written as '<table>.<column>', got '${target}'`,
          name
        )
      );
    }
  }

  if (registry.has(name)) {
    errors.push(new SchemaDefinitionError(`Table '${name}' is already registered`, name));
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const table: TableDef = Object.freeze({
    name,
    columns: Object.freeze(parsed),
    naturalKey: Object.freeze(naturalKey),
    foreignKeys: Object.freeze(foreignKeys),
    oneToMany: Object.freeze(oneToMany),
    notNull: new Set([...naturalKey, ...(options.notNull ?? [])]),
    primaryKey,
    registry
  });
  return { ok: true, table };
};

/**
 * Public API: column lookup by name.
 * @throws SchemaDefinitionError when the column is not declared
 */
export const getColumn = (table: TableDef, key: string): ColumnDef => {
  if (!Object.hasOwn(table.columns, key)) {
    throw new SchemaDefinitionError(`Column '${key}' does not exist on table '${table.name}'`, table.name, key);
  }
  return table.columns[key];
};

/**
 * Splits a one-to-many encoding (`"temperature.city"`) into its parts.
 */
export const parseOneToMany = (encoded: string): { table: string; column: string } => {
  const [table, column] = encoded.split('.');
  return { table, column };
};
