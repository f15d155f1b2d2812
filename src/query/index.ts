import { SelectQueryBuilder } from '../query-builder/select.js';
import { UpsertQueryBuilder } from '../query-builder/upsert.js';
import { UpdateQueryBuilder } from '../query-builder/update.js';
import { DeleteQueryBuilder } from '../query-builder/delete.js';
import type { WriteOptions } from '../query-builder/write-plan.js';
import type { ConditionInput } from '../query-builder/statement-utils.js';
import { type QueryTarget, resolveTable } from './target.js';

type ColumnsWithOptions = string[] | [...string[], WriteOptions];

const splitOptions = (args: ColumnsWithOptions): { columns: string[]; options: WriteOptions } => {
  const columns: string[] = [];
  let options: WriteOptions = {};
  for (const arg of args) {
    if (typeof arg === 'string') columns.push(arg);
    else options = arg;
  }
  return { columns, options };
};

/**
 * Creates a SELECT query builder for the specified table.
 *
 * @param target - The table definition, or a table name in the default schema
 * @param columns - Selected expressions; defaults to the table's default columns
 *
 * @example
 * ```typescript
 * const query = selectFrom(person, 'name', 'parent.name').where('(= parent.parent.name {})');
 * ```
 */
export const selectFrom = (target: QueryTarget, ...columns: ConditionInput[]): SelectQueryBuilder =>
  new SelectQueryBuilder(resolveTable(target), columns);

/**
 * Creates an upsert builder: rows conflicting on the natural key are updated.
 *
 * @example
 * ```typescript
 * const query = upsertInto(person, 'name', 'parent.name', { lenient: ['parent'] });
 * ```
 */
export const upsertInto = (target: QueryTarget, ...args: ColumnsWithOptions): UpsertQueryBuilder => {
  const { columns, options } = splitOptions(args);
  return new UpsertQueryBuilder(resolveTable(target), columns, options);
};

/**
 * Creates an insert builder: rows conflicting on the natural key are left as
 * they are.
 */
export const insertInto = (target: QueryTarget, ...args: ColumnsWithOptions): UpsertQueryBuilder => {
  const { columns, options } = splitOptions(args);
  return new UpsertQueryBuilder(resolveTable(target), columns, options, true);
};

/**
 * Creates an UPDATE builder for the specified table.
 *
 * @example
 * ```typescript
 * const query = updateTable(person, 'name', 'parent.name');
 * ```
 */
export const updateTable = (target: QueryTarget, ...args: ColumnsWithOptions): UpdateQueryBuilder => {
  const { columns, options } = splitOptions(args);
  return new UpdateQueryBuilder(resolveTable(target), columns, options);
};

/**
 * Creates a DELETE builder for the specified table.
 *
 * @example
 * ```typescript
 * const query = deleteFrom(person, "(= parent.name 'Bob')");
 * ```
 */
export const deleteFrom = (target: QueryTarget, ...conditions: ConditionInput[]): DeleteQueryBuilder =>
  new DeleteQueryBuilder(resolveTable(target), conditions);
