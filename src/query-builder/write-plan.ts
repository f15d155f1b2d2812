import type { TableDef } from '../schema/table.js';
import { defaultColumns } from '../schema/default-columns.js';
import type { Dialect, CompiledQuery } from '../core/dialect/abstract.js';
import { firstResult } from '../core/execution/db-executor.js';
import { runStatement, type ExecutionContext } from '../orm/execution-context.js';
import {
  InvalidStatementError,
  ParameterCountError,
  UnresolvedForeignKeyError,
  UnresolvedRelationError
} from '../errors.js';
import { SelectQueryBuilder } from './select.js';
import { columnAt } from './statement-utils.js';

/**
 * Options shared by upsert, insert and update builders
 */
export interface WriteOptions {
  /**
   * Foreign keys whose natural-key lookup may miss: `true` for all of them,
   * or a list of foreign-key column names. A lenient miss writes NULL.
   */
  lenient?: boolean | readonly string[];
}

/**
 * A foreign key written through the natural key of the row it references
 */
export interface ForeignKeyLookup {
  /** Foreign-key column on the written table */
  column: string;
  /** Referenced table */
  target: TableDef;
  /** Columns of `target` matched against the input, possibly dotted */
  matchColumns: string[];
  /** Positions of the matched values in an input row */
  sourceIndexes: number[];
  lenient: boolean;
  /** Select returning the referenced primary key */
  query: SelectQueryBuilder;
}

type WriteSlot =
  | { kind: 'value'; sourceIndex: number }
  | { kind: 'lookup'; lookup: ForeignKeyLookup };

interface PendingLookup {
  matchColumns: string[];
  sourceIndexes: number[];
}

/**
 * Written columns of one statement and how each gets its value from an
 * input row.
 */
export interface WritePlan {
  table: TableDef;
  /** Input columns as given, possibly dotted */
  inputColumns: string[];
  /** Table columns written, in order of first appearance */
  columns: string[];
  slots: WriteSlot[];
}

const isLenient = (lenient: WriteOptions['lenient'], column: string): boolean =>
  lenient === true || (Array.isArray(lenient) && lenient.includes(column));

/**
 * Groups input columns by the table column they write. Dotted columns sharing
 * a foreign key become a single lookup on the referenced table.
 *
 * @throws UnresolvedRelationError when a dotted column does not start with a foreign key
 * @throws InvalidStatementError on an undeclared or duplicated column
 */
export const planWrite = (table: TableDef, columns: readonly string[], options: WriteOptions = {}): WritePlan => {
  const inputColumns = columns.length ? [...columns] : defaultColumns(table);
  const direct = new Map<string, number>();
  const pending = new Map<string, PendingLookup>();
  const written: string[] = [];

  inputColumns.forEach((input, index) => {
    const [head, ...rest] = input.split('.');
    if (!Object.hasOwn(table.columns, head) && head !== table.primaryKey) {
      throw new InvalidStatementError(`Column '${head}' is not declared on table '${table.name}'`);
    }
    if (rest.length > 0 && !Object.hasOwn(table.foreignKeys, head)) {
      throw new UnresolvedRelationError(table.name, head);
    }

    const group = pending.get(head);
    if (direct.has(head) || (group && rest.length === 0)) {
      throw new InvalidStatementError(`Column '${head}' of table '${table.name}' is written twice`);
    }

    if (rest.length === 0) {
      direct.set(head, index);
    } else if (group) {
      group.matchColumns.push(rest.join('.'));
      group.sourceIndexes.push(index);
      return;
    } else {
      pending.set(head, { matchColumns: [rest.join('.')], sourceIndexes: [index] });
    }
    written.push(head);
  });

  const slots = written.map((column): WriteSlot => {
    const group = pending.get(column);
    if (!group) {
      return { kind: 'value', sourceIndex: direct.get(column) ?? -1 };
    }
    const target = table.registry.get(table.foreignKeys[column]);
    return {
      kind: 'lookup',
      lookup: {
        column,
        target,
        ...group,
        lenient: isLenient(options.lenient, column),
        query: new SelectQueryBuilder(target, [target.primaryKey]).where(
          ...group.matchColumns.map(c => `(= ${c} {})`)
        )
      }
    };
  });

  return { table, inputColumns, columns: written, slots };
};

/**
 * Foreign-key lookups of a plan, keyed by foreign-key column
 */
export const planLookups = (plan: WritePlan): ForeignKeyLookup[] =>
  plan.slots.flatMap(slot => (slot.kind === 'lookup' ? [slot.lookup] : []));

export const compileLookups = (plan: WritePlan, dialect: Dialect): Record<string, CompiledQuery> =>
  Object.fromEntries(planLookups(plan).map(lookup => [lookup.column, lookup.query.compile(dialect)]));

/**
 * Resolves one input row at a time into the values bound for `plan.columns`,
 * running a select per distinct foreign natural key. Rows are resolved just
 * before they are written, so a row may reference one written earlier in the
 * same batch. Found ids are cached for the resolver's lifetime; misses are not.
 */
export const createRowResolver = (
  ctx: ExecutionContext,
  plan: WritePlan
): ((row: readonly unknown[]) => Promise<unknown[]>) => {
  const cache = new Map<string, unknown>();

  return async row => {
    if (row.length !== plan.inputColumns.length) {
      throw new ParameterCountError(plan.inputColumns.length, row.length);
    }
    const values: unknown[] = [];
    for (const [position, slot] of plan.slots.entries()) {
      const column = columnAt(plan.table, plan.columns[position]);
      if (slot.kind === 'value') {
        values.push(ctx.dialect.encodeValue(column, row[slot.sourceIndex]));
        continue;
      }
      values.push(await resolveLookup(ctx, plan.table, slot.lookup, row, cache));
    }
    return values;
  };
};

const resolveLookup = async (
  ctx: ExecutionContext,
  table: TableDef,
  lookup: ForeignKeyLookup,
  row: readonly unknown[],
  cache: Map<string, unknown>
): Promise<unknown> => {
  const keyValues = lookup.sourceIndexes.map(index => row[index] ?? null);
  if (keyValues.every(value => value === null)) return null;

  const params = lookup.matchColumns.map((column, i) =>
    ctx.dialect.encodeValue(columnAt(lookup.target, column), keyValues[i])
  );
  const cacheKey = `${lookup.column}\u0000${JSON.stringify(params)}`;
  if (cache.has(cacheKey)) return cache.get(cacheKey);

  const compiled = lookup.query.compile(ctx.dialect, params);
  const [match] = firstResult(await runStatement(ctx, compiled.sql, compiled.params)).values;
  if (!match) {
    if (!lookup.lenient) {
      throw new UnresolvedForeignKeyError(table.name, lookup.column, keyValues);
    }
    return null;
  }
  cache.set(cacheKey, match[0]);
  return match[0];
};
