import type { TableDef } from '../schema/table.js';
import type { ColumnDef } from '../schema/column-types.js';
import { defaultColumns } from '../schema/default-columns.js';
import type { CompiledQuery, Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import type { CompilerContext } from '../core/dialect/compiler-context.js';
import { parse } from '../core/condition/parser.js';
import type { ConditionAst } from '../core/condition/ast.js';
import { ParameterCountError, SchemaDefinitionError } from '../errors.js';

/**
 * Accepts either condition text or an already parsed condition
 */
export type ConditionInput = string | ConditionAst;

export const toAst = (input: ConditionInput): ConditionAst =>
  typeof input === 'string' ? parse(input) : input;

/**
 * Pairs statement text with its parameters, checking the count when
 * parameters are given.
 */
export const bindParameters = (sql: string, ctx: CompilerContext, params?: readonly unknown[]): CompiledQuery => {
  if (params !== undefined && params.length !== ctx.placeholderCount) {
    throw new ParameterCountError(ctx.placeholderCount, params.length);
  }
  return { sql, params: params ? [...params] : [] };
};

/**
 * Column definition reached by a dotted path from `table`
 * (`parent.name` → `name` of the table `parent` references), if any.
 */
export const columnAt = (table: TableDef, dotted: string): ColumnDef | undefined => {
  const segments = dotted.split('.');
  const column = segments[segments.length - 1];
  const owner = segments.length === 1 ? table : table.registry.joins.joinOn(table, segments.slice(0, -1)).table;
  return Object.hasOwn(owner.columns, column) ? owner.columns[column] : undefined;
};

/**
 * Native type of each named column on `dialect`, following dotted names to
 * the referenced table. Arrays degrade to JSON where the dialect has none.
 *
 * @example
 * ```typescript
 * columnTypes(temperature, 'sqlite', ['timestamp', 'city.name']);
 * // { timestamp: 'DATETIME', 'city.name': 'TEXT' }
 * ```
 */
export const columnTypes = (
  table: TableDef,
  dialect: Dialect | DialectKey,
  names: readonly string[] = defaultColumns(table)
): Record<string, string> => {
  const resolved = resolveDialectInput(dialect);
  return Object.fromEntries(
    names.map(name => {
      const column = columnAt(table, name);
      if (!column) {
        throw new SchemaDefinitionError(`Column '${name}' does not exist on table '${table.name}'`, table.name, name);
      }
      return [name, resolved.renderColumnType(column)];
    })
  );
};
