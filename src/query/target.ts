import type { TableDef } from '../schema/table.js';
import { defaultSchema, type SchemaRegistry } from '../schema/registry.js';

/**
 * Represents a target for statement builders: a table definition, or the
 * name of a table registered in a schema.
 */
export type QueryTarget = TableDef | string;

/**
 * Resolves a QueryTarget to its table definition.
 *
 * @example
 * ```typescript
 * const table = resolveTable(person); // returns person directly
 * const table2 = resolveTable('person', schema); // looks 'person' up in schema
 * ```
 * @throws UnknownTableError when a name is not registered
 */
export const resolveTable = (target: QueryTarget, schema: SchemaRegistry = defaultSchema): TableDef =>
  typeof target === 'string' ? schema.get(target) : target;
