import { buildTable, type TableDef, type TableDefinitionResult, type TableOptions } from './table.js';
import { JoinResolver } from '../query-builder/join-resolver.js';
import { UnknownTableError } from '../errors.js';

/**
 * Caller-owned mapping from table name to table metadata.
 * Tables are registered once and never change afterwards, which is what lets
 * the registry's join resolver memoize.
 *
 * @example
 * ```typescript
 * const schema = new SchemaRegistry();
 * const person = schema.defineTable(
 *   'person',
 *   { name: 'varchar', parent: 'int' },
 *   { naturalKey: ['name'], foreignKeys: { parent: 'person' } }
 * );
 * ```
 */
export class SchemaRegistry {
  private readonly registry = new Map<string, TableDef>();
  /** Join resolution scoped to the tables of this registry */
  readonly joins = new JoinResolver();

  /**
   * Validates and registers a table, returning every definition error
   * instead of throwing.
   */
  tryDefineTable(name: string, columns: Record<string, string>, options: TableOptions = {}): TableDefinitionResult {
    const result = buildTable(this, name, columns, options);
    if (result.ok) {
      this.registry.set(name, result.table);
    }
    return result;
  }

  /**
   * Validates and registers a table.
   * @throws SchemaDefinitionError - the first definition error found
   */
  defineTable(name: string, columns: Record<string, string>, options: TableOptions = {}): TableDef {
    const result = this.tryDefineTable(name, columns, options);
    if (!result.ok) {
      throw result.errors[0];
    }
    return result.table;
  }

  /**
   * @throws UnknownTableError
   */
  get(name: string): TableDef {
    const table = this.registry.get(name);
    if (!table) {
      throw new UnknownTableError(name);
    }
    return table;
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  tables(): TableDef[] {
    return [...this.registry.values()];
  }
}

/**
 * Registry used when a statement names its table by string
 */
export const defaultSchema = new SchemaRegistry();
