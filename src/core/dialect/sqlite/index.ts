import { Dialect } from '../abstract.js';
import type { ColumnDef, ColumnType } from '../../../schema/column-types.js';
import type { BuiltinName } from '../../condition/builtins.js';

/**
 * SQLite dialect implementation
 */
export class SqliteDialect extends Dialect {
  readonly name = 'sqlite';

  /** Array columns are stored as JSON text */
  readonly supportsArrays = false;

  readonly typeMap: Readonly<Record<ColumnType, string>> = {
    text: 'TEXT',
    int: 'INTEGER',
    bigint: 'INTEGER',
    float: 'FLOAT',
    timestamp: 'DATETIME',
    timestamptz: 'DATETIME',
    date: 'DATE',
    bool: 'BOOL',
    uuid: 'TEXT',
    json: 'JSON',
    blob: 'BLOB'
  };

  // SQLite's LIKE is already case-insensitive for ASCII.
  protected operatorOverrides(): Partial<Record<BuiltinName, string>> {
    return { ilike: 'LIKE' };
  }

  /**
   * SQLite only accepts OFFSET after a LIMIT; -1 means no limit.
   */
  protected compilePagination(limit: number | undefined, offset: number | undefined): string {
    if (offset !== undefined && limit === undefined) {
      return ` LIMIT -1 OFFSET ${offset}`;
    }
    return super.compilePagination(limit, offset);
  }

  encodeValue(column: ColumnDef | undefined, value: unknown): unknown {
    if (value instanceof Date) {
      return column?.type === 'date' ? value.toISOString().slice(0, 10) : value.toISOString();
    }
    return super.encodeValue(column, value);
  }
}
