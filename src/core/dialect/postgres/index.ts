import { Dialect } from '../abstract.js';
import type { ColumnType } from '../../../schema/column-types.js';

/**
 * PostgreSQL dialect implementation
 */
export class PostgresDialect extends Dialect {
  readonly name = 'postgres';

  readonly supportsArrays = true;

  readonly typeMap: Readonly<Record<ColumnType, string>> = {
    text: 'VARCHAR',
    int: 'INTEGER',
    bigint: 'BIGINT',
    float: 'FLOAT',
    timestamp: 'TIMESTAMP',
    timestamptz: 'TIMESTAMPTZ',
    date: 'DATE',
    bool: 'BOOL',
    uuid: 'UUID',
    json: 'JSON',
    blob: 'BYTEA'
  };

  /**
   * PostgreSQL numbers its parameters: `$1`, `$2`, ...
   */
  protected formatPlaceholder(index: number): string {
    return `$${index}`;
  }
}
