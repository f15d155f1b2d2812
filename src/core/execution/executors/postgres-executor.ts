import { rowsToQueryResult, type DbExecutor } from '../db-executor.js';

/**
 * Shape of a `pg` client or pool client.
 */
export interface PostgresClientLike {
  query(text: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

/**
 * Creates a database executor for PostgreSQL. Transactions are plain
 * statements on the same client, so pass a dedicated pool client rather than
 * the pool itself.
 */
export const createPostgresExecutor = (client: PostgresClientLike): DbExecutor => {
  const control = async (statement: 'BEGIN' | 'COMMIT' | 'ROLLBACK'): Promise<void> => {
    await client.query(statement);
  };
  return {
    async executeSql(sql, params) {
      const { rows } = await client.query(sql, params);
      return [rowsToQueryResult(rows)];
    },
    beginTransaction: () => control('BEGIN'),
    commitTransaction: () => control('COMMIT'),
    rollbackTransaction: () => control('ROLLBACK')
  };
};
