import { rowsToQueryResult, withTransactionHooks, type DbExecutor, type TransactionHooks } from '../db-executor.js';

/**
 * Promise-returning view of an SQLite connection, e.g. a `sqlite3.Database`
 * whose `all` has been wrapped.
 */
export interface SqliteClientLike extends TransactionHooks {
  all(sql: string, params?: unknown[]): Promise<Record<string, unknown>[]>;
}

/**
 * Creates a database executor for SQLite.
 * Every statement runs through `all`, so RETURNING rows come back like
 * SELECT rows.
 */
export const createSqliteExecutor = (client: SqliteClientLike): DbExecutor =>
  withTransactionHooks(async (sql, params) => [rowsToQueryResult(await client.all(sql, params))], client);
