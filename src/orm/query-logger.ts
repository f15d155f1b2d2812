import { withTransactionHooks, type DbExecutor } from '../core/execution/db-executor.js';

/**
 * One executed statement
 */
export interface QueryLogEntry {
  sql: string;
  params: unknown[];
  /** Wall-clock time spent in the executor */
  durationMs: number;
  /** Rows of the first result set, when the statement succeeded */
  rowCount?: number;
  /** Rejection reason, when it failed */
  error?: unknown;
}

/**
 * Receives an entry after every statement, successful or not
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Wraps an executor so each statement is reported to `logger` once it
 * settles. Failures are reported and then rethrown unchanged.
 */
export const createQueryLoggingExecutor = (executor: DbExecutor, logger?: QueryLogger): DbExecutor => {
  if (!logger) return executor;

  return withTransactionHooks(async (sql, params = []) => {
    const started = Date.now();
    try {
      const results = await executor.executeSql(sql, params);
      logger({ sql, params, durationMs: Date.now() - started, rowCount: results[0]?.values.length ?? 0 });
      return results;
    } catch (error) {
      logger({ sql, params, durationMs: Date.now() - started, error });
      throw error;
    }
  }, executor);
};
