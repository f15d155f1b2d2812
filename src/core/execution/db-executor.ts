/**
 * Rows of one statement as positional values, with the column names the
 * driver reported.
 */
export interface QueryResult {
  columns: string[];
  values: unknown[][];
}

/**
 * Consumer of compiled statements. The library never opens connections;
 * callers hand it an executor bound to a connection or transaction.
 */
export interface DbExecutor {
  executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]>;

  beginTransaction?(): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
}

export type TransactionHooks = Pick<DbExecutor, 'beginTransaction' | 'commitTransaction' | 'rollbackTransaction'>;

const EMPTY_RESULT: QueryResult = Object.freeze({ columns: [], values: [] });

/**
 * Converts driver row objects into a QueryResult. Column order is the key
 * order of the first row, which drivers keep in select-list order.
 */
export const rowsToQueryResult = (rows: readonly Record<string, unknown>[]): QueryResult => {
  const [first] = rows;
  if (!first) return { columns: [], values: [] };
  const columns = Object.keys(first);
  return { columns, values: rows.map(row => columns.map(column => row[column])) };
};

/**
 * First result set of an execution, or an empty one.
 */
export const firstResult = (results: readonly QueryResult[]): QueryResult => results[0] ?? EMPTY_RESULT;

/**
 * Copies whichever transaction hooks `source` has onto a new executor.
 * An executor has either all three hooks or none.
 */
export const withTransactionHooks = (executeSql: DbExecutor['executeSql'], source: TransactionHooks): DbExecutor => {
  const { beginTransaction, commitTransaction, rollbackTransaction } = source;
  if (!beginTransaction || !commitTransaction || !rollbackTransaction) {
    return { executeSql };
  }
  return {
    executeSql,
    beginTransaction: () => beginTransaction.call(source),
    commitTransaction: () => commitTransaction.call(source),
    rollbackTransaction: () => rollbackTransaction.call(source)
  };
};
