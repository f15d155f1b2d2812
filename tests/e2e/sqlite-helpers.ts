import sqlite3 from 'sqlite3';

import { createSqliteExecutor, type SqliteClientLike } from '../../src/core/execution/executors/sqlite-executor.js';
import { createExecutionContext, type ExecutionContext } from '../../src/orm/execution-context.js';
import type { QueryLogger } from '../../src/orm/query-logger.js';

export const execSql = (db: sqlite3.Database, sql: string): Promise<void> =>
  new Promise((resolve, reject) => {
    db.exec(sql, err => (err ? reject(err) : resolve()));
  });

export const closeDb = (db: sqlite3.Database): Promise<void> =>
  new Promise((resolve, reject) => {
    db.close(err => (err ? reject(err) : resolve()));
  });

export const createSqliteClient = (db: sqlite3.Database): SqliteClientLike => ({
  all(sql, params) {
    return new Promise((resolve, reject) => {
      db.all(sql, params ?? [], (err: Error | null, rows: Record<string, unknown>[]) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(rows);
      });
    });
  },
  beginTransaction: () => execSql(db, 'BEGIN'),
  commitTransaction: () => execSql(db, 'COMMIT'),
  rollbackTransaction: () => execSql(db, 'ROLLBACK')
});

/**
 * Opens an in-memory database holding the fixture schema's tables
 */
export const openMemoryContext = async (
  logger?: QueryLogger
): Promise<{ db: sqlite3.Database; ctx: ExecutionContext }> => {
  const db = new sqlite3.Database(':memory:');
  await execSql(
    db,
    `
    CREATE TABLE person (id INTEGER PRIMARY KEY, name TEXT NOT NULL UNIQUE, parent INTEGER REFERENCES person (id));
    CREATE TABLE org (id INTEGER PRIMARY KEY, name TEXT NOT NULL UNIQUE, person INTEGER REFERENCES person (id));
    CREATE TABLE city (id INTEGER PRIMARY KEY, name TEXT NOT NULL UNIQUE);
    CREATE TABLE temperature (
      id INTEGER PRIMARY KEY,
      timestamp DATETIME NOT NULL,
      city INTEGER NOT NULL REFERENCES city (id),
      value FLOAT,
      UNIQUE (timestamp, city)
    );
    `
  );
  const ctx = createExecutionContext({
    dialect: 'sqlite',
    executor: createSqliteExecutor(createSqliteClient(db)),
    logger
  });
  return { db, ctx };
};
