import type { Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import type { DbExecutor, QueryResult } from '../core/execution/db-executor.js';
import { InterceptorPipeline } from './interceptor-pipeline.js';
import { createQueryLoggingExecutor, type QueryLogger } from './query-logger.js';

/**
 * Context for SQL query execution, passed explicitly to every `execute*` call
 */
export interface ExecutionContext {
  /** Database dialect to use for SQL generation */
  dialect: Dialect;
  /** Database executor for running SQL queries */
  executor: DbExecutor;
  /** Interceptor pipeline for query processing */
  interceptors: InterceptorPipeline;
}

export interface ExecutionContextOptions {
  dialect: Dialect | DialectKey;
  executor: DbExecutor;
  /** Receives every statement before it runs */
  logger?: QueryLogger;
  interceptors?: InterceptorPipeline;
}

export const createExecutionContext = (options: ExecutionContextOptions): ExecutionContext => ({
  dialect: resolveDialectInput(options.dialect),
  executor: createQueryLoggingExecutor(options.executor, options.logger),
  interceptors: options.interceptors ?? new InterceptorPipeline()
});

/**
 * Runs one compiled statement through the context's interceptors and executor
 */
export const runStatement = (ctx: ExecutionContext, sql: string, params: unknown[]): Promise<QueryResult[]> =>
  ctx.interceptors.run({ sql, params }, ctx.executor);
