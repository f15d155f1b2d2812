import type { CompiledQuery } from '../core/dialect/abstract.js';
import type { DbExecutor, QueryResult } from '../core/execution/db-executor.js';

/**
 * Statement about to run. Interceptors may replace it before calling `next`.
 */
export type QueryContext = CompiledQuery;

export type QueryInterceptor = (
  query: QueryContext,
  next: (query: QueryContext) => Promise<QueryResult[]>
) => Promise<QueryResult[]>;

/**
 * Middleware chain run around every statement execution, outermost first
 */
export class InterceptorPipeline {
  private readonly interceptors: QueryInterceptor[] = [];

  use(interceptor: QueryInterceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  get size(): number {
    return this.interceptors.length;
  }

  run(query: QueryContext, executor: DbExecutor): Promise<QueryResult[]> {
    const terminal = (q: QueryContext) => executor.executeSql(q.sql, q.params);
    const chain = this.interceptors.reduceRight<(q: QueryContext) => Promise<QueryResult[]>>(
      (next, interceptor) => q => interceptor(q, next),
      terminal
    );
    return chain(query);
  }
}
