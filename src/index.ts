/**
 * relpath-sql core exports.
 * Provides table metadata, the condition language, statement builders and
 * execution helpers.
 */
export * from './errors.js';
export * from './schema/column-types.js';
export * from './schema/table.js';
export * from './schema/registry.js';
export * from './schema/default-columns.js';
export * from './core/sql/sql.js';
export * from './core/condition/relation-path.js';
export * from './core/condition/ast.js';
export * from './core/condition/builtins.js';
export * from './core/condition/lexer.js';
export * from './core/condition/parser.js';
export * from './core/condition/evaluator.js';
export * from './core/ast/join.js';
export * from './core/ast/query.js';
export * from './core/dialect/compiler-context.js';
export * from './core/dialect/abstract.js';
export * from './core/dialect/dialect-factory.js';
export * from './core/dialect/sqlite/index.js';
export * from './core/dialect/postgres/index.js';
export * from './query-builder/env.js';
export * from './query-builder/join-resolver.js';
export * from './query-builder/statement-utils.js';
export * from './query-builder/write-plan.js';
export * from './query-builder/select.js';
export * from './query-builder/upsert.js';
export * from './query-builder/update.js';
export * from './query-builder/delete.js';
export * from './query/target.js';
export * from './query/index.js';

// execution abstraction + helpers
export * from './core/execution/db-executor.js';
export * from './core/execution/executors/postgres-executor.js';
export * from './core/execution/executors/sqlite-executor.js';
export * from './orm/query-logger.js';
export * from './orm/interceptor-pipeline.js';
export * from './orm/execution-context.js';
export * from './orm/transaction-runner.js';
