import type { TableDef } from '../schema/table.js';
import type { ConditionAst } from '../core/condition/ast.js';
import { evaluate } from '../core/condition/evaluator.js';
import type { CompiledQuery, Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import type { CompilerContext } from '../core/dialect/compiler-context.js';
import type { DeleteStatementNode } from '../core/ast/query.js';
import { firstResult } from '../core/execution/db-executor.js';
import { runStatement, type ExecutionContext } from '../orm/execution-context.js';
import { Env } from './env.js';
import { emitJoins } from './join-resolver.js';
import { bindParameters, toAst, type ConditionInput } from './statement-utils.js';

type DeleteDialectInput = Dialect | DialectKey;

/**
 * Builder for DELETE statements.
 * Conditions may follow relations; the matching rows are then selected by
 * primary key through a joined sub-select.
 */
export class DeleteQueryBuilder {
  private readonly table: TableDef;
  private readonly conditions: readonly ConditionAst[];

  constructor(table: TableDef, conditions: readonly ConditionInput[] = []) {
    this.table = table;
    this.conditions = conditions.map(toAst);
  }

  /**
   * Adds conditions, combined with AND
   */
  where(...conditions: ConditionInput[]): DeleteQueryBuilder {
    return new DeleteQueryBuilder(this.table, [...this.conditions, ...conditions.map(toAst)]);
  }

  build(dialect: Dialect, ctx: CompilerContext = dialect.createCompilerContext()): DeleteStatementNode {
    const env = new Env(this.table);
    const where = this.conditions.map(ast => evaluate(ast, env, ctx));
    return {
      type: 'DeleteStatement',
      table: this.table.name,
      primaryKey: this.table.primaryKey,
      joins: emitJoins(env),
      where,
      returning: this.table.primaryKey
    };
  }

  compile(dialect: DeleteDialectInput, params?: readonly unknown[]): CompiledQuery {
    const resolved = resolveDialectInput(dialect);
    const ctx = resolved.createCompilerContext();
    const node = this.build(resolved, ctx);
    return bindParameters(resolved.compileDelete(node), ctx, params);
  }

  toSql(dialect: DeleteDialectInput): string {
    return this.compile(dialect).sql;
  }

  /**
   * Deletes the matching rows and returns their primary keys
   */
  async execute(ctx: ExecutionContext, params: readonly unknown[] = []): Promise<unknown[]> {
    const compiled = this.compile(ctx.dialect, params);
    const results = await runStatement(ctx, compiled.sql, compiled.params);
    return firstResult(results).values.map(row => row[0]);
  }
}
