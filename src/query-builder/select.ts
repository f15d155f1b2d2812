import type { TableDef } from '../schema/table.js';
import { defaultColumns } from '../schema/default-columns.js';
import type { ConditionAst } from '../core/condition/ast.js';
import { evaluate } from '../core/condition/evaluator.js';
import type { CompiledQuery, Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import type { OrderByNode, SelectStatementNode } from '../core/ast/query.js';
import type { CompilerContext } from '../core/dialect/compiler-context.js';
import { ORDER_DIRECTIONS, type OrderDirection } from '../core/sql/sql.js';
import { firstResult } from '../core/execution/db-executor.js';
import { runStatement, type ExecutionContext } from '../orm/execution-context.js';
import { InvalidStatementError } from '../errors.js';
import { Env } from './env.js';
import { emitJoins } from './join-resolver.js';
import { bindParameters, toAst, type ConditionInput } from './statement-utils.js';

type SelectDialectInput = Dialect | DialectKey;

interface OrderTerm {
  expression: ConditionAst;
  direction: OrderDirection;
}

/**
 * Immutable state of a SELECT statement
 */
export interface SelectQueryState {
  columns: ConditionAst[];
  where: ConditionAst[];
  groupBy: ConditionAst[];
  orderBy: OrderTerm[];
  distinct: boolean;
  limit?: number;
  offset?: number;
}

const isRootColumn = (ast: ConditionAst): boolean => ast.root.type === 'Reference' && ast.root.relation.length === 0;

/**
 * Builder for SELECT statements.
 * Columns, conditions and ordering terms are condition-language expressions;
 * the joins they imply are added automatically.
 */
export class SelectQueryBuilder {
  private readonly table: TableDef;
  private readonly state: SelectQueryState;

  /**
   * Creates a new SelectQueryBuilder instance
   * @param table - Root table
   * @param columns - Selected expressions; defaults to the table's default columns
   */
  constructor(table: TableDef, columns: ConditionInput[] = [], state?: SelectQueryState) {
    this.table = table;
    this.state = state ?? {
      columns: (columns.length ? columns : defaultColumns(table)).map(toAst),
      where: [],
      groupBy: [],
      orderBy: [],
      distinct: false
    };
  }

  private clone(next: Partial<SelectQueryState>): SelectQueryBuilder {
    return new SelectQueryBuilder(this.table, [], { ...this.state, ...next });
  }

  /**
   * Replaces the selected expressions
   */
  select(...columns: ConditionInput[]): SelectQueryBuilder {
    if (!columns.length) {
      throw new InvalidStatementError('select() needs at least one column');
    }
    return this.clone({ columns: columns.map(toAst) });
  }

  /**
   * Adds conditions; every condition of the statement is combined with AND
   */
  where(...conditions: ConditionInput[]): SelectQueryBuilder {
    return this.clone({ where: [...this.state.where, ...conditions.map(toAst)] });
  }

  groupBy(...expressions: ConditionInput[]): SelectQueryBuilder {
    return this.clone({ groupBy: [...this.state.groupBy, ...expressions.map(toAst)] });
  }

  orderBy(expression: ConditionInput, direction: OrderDirection = ORDER_DIRECTIONS.ASC): SelectQueryBuilder {
    return this.clone({ orderBy: [...this.state.orderBy, { expression: toAst(expression), direction }] });
  }

  limit(limit: number): SelectQueryBuilder {
    return this.clone({ limit: checkCount('limit', limit) });
  }

  offset(offset: number): SelectQueryBuilder {
    return this.clone({ offset: checkCount('offset', offset) });
  }

  distinct(): SelectQueryBuilder {
    return this.clone({ distinct: true });
  }

  /**
   * Source text of the selected expressions, in order
   */
  columnNames(): string[] {
    return this.state.columns.map(c => c.source);
  }

  /**
   * Evaluates every fragment in statement order and emits the joins
   * registered along the way.
   */
  build(dialect: Dialect, ctx: CompilerContext = dialect.createCompilerContext()): SelectStatementNode {
    const env = new Env(this.table);

    const columns = this.state.columns.map(ast => {
      const sql = evaluate(ast, env, ctx);
      return isRootColumn(ast) ? sql : `${sql} AS ${dialect.quoteIdentifier(ast.source)}`;
    });
    const where = this.state.where.map(ast => evaluate(ast, env, ctx));
    const groupBy = this.state.groupBy.map(ast => evaluate(ast, env, ctx));
    const orderBy: OrderByNode[] = this.state.orderBy.map(term => ({
      type: 'OrderBy',
      expression: evaluate(term.expression, env, ctx),
      direction: term.direction
    }));

    return {
      type: 'SelectStatement',
      table: this.table.name,
      columns,
      distinct: this.state.distinct,
      joins: emitJoins(env),
      where,
      groupBy,
      orderBy,
      limit: this.state.limit,
      offset: this.state.offset
    };
  }

  /**
   * Compiles the statement for the specified dialect
   * @param params - Values for the `{}` placeholders; the count is checked
   */
  compile(dialect: SelectDialectInput, params?: readonly unknown[]): CompiledQuery {
    const resolved = resolveDialectInput(dialect);
    const ctx = resolved.createCompilerContext();
    const node = this.build(resolved, ctx);
    return bindParameters(resolved.compileSelect(node), ctx, params);
  }

  toSql(dialect: SelectDialectInput): string {
    return this.compile(dialect).sql;
  }

  /**
   * Runs the statement and returns its rows as positional value arrays
   */
  async execute(ctx: ExecutionContext, params: readonly unknown[] = []): Promise<unknown[][]> {
    const compiled = this.compile(ctx.dialect, params);
    const results = await runStatement(ctx, compiled.sql, compiled.params);
    return firstResult(results).values;
  }
}

const checkCount = (label: string, value: number): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidStatementError(`${label} must be a non-negative integer, got ${value}`);
  }
  return value;
};
