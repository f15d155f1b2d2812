import type { TableDef } from '../schema/table.js';
import type { CompiledQuery, Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import type { CompilerContext } from '../core/dialect/compiler-context.js';
import type { UpdateStatementNode } from '../core/ast/query.js';
import { firstResult } from '../core/execution/db-executor.js';
import { runStatement, type ExecutionContext } from '../orm/execution-context.js';
import { InvalidStatementError } from '../errors.js';
import { bindParameters } from './statement-utils.js';
import { compileLookups, createRowResolver, planWrite, type WriteOptions, type WritePlan } from './write-plan.js';

type UpdateDialectInput = Dialect | DialectKey;

/**
 * Builder for UPDATE statements.
 * Rows are matched on the primary key when it is among the written columns,
 * otherwise on the natural key; every other written column is assigned.
 */
export class UpdateQueryBuilder {
  private readonly table: TableDef;
  private readonly columns: readonly string[];
  private readonly options: WriteOptions;
  private readonly plan: WritePlan;
  private readonly keyColumns: string[];
  private readonly setColumns: string[];

  constructor(table: TableDef, columns: readonly string[] = [], options: WriteOptions = {}) {
    this.table = table;
    this.columns = columns;
    this.options = options;
    this.plan = planWrite(table, columns, options);

    const written = this.plan.columns;
    this.keyColumns = written.includes(table.primaryKey) ? [table.primaryKey] : [...table.naturalKey];
    const missing = this.keyColumns.filter(column => !written.includes(column));
    if (missing.length) {
      throw new InvalidStatementError(
        `Update on '${table.name}' needs its primary key or every natural key column, missing: ${missing.join(', ')}`
      );
    }
    this.setColumns = written.filter(column => !this.keyColumns.includes(column));
    if (!this.setColumns.length) {
      throw new InvalidStatementError(`Update on '${table.name}' has no column to assign`);
    }
  }

  lenient(lenient: boolean | readonly string[] = true): UpdateQueryBuilder {
    return new UpdateQueryBuilder(this.table, this.columns, { ...this.options, lenient });
  }

  columnNames(): string[] {
    return [...this.plan.inputColumns];
  }

  build(dialect: Dialect, ctx: CompilerContext = dialect.createCompilerContext()): UpdateStatementNode {
    const table = dialect.quoteIdentifier(this.table.name);
    const set = this.setColumns.map(column => ({ column, value: ctx.addPlaceholder() }));
    const where = this.keyColumns.map(
      column => `${table}.${dialect.quoteIdentifier(column)} = ${ctx.addPlaceholder()}`
    );
    return { type: 'UpdateStatement', table: this.table.name, set, where, returning: this.table.primaryKey };
  }

  /**
   * Compiles the statement. Parameters follow statement order: assigned
   * columns first, then key columns.
   */
  compile(dialect: UpdateDialectInput, params?: readonly unknown[]): CompiledQuery {
    const resolved = resolveDialectInput(dialect);
    const ctx = resolved.createCompilerContext();
    const node = this.build(resolved, ctx);
    return bindParameters(resolved.compileUpdate(node), ctx, params);
  }

  toSql(dialect: UpdateDialectInput): string {
    return this.compile(dialect).sql;
  }

  lookups(dialect: UpdateDialectInput): Record<string, CompiledQuery> {
    return compileLookups(this.plan, resolveDialectInput(dialect));
  }

  /**
   * Updates every row and returns the primary key of each matched row, or
   * `null` when nothing matched.
   */
  async executeMany(ctx: ExecutionContext, rows: readonly (readonly unknown[])[]): Promise<unknown[]> {
    const resolve = createRowResolver(ctx, this.plan);
    const order = [...this.setColumns, ...this.keyColumns].map(column => this.plan.columns.indexOf(column));
    const ids: unknown[] = [];
    for (const row of rows) {
      const values = await resolve(row);
      const compiled = this.compile(
        ctx.dialect,
        order.map(index => values[index])
      );
      const [returned] = firstResult(await runStatement(ctx, compiled.sql, compiled.params)).values;
      ids.push(returned ? returned[0] : null);
    }
    return ids;
  }

  async execute(ctx: ExecutionContext, ...row: unknown[]): Promise<unknown> {
    const [id] = await this.executeMany(ctx, [row]);
    return id;
  }
}
