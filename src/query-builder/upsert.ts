import type { TableDef } from '../schema/table.js';
import type { CompiledQuery, Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import type { CompilerContext } from '../core/dialect/compiler-context.js';
import type { UpsertStatementNode } from '../core/ast/query.js';
import { firstResult } from '../core/execution/db-executor.js';
import { runStatement, type ExecutionContext } from '../orm/execution-context.js';
import { InvalidStatementError } from '../errors.js';
import { bindParameters } from './statement-utils.js';
import { compileLookups, createRowResolver, planWrite, type WriteOptions, type WritePlan } from './write-plan.js';

type UpsertDialectInput = Dialect | DialectKey;

/**
 * Builder for INSERT ... ON CONFLICT statements keyed on the table's natural
 * key. Dotted columns (`parent.name`) write a foreign key through the natural
 * key of the referenced row.
 *
 * @example
 * ```typescript
 * await upsertInto(person, 'name', 'parent.name').executeMany(ctx, [
 *   ['Big Bob', null],
 *   ['Bob', 'Big Bob']
 * ]);
 * ```
 */
export class UpsertQueryBuilder {
  private readonly table: TableDef;
  private readonly columns: readonly string[];
  private readonly options: WriteOptions;
  private readonly onlyInsert: boolean;
  private readonly plan: WritePlan;

  constructor(table: TableDef, columns: readonly string[] = [], options: WriteOptions = {}, insertOnly = false) {
    this.table = table;
    this.columns = columns;
    this.options = options;
    this.onlyInsert = insertOnly;
    this.plan = planWrite(table, columns, options);

    const missing = table.naturalKey.filter(column => !this.plan.columns.includes(column));
    if (missing.length) {
      throw new InvalidStatementError(
        `Upsert on '${table.name}' must write every natural key column, missing: ${missing.join(', ')}`
      );
    }
  }

  /**
   * Marks foreign keys as lenient (all of them when called without arguments)
   */
  lenient(lenient: boolean | readonly string[] = true): UpsertQueryBuilder {
    return new UpsertQueryBuilder(this.table, this.columns, { ...this.options, lenient }, this.onlyInsert);
  }

  /**
   * Leaves existing rows untouched (`DO NOTHING`)
   */
  insertOnly(): UpsertQueryBuilder {
    return new UpsertQueryBuilder(this.table, this.columns, this.options, true);
  }

  /**
   * Input columns, as passed or expanded from the table's default columns
   */
  columnNames(): string[] {
    return [...this.plan.inputColumns];
  }

  build(dialect: Dialect, ctx: CompilerContext = dialect.createCompilerContext()): UpsertStatementNode {
    const updates = this.onlyInsert
      ? []
      : this.plan.columns.filter(column => !this.table.naturalKey.includes(column));
    return {
      type: 'UpsertStatement',
      table: this.table.name,
      columns: [...this.plan.columns],
      values: this.plan.columns.map(() => ctx.addPlaceholder()),
      conflict: [...this.table.naturalKey],
      updates,
      returning: this.table.primaryKey
    };
  }

  /**
   * Compiles the statement for one row of resolved values
   */
  compile(dialect: UpsertDialectInput, params?: readonly unknown[]): CompiledQuery {
    const resolved = resolveDialectInput(dialect);
    const ctx = resolved.createCompilerContext();
    const node = this.build(resolved, ctx);
    return bindParameters(resolved.compileUpsert(node), ctx, params);
  }

  toSql(dialect: UpsertDialectInput): string {
    return this.compile(dialect).sql;
  }

  /**
   * Selects used to turn dotted natural keys into foreign-key ids, by
   * foreign-key column
   */
  lookups(dialect: UpsertDialectInput): Record<string, CompiledQuery> {
    return compileLookups(this.plan, resolveDialectInput(dialect));
  }

  /**
   * Writes every row and returns the primary key of each. A row skipped by
   * an insert-only conflict yields `null`.
   */
  async executeMany(ctx: ExecutionContext, rows: readonly (readonly unknown[])[]): Promise<unknown[]> {
    const resolve = createRowResolver(ctx, this.plan);
    const ids: unknown[] = [];
    for (const row of rows) {
      const compiled = this.compile(ctx.dialect, await resolve(row));
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
