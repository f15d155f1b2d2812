import type {
  DeleteStatementNode,
  OrderByNode,
  SelectStatementNode,
  UpdateStatementNode,
  UpsertStatementNode
} from '../ast/query.js';
import type { JoinNode } from '../ast/join.js';
import type { BuiltinName } from '../condition/builtins.js';
import type { ColumnDef, ColumnType } from '../../schema/column-types.js';
import { createCompilerContext, type CompilerContext } from './compiler-context.js';
import { quoteIdentifier, type DialectName } from '../sql/sql.js';

/**
 * Result of SQL compilation: statement text and positional parameters
 */
export interface CompiledQuery {
  /** Generated SQL string */
  sql: string;
  /** Parameters bound to the placeholders, in order of appearance */
  params: unknown[];
}

/**
 * Abstract base class for SQL dialect implementations
 */
export abstract class Dialect {
  /** Dialect identifier */
  abstract readonly name: DialectName;

  /** Native type keyword of every semantic column type */
  abstract readonly typeMap: Readonly<Record<ColumnType, string>>;

  /** Whether columns can hold native arrays */
  abstract readonly supportsArrays: boolean;

  /**
   * Quotes an SQL identifier
   */
  quoteIdentifier(id: string): string {
    return quoteIdentifier(id);
  }

  /**
   * Creates a new compiler context numbering placeholders for this dialect
   */
  createCompilerContext(): CompilerContext {
    return createCompilerContext({
      formatPlaceholder: index => this.formatPlaceholder(index),
      operators: this.operatorOverrides()
    });
  }

  /**
   * Formats a parameter placeholder
   * @param index - 1-based parameter index
   */
  protected formatPlaceholder(_index: number): string {
    return '?';
  }

  /**
   * Dialect spellings of builtins that differ from the standard one
   */
  protected operatorOverrides(): Partial<Record<BuiltinName, string>> {
    return {};
  }

  /**
   * Native type of a column, e.g. `INTEGER[]` or `JSON` for an array on a
   * dialect without arrays.
   */
  renderColumnType(column: ColumnDef): string {
    const base = this.typeMap[column.type];
    if (column.dims === 0) return base;
    if (!this.supportsArrays) return this.typeMap.json;
    return `${base}${'[]'.repeat(column.dims)}`;
  }

  /**
   * Converts a JS value into what the driver should bind for `column`.
   * Unknown columns pass values through untouched.
   */
  encodeValue(column: ColumnDef | undefined, value: unknown): unknown {
    if (value === undefined || value === null) return null;
    if (!column) return value;
    if (column.type === 'json' || (column.dims > 0 && !this.supportsArrays)) {
      return JSON.stringify(value);
    }
    return value;
  }

  compileSelect(node: SelectStatementNode): string {
    const distinct = node.distinct ? 'DISTINCT ' : '';
    const columns = node.columns.join(', ');
    const table = this.quoteIdentifier(node.table);
    const joins = this.compileJoins(node.joins);
    const where = this.compileWhere(node.where);
    const groupBy = node.groupBy.length ? ` GROUP BY ${node.groupBy.join(', ')}` : '';
    const orderBy = this.compileOrderBy(node.orderBy);
    const pagination = this.compilePagination(node.limit, node.offset);
    return `SELECT ${distinct}${columns} FROM ${table}${joins}${where}${groupBy}${orderBy}${pagination};`;
  }

  compileUpsert(node: UpsertStatementNode): string {
    const table = this.quoteIdentifier(node.table);
    const columns = node.columns.map(c => this.quoteIdentifier(c)).join(', ');
    const values = node.values.join(', ');
    const conflict = node.conflict.map(c => this.quoteIdentifier(c)).join(', ');
    const action = node.updates.length
      ? `DO UPDATE SET ${node.updates.map(c => `${this.quoteIdentifier(c)} = EXCLUDED.${this.quoteIdentifier(c)}`).join(', ')}`
      : 'DO NOTHING';
    return `INSERT INTO ${table} (${columns}) VALUES (${values}) ON CONFLICT (${conflict}) ${action}${this.compileReturning(node.returning)};`;
  }

  compileUpdate(node: UpdateStatementNode): string {
    const table = this.quoteIdentifier(node.table);
    const assignments = node.set.map(a => `${this.quoteIdentifier(a.column)} = ${a.value}`).join(', ');
    return `UPDATE ${table} SET ${assignments}${this.compileWhere(node.where)}${this.compileReturning(node.returning)};`;
  }

  compileDelete(node: DeleteStatementNode): string {
    const table = this.quoteIdentifier(node.table);
    const returning = this.compileReturning(node.returning);
    if (node.joins.length === 0) {
      return `DELETE FROM ${table}${this.compileWhere(node.where)}${returning};`;
    }
    const key = `${table}.${this.quoteIdentifier(node.primaryKey)}`;
    const subquery = `SELECT ${key} FROM ${table}${this.compileJoins(node.joins)}${this.compileWhere(node.where)}`;
    return `DELETE FROM ${table} WHERE ${key} IN (${subquery})${returning};`;
  }

  /**
   * Compiles a WHERE clause; several conditions are parenthesized and
   * combined with AND
   */
  protected compileWhere(conditions: string[]): string {
    if (conditions.length === 0) return '';
    if (conditions.length === 1) return ` WHERE ${conditions[0]}`;
    return ` WHERE ${conditions.map(c => `(${c})`).join(' AND ')}`;
  }

  protected compileJoins(joins: JoinNode[]): string {
    if (joins.length === 0) return '';
    const parts = joins.map(j => {
      const table = `${this.quoteIdentifier(j.table)} AS ${this.quoteIdentifier(j.alias)}`;
      const local = `${this.quoteIdentifier(j.anchor)}.${this.quoteIdentifier(j.localColumn)}`;
      const foreign = `${this.quoteIdentifier(j.alias)}.${this.quoteIdentifier(j.joinColumn)}`;
      return `${j.kind} JOIN ${table} ON ${local} = ${foreign}`;
    });
    return ` ${parts.join(' ')}`;
  }

  protected compileOrderBy(orderBy: OrderByNode[]): string {
    if (orderBy.length === 0) return '';
    return ` ORDER BY ${orderBy.map(o => `${o.expression} ${o.direction}`).join(', ')}`;
  }

  /**
   * Default LIMIT/OFFSET pagination clause
   */
  protected compilePagination(limit: number | undefined, offset: number | undefined): string {
    const parts: string[] = [];
    if (limit !== undefined) parts.push(`LIMIT ${limit}`);
    if (offset !== undefined) parts.push(`OFFSET ${offset}`);
    return parts.length ? ` ${parts.join(' ')}` : '';
  }

  protected compileReturning(column: string | undefined): string {
    return column ? ` RETURNING ${this.quoteIdentifier(column)}` : '';
  }
}
