import type { JoinNode } from './join.js';
import type { OrderDirection } from '../sql/sql.js';

/*
 * Statement nodes hold SQL fragments already rendered by the condition
 * evaluator, plus the join list emitted from the alias environment. Dialects
 * only assemble them.
 */

/**
 * AST node representing an ORDER BY term
 */
export interface OrderByNode {
  type: 'OrderBy';
  /** Rendered expression */
  expression: string;
  direction: OrderDirection;
}

/**
 * AST node representing a complete SELECT statement
 */
export interface SelectStatementNode {
  type: 'SelectStatement';
  /** Root table name */
  table: string;
  /** Rendered column expressions */
  columns: string[];
  distinct: boolean;
  joins: JoinNode[];
  /** Rendered conditions, combined with AND */
  where: string[];
  groupBy: string[];
  orderBy: OrderByNode[];
  limit?: number;
  offset?: number;
}

/**
 * AST node representing an INSERT ... ON CONFLICT statement
 */
export interface UpsertStatementNode {
  type: 'UpsertStatement';
  table: string;
  /** Written column names */
  columns: string[];
  /** Rendered value for each column */
  values: string[];
  /** Conflict target (the natural key) */
  conflict: string[];
  /** Columns overwritten on conflict; empty means DO NOTHING */
  updates: string[];
  returning?: string;
}

/**
 * AST node representing one SET assignment
 */
export interface AssignmentNode {
  column: string;
  /** Rendered value */
  value: string;
}

/**
 * AST node representing an UPDATE statement
 */
export interface UpdateStatementNode {
  type: 'UpdateStatement';
  table: string;
  set: AssignmentNode[];
  where: string[];
  returning?: string;
}

/**
 * AST node representing a DELETE statement.
 * When `joins` is not empty, rows are matched through their primary key in a
 * joined sub-select.
 */
export interface DeleteStatementNode {
  type: 'DeleteStatement';
  table: string;
  primaryKey: string;
  joins: JoinNode[];
  where: string[];
  returning?: string;
}
