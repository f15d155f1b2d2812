import type { RelationPath } from './relation-path.js';
import type { BuiltinName } from './builtins.js';

/**
 * AST node representing an integer literal
 */
export interface IntegerLiteralNode {
  type: 'IntegerLiteral';
  /** Decimal text as written, kept verbatim to avoid precision loss */
  value: string;
}

/**
 * AST node representing a quoted string literal (unescaped value)
 */
export interface StringLiteralNode {
  type: 'StringLiteral';
  value: string;
}

/**
 * AST node representing a `{}` placeholder, bound at execution time
 */
export interface PlaceholderNode {
  type: 'Placeholder';
}

/**
 * AST node representing a dotted column reference.
 * `relation` holds every segment but the last, `column` the last one.
 */
export interface ReferenceNode {
  type: 'Reference';
  relation: RelationPath;
  column: string;
  /** Dotted text as written, e.g. `parent.name` */
  dotted: string;
}

/**
 * AST node representing an operator or builtin applied to its arguments
 */
export interface CallNode {
  type: 'Call';
  operator: BuiltinName;
  args: ConditionNode[];
}

export type AtomNode = IntegerLiteralNode | StringLiteralNode | PlaceholderNode | ReferenceNode;

export type ConditionNode = AtomNode | CallNode;

/**
 * Parsed condition expression. Immutable; can be evaluated against any number
 * of environments.
 */
export interface ConditionAst {
  readonly source: string;
  readonly root: ConditionNode;
}
