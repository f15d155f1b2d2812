import type { Env } from '../../query-builder/env.js';
import { quoteIdentifier, quoteString } from '../sql/sql.js';
import { createCompilerContext, type CompilerContext } from '../dialect/compiler-context.js';
import type { CallNode, ConditionAst, ConditionNode } from './ast.js';
import { getBuiltin } from './builtins.js';

const renderCall = (node: CallNode, env: Env, ctx: CompilerContext): string => {
  const def = getBuiltin(node.operator);
  const sql = ctx.operatorSql(node.operator, def.sql);
  // Nested calls keep the grouping written in the source.
  const args = node.args.map(arg => {
    const rendered = renderNode(arg, env, ctx);
    return arg.type === 'Call' && def.rule !== 'function' ? `(${rendered})` : rendered;
  });

  switch (def.rule) {
    case 'infix':
    case 'variadic':
      return args.join(` ${sql} `);
    case 'prefix':
      return `${sql} ${args[0]}`;
    case 'postfix':
      return `${args[0]} ${sql}`;
    case 'list':
      return `${args[0]} ${sql} (${args.slice(1).join(', ')})`;
    case 'function':
      return `${sql}(${args.join(', ')})`;
  }
};

const renderNode = (node: ConditionNode, env: Env, ctx: CompilerContext): string => {
  switch (node.type) {
    case 'IntegerLiteral':
      return node.value;
    case 'StringLiteral':
      return quoteString(node.value);
    case 'Placeholder':
      return ctx.addPlaceholder();
    case 'Reference':
      if (node.relation.length === 0) {
        return `${quoteIdentifier(env.table.name)}.${quoteIdentifier(node.column)}`;
      }
      return env.resolve([...node.relation, node.column]);
    case 'Call':
      return renderCall(node, env, ctx);
  }
};

/**
 * Renders a condition against an alias environment.
 * References on the root table render as `"<table>"."<column>"`; references
 * through relations allocate aliases in `env`.
 *
 * @example
 * ```typescript
 * evaluate(parse("(= parent.name 'Roger')"), new Env(person));
 * // "parent_0"."name" = 'Roger'
 * ```
 */
export const evaluate = (ast: ConditionAst, env: Env, ctx: CompilerContext = createCompilerContext()): string =>
  renderNode(ast.root, env, ctx);
