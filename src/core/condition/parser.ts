import { ParseError } from '../../errors.js';
import type { CallNode, ConditionAst, ConditionNode, ReferenceNode } from './ast.js';
import { acceptsArity, describeArity, getBuiltin, isBuiltinName } from './builtins.js';
import { tokenize, type Lexeme } from './lexer.js';

/**
 * Recursive-descent parser over the lexeme stream.
 *
 * ```
 * expr := atom | '(' OP expr* ')'
 * atom := INTEGER | STRING | PLACEHOLDER | DOTTED_NAME
 * ```
 */
class ConditionParser {
  private index = 0;

  constructor(private readonly lexemes: Lexeme[], private readonly sourceLength: number) {}

  parseRoot(): ConditionNode {
    if (this.lexemes.length === 0) {
      throw new ParseError('Empty condition', 0);
    }
    const node = this.parseExpression();
    const extra = this.peek();
    if (extra) {
      const message = extra.kind === 'close' ? "Unbalanced ')'" : `Unexpected trailing token '${extra.text}'`;
      throw new ParseError(message, extra.position);
    }
    return node;
  }

  private peek(): Lexeme | undefined {
    return this.lexemes[this.index];
  }

  private next(): Lexeme {
    const lexeme = this.lexemes[this.index];
    if (!lexeme) {
      throw new ParseError("Unbalanced '(': unexpected end of condition", this.sourceLength);
    }
    this.index += 1;
    return lexeme;
  }

  private parseExpression(): ConditionNode {
    const lexeme = this.next();
    switch (lexeme.kind) {
      case 'open':
        return this.parseCall(lexeme);
      case 'integer':
        return { type: 'IntegerLiteral', value: lexeme.text };
      case 'string':
        return { type: 'StringLiteral', value: lexeme.text };
      case 'placeholder':
        return { type: 'Placeholder' };
      case 'name':
        return toReference(lexeme.text);
      case 'close':
        throw new ParseError("Unbalanced ')'", lexeme.position);
      case 'symbol':
        throw new ParseError(`Operator '${lexeme.text}' must follow '('`, lexeme.position);
    }
  }

  private parseCall(open: Lexeme): CallNode {
    const head = this.next();
    if ((head.kind !== 'name' && head.kind !== 'symbol') || !isBuiltinName(head.text)) {
      throw new ParseError(`Unknown operator '${head.text}'`, head.position);
    }

    const args: ConditionNode[] = [];
    for (let lexeme = this.peek(); lexeme?.kind !== 'close'; lexeme = this.peek()) {
      if (!lexeme) {
        throw new ParseError("Unbalanced '(': missing ')'", open.position);
      }
      args.push(this.parseExpression());
    }
    this.next();

    const def = getBuiltin(head.text);
    if (!acceptsArity(def, args.length)) {
      throw new ParseError(
        `Operator '${head.text}' takes ${describeArity(def)} argument(s), got ${args.length}`,
        head.position
      );
    }
    return { type: 'Call', operator: head.text, args };
  }
}

const toReference = (dotted: string): ReferenceNode => {
  const segments = dotted.split('.');
  const column = segments[segments.length - 1];
  return {
    type: 'Reference',
    relation: segments.slice(0, -1),
    column,
    dotted
  };
};

/**
 * Parses condition text into an AST.
 * @throws ParseError on unbalanced parentheses, unknown operators, wrong arity
 * or unrecognized tokens
 *
 * @example
 * ```typescript
 * const ast = parse("(and (= parent.name 'Roger') (= parent.id 1))");
 * ```
 */
export const parse = (text: string): ConditionAst => {
  const parser = new ConditionParser(tokenize(text), text.length);
  return Object.freeze({ source: text, root: parser.parseRoot() });
};

function* walkReferences(node: ConditionNode): Generator<ReferenceNode> {
  if (node.type === 'Reference') {
    yield node;
    return;
  }
  if (node.type === 'Call') {
    for (const arg of node.args) {
      yield* walkReferences(arg);
    }
  }
}

/**
 * Every reference of the expression, in order of appearance.
 * The returned iterable can be iterated any number of times.
 */
export const references = (ast: ConditionAst): Iterable<ReferenceNode> => ({
  [Symbol.iterator]: () => walkReferences(ast.root)
});

/**
 * Dotted text of every reference (`ham.spam`, ...), in order of appearance.
 */
export const relations = (ast: ConditionAst): Iterable<string> => ({
  *[Symbol.iterator]() {
    for (const ref of walkReferences(ast.root)) {
      yield ref.dotted;
    }
  }
});
