import { ParseError } from '../../errors.js';

export type LexemeKind = 'open' | 'close' | 'integer' | 'string' | 'placeholder' | 'name' | 'symbol';

export interface Lexeme {
  kind: LexemeKind;
  /** Unescaped text (string contents for `string`) */
  text: string;
  /** Offset of the first character in the source */
  position: number;
}

const SYMBOLS = ['!=', '<>', '<=', '>=', '=', '<', '>', '+', '-', '*', '/'] as const;

const NAME = /[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/y;
const INTEGER = /-?[0-9]+/y;
const WHITESPACE = /\s+/y;

const matchAt = (pattern: RegExp, text: string, position: number): string | undefined => {
  pattern.lastIndex = position;
  const match = pattern.exec(text);
  return match ? match[0] : undefined;
};

/**
 * Reads a single-quoted string starting at `start`. A quote inside the
 * literal is written twice (`'O''Hara'`).
 */
const readString = (text: string, start: number): { value: string; end: number } => {
  let value = '';
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "'") {
      if (text[i + 1] === "'") {
        value += "'";
        i += 2;
        continue;
      }
      return { value, end: i + 1 };
    }
    value += ch;
    i += 1;
  }
  throw new ParseError('Unterminated string literal', start);
};

/**
 * Splits condition text into lexemes.
 * @throws ParseError on any character sequence outside the language
 */
export const tokenize = (text: string): Lexeme[] => {
  const lexemes: Lexeme[] = [];
  let position = 0;

  while (position < text.length) {
    const space = matchAt(WHITESPACE, text, position);
    if (space) {
      position += space.length;
      continue;
    }

    const ch = text[position];
    if (ch === '(' || ch === ')') {
      lexemes.push({ kind: ch === '(' ? 'open' : 'close', text: ch, position });
      position += 1;
      continue;
    }

    if (ch === "'") {
      const { value, end } = readString(text, position);
      lexemes.push({ kind: 'string', text: value, position });
      position = end;
      continue;
    }

    if (text.startsWith('{}', position)) {
      lexemes.push({ kind: 'placeholder', text: '{}', position });
      position += 2;
      continue;
    }

    const integer = matchAt(INTEGER, text, position);
    if (integer) {
      lexemes.push({ kind: 'integer', text: integer, position });
      position += integer.length;
      continue;
    }

    const name = matchAt(NAME, text, position);
    if (name) {
      lexemes.push({ kind: 'name', text: name, position });
      position += name.length;
      continue;
    }

    const symbol = SYMBOLS.find(s => text.startsWith(s, position));
    if (symbol) {
      lexemes.push({ kind: 'symbol', text: symbol, position });
      position += symbol.length;
      continue;
    }

    throw new ParseError(`Unexpected character '${ch}'`, position);
  }

  return lexemes;
};
