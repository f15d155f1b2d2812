/**
 * Rendering rules for builtins:
 * - `infix`: exactly two operands, `a OP b`
 * - `variadic`: operands joined by ` OP `
 * - `prefix`: one operand, `OP a`
 * - `postfix`: one operand, `a OP`
 * - `list`: `a OP (b, c, ...)`
 * - `function`: `OP(a, b, ...)`
 */
export type RenderRule = 'infix' | 'variadic' | 'prefix' | 'postfix' | 'list' | 'function';

export interface BuiltinDef {
  rule: RenderRule;
  /** SQL text of the operator or function name */
  sql: string;
  minArgs: number;
  /** `undefined` means unbounded */
  maxArgs?: number;
}

const infix = (sql: string): BuiltinDef => ({ rule: 'infix', sql, minArgs: 2, maxArgs: 2 });
const variadic = (sql: string, minArgs: number): BuiltinDef => ({ rule: 'variadic', sql, minArgs });
const fn = (sql: string): BuiltinDef => ({ rule: 'function', sql, minArgs: 1, maxArgs: 1 });

export const BUILTINS = {
  '=': infix('='),
  '!=': infix('!='),
  '<>': infix('<>'),
  '<': infix('<'),
  '<=': infix('<='),
  '>': infix('>'),
  '>=': infix('>='),
  '-': infix('-'),
  '/': infix('/'),
  '+': variadic('+', 2),
  '*': variadic('*', 2),
  like: infix('LIKE'),
  ilike: infix('ILIKE'),
  and: variadic('AND', 1),
  or: variadic('OR', 1),
  not: { rule: 'prefix', sql: 'NOT', minArgs: 1, maxArgs: 1 },
  isnull: { rule: 'postfix', sql: 'IS NULL', minArgs: 1, maxArgs: 1 },
  notnull: { rule: 'postfix', sql: 'IS NOT NULL', minArgs: 1, maxArgs: 1 },
  in: { rule: 'list', sql: 'IN', minArgs: 2 },
  count: fn('COUNT'),
  sum: fn('SUM'),
  min: fn('MIN'),
  max: fn('MAX'),
  avg: fn('AVG')
} satisfies Record<string, BuiltinDef>;

export type BuiltinName = keyof typeof BUILTINS;

export const isBuiltinName = (name: string): name is BuiltinName =>
  Object.prototype.hasOwnProperty.call(BUILTINS, name);

export const getBuiltin = (name: BuiltinName): BuiltinDef => BUILTINS[name];

export const acceptsArity = (def: BuiltinDef, count: number): boolean =>
  count >= def.minArgs && (def.maxArgs === undefined || count <= def.maxArgs);

export const describeArity = (def: BuiltinDef): string => {
  if (def.maxArgs === def.minArgs) return `exactly ${def.minArgs}`;
  if (def.maxArgs === undefined) return `at least ${def.minArgs}`;
  return `${def.minArgs} to ${def.maxArgs}`;
};
