import { describe, it, expect } from 'vitest';
import { parse } from '../../src/core/condition/parser.js';
import { evaluate } from '../../src/core/condition/evaluator.js';
import { SchemaRegistry } from '../../src/schema/registry.js';
import { Env } from '../../src/query-builder/env.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { SqliteDialect } from '../../src/core/dialect/sqlite/index.js';
import { createSchema } from '../fixtures/schema.js';

const spamTable = () => new SchemaRegistry().defineTable('spam', { a: 'bool', b: 'int' });

describe('condition evaluation on the root table', () => {
  const spam = spamTable();
  const render = (text: string) => evaluate(parse(text), new Env(spam));

  it('renders bare columns without an alias', () => {
    expect(render('a')).toBe('"spam"."a"');
    expect(render('(= a 1)')).toBe('"spam"."a" = 1');
  });

  it('wraps nested builtins in parentheses', () => {
    expect(render('(= a (= 1 1))')).toBe('"spam"."a" = (1 = 1)');
    expect(render('(not (isnull a))')).toBe('NOT ("spam"."a" IS NULL)');
  });

  it('renders every rule', () => {
    expect(render('(+ 1 2 3)')).toBe('1 + 2 + 3');
    expect(render('(- b 1)')).toBe('"spam"."b" - 1');
    expect(render("(in b 1 2 'x')")).toBe(`"spam"."b" IN (1, 2, 'x')`);
    expect(render('(notnull b)')).toBe('"spam"."b" IS NOT NULL');
    expect(render('(or (< b 0) (>= b 10))')).toBe('("spam"."b" < 0) OR ("spam"."b" >= 10)');
    expect(render("(like a 'x%')")).toBe(`"spam"."a" LIKE 'x%'`);
  });

  it('does not wrap the argument of a function', () => {
    expect(render('(sum (* a b))')).toBe('SUM("spam"."a" * "spam"."b")');
    expect(render('(> (count a) 2)')).toBe('(COUNT("spam"."a")) > 2');
  });

  it('escapes quotes in string literals', () => {
    expect(render("(= a 'O''Hara')")).toBe(`"spam"."a" = 'O''Hara'`);
  });
});

describe('condition evaluation through relations', () => {
  it('aliases a single relation', () => {
    const { person } = createSchema();
    const env = new Env(person);
    expect(evaluate(parse("(and (= parent.name 'Roger'))"), env)).toBe(`("parent_0"."name" = 'Roger')`);
    expect(env.entries()).toEqual([{ path: ['parent'], alias: 'parent_0' }]);
  });

  it('aliases each depth once', () => {
    const { person } = createSchema();
    const env = new Env(person);
    const sql = evaluate(parse("(and (= parent.name 'Roger') (= parent.parent.name 'George'))"), env);
    expect(sql).toBe(`("parent_0"."name" = 'Roger') AND ("parent_1"."name" = 'George')`);
    expect(env.entries()).toEqual([
      { path: ['parent'], alias: 'parent_0' },
      { path: ['parent', 'parent'], alias: 'parent_1' }
    ]);
  });

  it('reuses an alias for the same relation', () => {
    const { person } = createSchema();
    const env = new Env(person);
    const sql = evaluate(parse("(and (= parent.name 'Roger') (= parent.id 1))"), env);
    expect(sql).toBe(`("parent_0"."name" = 'Roger') AND ("parent_0"."id" = 1)`);
    expect(env.size).toBe(1);
  });

  it('registers ancestors before a deep path', () => {
    const { person } = createSchema();
    const env = new Env(person);
    expect(evaluate(parse('(= parent.parent.name {})'), env)).toBe('"parent_1"."name" = ?');
    expect(env.lookup(['parent'])).toBe('parent_0');
  });

  it('produces the same text and aliases on a fresh environment', () => {
    const { person } = createSchema();
    const ast = parse("(or (= orgs.name 'x') (= parent.orgs.name 'y'))");
    const first = new Env(person);
    const second = new Env(person);
    expect(evaluate(ast, first)).toBe(evaluate(ast, second));
    expect(first.entries()).toEqual(second.entries());
  });
});

describe('dialect-specific rendering', () => {
  it('numbers placeholders in text order on postgres', () => {
    const { person } = createSchema();
    const ctx = new PostgresDialect().createCompilerContext();
    const sql = evaluate(parse('(and (= name {}) (> parent.name {}))'), new Env(person), ctx);
    expect(sql).toBe('("person"."name" = $1) AND ("parent_0"."name" > $2)');
    expect(ctx.placeholderCount).toBe(2);
  });

  it('spells ilike per dialect', () => {
    const { person } = createSchema();
    const ast = parse('(ilike name {})');
    expect(evaluate(ast, new Env(person), new PostgresDialect().createCompilerContext())).toBe(
      '"person"."name" ILIKE $1'
    );
    expect(evaluate(ast, new Env(person), new SqliteDialect().createCompilerContext())).toBe(
      '"person"."name" LIKE ?'
    );
  });
});
