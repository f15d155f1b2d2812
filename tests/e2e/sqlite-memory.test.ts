import { describe, expect, it } from 'vitest';

import { deleteFrom, insertInto, selectFrom, updateTable, upsertInto } from '../../src/query/index.js';
import { runInTransaction } from '../../src/orm/transaction-runner.js';
import type { QueryLogEntry } from '../../src/orm/query-logger.js';
import { UnresolvedForeignKeyError } from '../../src/errors.js';
import { createSchema } from '../fixtures/schema.js';
import { closeDb, openMemoryContext } from './sqlite-helpers.js';

describe('statements on sqlite (memory)', () => {
  it('writes and reads a self-referencing hierarchy', async () => {
    const { person } = createSchema();
    const { db, ctx } = await openMemoryContext();

    try {
      const ids = await upsertInto(person, 'name', 'parent.name').executeMany(ctx, [
        ['Big Bob', null],
        ['Bob', 'Big Bob'],
        ['Bobby', 'Bob']
      ]);
      expect(ids).toEqual([1, 2, 3]);

      expect(await selectFrom(person).orderBy('name').execute(ctx)).toEqual([
        ['Big Bob', null],
        ['Bob', 'Big Bob'],
        ['Bobby', 'Bob']
      ]);

      expect(await selectFrom(person, 'name').where('(= parent.parent.name {})').execute(ctx, ['Big Bob'])).toEqual([
        ['Bobby']
      ]);
    } finally {
      await closeDb(db);
    }
  });

  it('updates, skips conflicts and deletes through relations', async () => {
    const { person } = createSchema();
    const { db, ctx } = await openMemoryContext();

    try {
      await upsertInto(person, 'name', 'parent.name').executeMany(ctx, [
        ['Big Bob', null],
        ['Bob', 'Big Bob'],
        ['Bobby', 'Bob']
      ]);

      expect(await updateTable(person, 'name', 'parent.name').execute(ctx, 'Bobby', 'Big Bob')).toBe(3);
      expect(await insertInto(person, 'name', 'parent.name').execute(ctx, 'Bob', 'Bobby')).toBeNull();
      expect(await selectFrom(person, 'parent.name').where("(= name 'Bob')").execute(ctx)).toEqual([['Big Bob']]);

      const deleted = await deleteFrom(person).where('(= parent.name {})').execute(ctx, ['Big Bob']);
      expect(new Set(deleted)).toEqual(new Set([2, 3]));
      expect(await selectFrom(person, 'name').execute(ctx)).toEqual([['Big Bob']]);
    } finally {
      await closeDb(db);
    }
  });

  it('links a child to a parent written in the same batch', async () => {
    const { person } = createSchema();
    const { db, ctx } = await openMemoryContext();

    try {
      const ids = await upsertInto(person, 'name', 'parent.name')
        .lenient()
        .executeMany(ctx, [
          ['Bob', 'Big Bob'],
          ['Big Bob', null],
          ['Bobby', 'Big Bob']
        ]);
      expect(ids).toEqual([1, 2, 3]);

      expect(await selectFrom(person).orderBy('name').execute(ctx)).toEqual([
        ['Big Bob', null],
        ['Bob', null],
        ['Bobby', 'Big Bob']
      ]);
    } finally {
      await closeDb(db);
    }
  });

  it('rejects unknown references unless lenient', async () => {
    const { person } = createSchema();
    const { db, ctx } = await openMemoryContext();

    try {
      await expect(upsertInto(person, 'name', 'parent.name').execute(ctx, 'Ghost', 'Nobody')).rejects.toBeInstanceOf(
        UnresolvedForeignKeyError
      );
      expect(await upsertInto(person, 'name', 'parent.name').lenient().execute(ctx, 'Orphan', 'Nobody')).toBe(1);
      expect(await selectFrom(person).execute(ctx)).toEqual([['Orphan', null]]);
    } finally {
      await closeDb(db);
    }
  });

  it('aggregates across a one-to-many relation', async () => {
    const { city, temperature } = createSchema();
    const entries: QueryLogEntry[] = [];
    const { db, ctx } = await openMemoryContext(entry => entries.push(entry));

    try {
      await upsertInto(city).executeMany(ctx, [['Lyon'], ['Oslo']]);
      entries.length = 0;

      await upsertInto(temperature).executeMany(ctx, [
        [new Date('2024-01-01T00:00:00.000Z'), 'Lyon', 4.5],
        [new Date('2024-01-02T00:00:00.000Z'), 'Lyon', 6.5]
      ]);
      expect(entries.map(e => e.sql.split(' ')[0])).toEqual(['SELECT', 'INSERT', 'INSERT']);

      expect(await selectFrom(temperature).orderBy('timestamp').limit(1).execute(ctx)).toEqual([
        ['2024-01-01T00:00:00.000Z', 'Lyon', 4.5]
      ]);

      const summary = await selectFrom(city, 'name', '(count temperatures.value)', '(avg temperatures.value)')
        .groupBy('name')
        .orderBy('name')
        .execute(ctx);
      expect(summary).toEqual([
        ['Lyon', 2, 5.5],
        ['Oslo', 0, null]
      ]);
    } finally {
      await closeDb(db);
    }
  });

  it('rolls a failed batch back', async () => {
    const { person } = createSchema();
    const { db, ctx } = await openMemoryContext();

    try {
      await expect(
        runInTransaction(ctx, async () => {
          await upsertInto(person, 'name', 'parent.name').execute(ctx, 'Big Bob', null);
          await upsertInto(person, 'name', 'parent.name').execute(ctx, 'Bob', 'Nobody');
        })
      ).rejects.toBeInstanceOf(UnresolvedForeignKeyError);

      expect(await selectFrom(person, 'name').execute(ctx)).toEqual([]);
    } finally {
      await closeDb(db);
    }
  });
});
