import type { TableDef } from '../schema/table.js';
import { parseOneToMany } from '../schema/table.js';
import type { JoinNode } from '../core/ast/join.js';
import { JOIN_KINDS, type JoinKind } from '../core/sql/sql.js';
import {
  formatPath,
  lastSegment,
  parentPath,
  relationKey,
  type RelationPath
} from '../core/condition/relation-path.js';
import { UnresolvedRelationError, UnsupportedPathShapeError } from '../errors.js';
import type { Env } from './env.js';

/**
 * Result of resolving one relation path from a table
 */
export interface JoinTarget {
  /** Table reached at the end of the path */
  table: TableDef;
  /** Column on `table` compared in the ON clause */
  joinColumn: string;
  /** Column on the previous table of the chain compared in the ON clause */
  localColumn: string;
  /** `forward` for a foreign key, `reverse` for a one-to-many relation */
  direction: 'forward' | 'reverse';
}

/**
 * Resolves relation paths to join targets.
 *
 * Results depend only on `(table, path)`, and tables are immutable once
 * registered, so they are memoized per table identity. Resolution is
 * synchronous, so a cache entry is always written before anyone else can read
 * it.
 */
export class JoinResolver {
  private readonly cache = new WeakMap<TableDef, Map<string, JoinTarget>>();

  /**
   * @throws UnresolvedRelationError when a segment is neither a foreign key
   * nor a one-to-many relation
   * @throws UnsupportedPathShapeError on an empty path or a one-to-many
   * relation targeting an undeclared column
   */
  joinOn(table: TableDef, path: RelationPath): JoinTarget {
    if (path.length === 0) {
      throw new UnsupportedPathShapeError(`Empty relation path on table '${table.name}'`, path);
    }

    let byPath = this.cache.get(table);
    if (!byPath) {
      byPath = new Map();
      this.cache.set(table, byPath);
    }
    const key = relationKey(path);
    const cached = byPath.get(key);
    if (cached) return cached;

    const target =
      path.length === 1
        ? this.resolveStep(table, path[0], path)
        : this.resolveStep(this.joinOn(table, parentPath(path)).table, lastSegment(path), path);
    byPath.set(key, target);
    return target;
  }

  private resolveStep(table: TableDef, head: string, path: RelationPath): JoinTarget {
    if (Object.hasOwn(table.oneToMany, head)) {
      const reverse = table.oneToMany[head];
      const { table: targetName, column } = parseOneToMany(reverse);
      const target = table.registry.get(targetName);
      if (!Object.hasOwn(target.columns, column)) {
        throw new UnsupportedPathShapeError(
          `Relation '${head}' of '${table.name}' points at '${reverse}', which is not a declared column (path '${formatPath(path)}')`,
          path
        );
      }
      return { table: target, joinColumn: column, localColumn: table.primaryKey, direction: 'reverse' };
    }

    if (Object.hasOwn(table.foreignKeys, head)) {
      const target = table.registry.get(table.foreignKeys[head]);
      return { table: target, joinColumn: target.primaryKey, localColumn: head, direction: 'forward' };
    }

    throw new UnresolvedRelationError(table.name, head);
  }
}

/**
 * Turns the relation paths registered in `env` into JOIN descriptors, in
 * registration order (every join comes after the join it is anchored on).
 *
 * One-to-many joins are LEFT. A foreign-key join is INNER when its local
 * column is not-null and its anchor is the root table or an INNER join;
 * otherwise it is LEFT.
 */
export const emitJoins = (env: Env, resolver: JoinResolver = env.table.registry.joins): JoinNode[] => {
  const root = env.table;
  const kinds = new Map<string, JoinKind>();
  const joins: JoinNode[] = [];

  for (const { path, alias } of env.entries()) {
    const anchorPath = parentPath(path);
    const anchor = anchorPath.length === 0 ? root.name : env.lookup(anchorPath);
    if (anchor === undefined) {
      throw new UnsupportedPathShapeError(`No alias registered for '${formatPath(anchorPath)}'`, path);
    }

    const target = resolver.joinOn(root, path);
    const anchorTable = anchorPath.length === 0 ? root : resolver.joinOn(root, anchorPath).table;
    const anchorKind = anchorPath.length === 0 ? JOIN_KINDS.INNER : kinds.get(relationKey(anchorPath));
    const kind: JoinKind =
      target.direction === 'forward' &&
      anchorKind === JOIN_KINDS.INNER &&
      anchorTable.notNull.has(target.localColumn)
        ? JOIN_KINDS.INNER
        : JOIN_KINDS.LEFT;
    kinds.set(relationKey(path), kind);

    joins.push({
      type: 'Join',
      kind,
      table: target.table.name,
      alias,
      anchor,
      joinColumn: target.joinColumn,
      localColumn: target.localColumn,
      path
    });
  }

  return joins;
};
