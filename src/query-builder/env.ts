import type { TableDef } from '../schema/table.js';
import { quoteIdentifier } from '../core/sql/sql.js';
import { lastSegment, parentPath, relationKey, type RelationPath } from '../core/condition/relation-path.js';
import { UnsupportedPathShapeError } from '../errors.js';

/**
 * A relation path registered in an environment together with its table alias
 */
export interface RelationRef {
  path: RelationPath;
  alias: string;
}

/**
 * Alias environment of a single statement compilation.
 *
 * Each distinct relation prefix gets one alias, `<last segment>_<ordinal>`,
 * where the ordinal is the number of prefixes registered before it. Parents
 * are always registered before their children, so iterating `entries()` yields
 * every join after the join it is anchored on.
 */
export class Env {
  private readonly refs = new Map<string, RelationRef>();

  constructor(public readonly table: TableDef) {}

  /**
   * Resolves a reference path (relation segments followed by the column) to
   * `"<alias>"."<column>"`, allocating aliases as needed.
   */
  resolve(path: RelationPath): string {
    if (path.length < 2) {
      throw new UnsupportedPathShapeError(
        `Path '${path.join('.')}' has no relation segment to alias`,
        path
      );
    }
    const alias = this.aliasFor(parentPath(path));
    return `${quoteIdentifier(alias)}.${quoteIdentifier(lastSegment(path))}`;
  }

  /**
   * Returns the alias of a relation prefix, registering it (and its ancestors)
   * on first use.
   */
  aliasFor(prefix: RelationPath): string {
    const key = relationKey(prefix);
    const existing = this.refs.get(key);
    if (existing) return existing.alias;

    if (prefix.length >= 2) {
      this.aliasFor(parentPath(prefix));
    }
    const alias = `${lastSegment(prefix)}_${this.refs.size}`;
    this.refs.set(key, { path: [...prefix], alias });
    return alias;
  }

  /**
   * Alias already allocated for `prefix`, if any.
   */
  lookup(prefix: RelationPath): string | undefined {
    return this.refs.get(relationKey(prefix))?.alias;
  }

  /**
   * Registered relation paths in allocation order.
   */
  entries(): RelationRef[] {
    return [...this.refs.values()];
  }

  get size(): number {
    return this.refs.size;
  }
}
