import type { TableDef } from './table.js';
import { UnsupportedPathShapeError } from '../errors.js';

export interface DefaultColumnsOptions {
  /** Restrict to the natural key */
  naturalKeyOnly?: boolean;
}

const expand = (table: TableDef, naturalKeyOnly: boolean, trail: string[], visiting: Set<string>): string[] => {
  const columns = naturalKeyOnly ? table.naturalKey : Object.keys(table.columns);
  const result: string[] = [];

  for (const column of columns) {
    if (!Object.hasOwn(table.foreignKeys, column)) {
      result.push(column);
      continue;
    }

    const target = table.registry.get(table.foreignKeys[column]);
    if (visiting.has(target.name)) {
      throw new UnsupportedPathShapeError(
        `Natural keys of '${table.name}' loop back to '${target.name}' through '${[...trail, column].join('.')}'`,
        [...trail, column]
      );
    }
    visiting.add(target.name);
    for (const sub of expand(target, true, [...trail, column], visiting)) {
      result.push(`${column}.${sub}`);
    }
    visiting.delete(target.name);
  }

  return result;
};

/**
 * Columns selected or written when a statement names none: every column (or
 * only the natural key), with each foreign key replaced by the dotted natural
 * key of the table it references, recursively.
 *
 * @example
 * ```typescript
 * defaultColumns(temperature); // ['timestamp', 'city.name', 'value']
 * ```
 * @throws UnsupportedPathShapeError when natural keys reference each other in a cycle
 */
export const defaultColumns = (table: TableDef, options: DefaultColumnsOptions = {}): string[] =>
  expand(table, options.naturalKeyOnly ?? false, [], new Set<string>());
