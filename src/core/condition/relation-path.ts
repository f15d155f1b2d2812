/**
 * Ordered relation segments, e.g. `['parent', 'parent']` for `parent.parent.name`.
 */
export type RelationPath = readonly string[];

const KEY_SEPARATOR = '\u0000';

/**
 * Stable map key for a relation path.
 */
export const relationKey = (path: RelationPath): string => path.join(KEY_SEPARATOR);

export const parentPath = (path: RelationPath): RelationPath => path.slice(0, -1);

export const lastSegment = (path: RelationPath): string => path[path.length - 1] ?? '';

export const formatPath = (path: RelationPath): string => path.join('.');
