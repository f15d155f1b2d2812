/**
 * Types of SQL joins emitted for relation paths
 */
export const JOIN_KINDS = {
  /** Every anchor row has exactly one match */
  INNER: 'INNER',
  /** Anchor rows may have no match */
  LEFT: 'LEFT'
} as const;

export type JoinKind = (typeof JOIN_KINDS)[keyof typeof JOIN_KINDS];

/**
 * Ordering directions for result sorting
 */
export const ORDER_DIRECTIONS = {
  ASC: 'ASC',
  DESC: 'DESC'
} as const;

export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

/**
 * Supported database dialects
 */
export const SUPPORTED_DIALECTS = {
  /** SQLite database dialect */
  SQLITE: 'sqlite',
  /** PostgreSQL database dialect */
  POSTGRES: 'postgres'
} as const;

export type DialectName = (typeof SUPPORTED_DIALECTS)[keyof typeof SUPPORTED_DIALECTS];

/**
 * Quotes an identifier with double quotes, doubling any embedded quote.
 * Both supported dialects share this syntax.
 */
export const quoteIdentifier = (id: string): string => `"${id.replace(/"/g, '""')}"`;

/**
 * Renders a string literal with single quotes, doubling any embedded quote.
 */
export const quoteString = (value: string): string => `'${value.replace(/'/g, "''")}'`;
