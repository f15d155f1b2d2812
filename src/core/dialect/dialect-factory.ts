import type { Dialect } from './abstract.js';
import { PostgresDialect } from './postgres/index.js';
import { SqliteDialect } from './sqlite/index.js';
import { SUPPORTED_DIALECTS } from '../sql/sql.js';
import { RelpathError } from '../../errors.js';

export type DialectKey =
  | (typeof SUPPORTED_DIALECTS)[keyof typeof SUPPORTED_DIALECTS]
  | (string & {}); // user-registered keys

type DialectFactoryFn = () => Dialect;

const BUILT_IN: ReadonlyMap<DialectKey, DialectFactoryFn> = new Map<DialectKey, DialectFactoryFn>([
  [SUPPORTED_DIALECTS.POSTGRES, () => new PostgresDialect()],
  [SUPPORTED_DIALECTS.SQLITE, () => new SqliteDialect()]
]);

/**
 * Goes from a symbolic name (`"sqlite"`) to a Dialect instance.
 * Registered keys take precedence over the built-in ones.
 */
export class DialectFactory {
  private static readonly overrides = new Map<DialectKey, DialectFactoryFn>();

  /**
   * Registers (or overrides) a dialect.
   *
   * @example
   * ```typescript
   * DialectFactory.register('reporting', () => new PostgresDialect());
   * ```
   */
  static register(key: DialectKey, factory: DialectFactoryFn): void {
    this.overrides.set(key, factory);
  }

  /**
   * @throws RelpathError if the key is neither built in nor registered
   */
  static create(key: DialectKey): Dialect {
    const factory = this.overrides.get(key) ?? BUILT_IN.get(key);
    if (!factory) {
      throw new RelpathError(`Dialect "${key}" is not registered. Use DialectFactory.register(...) to register it.`);
    }
    return factory();
  }

  /**
   * Drops every registration (mainly for tests).
   */
  static clear(): void {
    this.overrides.clear();
  }
}

/**
 * Normalizes either a Dialect instance or a key into a Dialect instance.
 */
export const resolveDialectInput = (dialect: Dialect | DialectKey): Dialect =>
  typeof dialect === 'string' ? DialectFactory.create(dialect) : dialect;
