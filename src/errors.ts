/**
 * Base class for every failure raised by the library.
 * Compilation failures are deterministic: the same metadata and query text
 * always produce the same error.
 */
export class RelpathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RelpathError';
  }
}

/**
 * Conflicting or malformed table declaration (unknown column type, natural key
 * collapsed into a self-referencing foreign key, ...).
 */
export class SchemaDefinitionError extends RelpathError {
  constructor(message: string, public readonly table: string, public readonly column?: string) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}

export class UnknownTableError extends RelpathError {
  constructor(public readonly table: string) {
    super(`Table '${table}' is not registered in this schema`);
    this.name = 'UnknownTableError';
  }
}

/**
 * Malformed condition text. `position` is the character offset the lexer or
 * parser stopped at.
 */
export class ParseError extends RelpathError {
  constructor(message: string, public readonly position: number) {
    super(`${message} (at offset ${position})`);
    this.name = 'ParseError';
  }
}

/**
 * A relation path segment that is neither a foreign key nor a reverse relation
 * of the table it is resolved against.
 */
export class UnresolvedRelationError extends RelpathError {
  constructor(public readonly table: string, public readonly segment: string) {
    super(`Table '${table}' has no foreign key or one-to-many relation named '${segment}'`);
    this.name = 'UnresolvedRelationError';
  }
}

export class UnsupportedPathShapeError extends RelpathError {
  constructor(message: string, public readonly path: readonly string[]) {
    super(message);
    this.name = 'UnsupportedPathShapeError';
  }
}

/**
 * Raised at execution time when a dotted foreign-key value does not match any
 * row of the referenced table and the column is not lenient.
 */
export class UnresolvedForeignKeyError extends RelpathError {
  constructor(
    public readonly table: string,
    public readonly column: string,
    public readonly values: readonly unknown[]
  ) {
    super(`Unable to resolve foreign key '${column}' of table '${table}' for values ${JSON.stringify(values)}`);
    this.name = 'UnresolvedForeignKeyError';
  }
}

export class ParameterCountError extends RelpathError {
  constructor(public readonly expected: number, public readonly received: number) {
    super(`Statement expects ${expected} parameter(s), received ${received}`);
    this.name = 'ParameterCountError';
  }
}

export class InvalidStatementError extends RelpathError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStatementError';
  }
}
