import type { BuiltinName } from '../condition/builtins.js';

/**
 * State shared by every fragment of one statement compilation
 */
export interface CompilerContext {
  /** Number of placeholders emitted so far */
  readonly placeholderCount: number;
  /** Registers the next positional placeholder and returns its marker */
  addPlaceholder(): string;
  /** SQL text for a builtin, allowing dialect-specific spellings */
  operatorSql(name: BuiltinName, fallback: string): string;
}

export interface CompilerContextOptions {
  formatPlaceholder?: (index: number) => string;
  operators?: Partial<Record<BuiltinName, string>>;
}

/**
 * Creates a compiler context. Placeholders are numbered from 1 in the order
 * they are rendered, which is the order they appear in the statement text.
 */
export const createCompilerContext = (options: CompilerContextOptions = {}): CompilerContext => {
  const format = options.formatPlaceholder ?? (() => '?');
  const operators = options.operators ?? {};
  let counter = 0;
  return {
    get placeholderCount() {
      return counter;
    },
    addPlaceholder: () => {
      counter += 1;
      return format(counter);
    },
    operatorSql: (name, fallback) => operators[name] ?? fallback
  };
};
