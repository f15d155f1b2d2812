import type { ExecutionContext } from './execution-context.js';

/**
 * Runs `action` inside a transaction on the context's executor: committed
 * when it resolves, rolled back when it or the commit rejects. Executors without
 * transaction hooks run the action as is.
 *
 * @example
 * ```typescript
 * await runInTransaction(ctx, async () => {
 *   await upsertInto(city).executeMany(ctx, [['Lyon']]);
 *   await upsertInto(temperature).executeMany(ctx, rows);
 * });
 * ```
 */
export const runInTransaction = async <T>(ctx: ExecutionContext, action: () => Promise<T>): Promise<T> => {
  const { executor } = ctx;
  if (!executor.beginTransaction || !executor.commitTransaction || !executor.rollbackTransaction) {
    return action();
  }

  await executor.beginTransaction();
  try {
    const result = await action();
    await executor.commitTransaction();
    return result;
  } catch (error) {
    await executor.rollbackTransaction();
    throw error;
  }
};
