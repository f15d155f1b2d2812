import { createSqliteExecutor } from '../../src/core/execution/executors/sqlite-executor.js';
import type { DbExecutor } from '../../src/core/execution/db-executor.js';

export interface RecordedCall {
  sql: string;
  params: unknown[];
}

export type Answer = (sql: string, params: unknown[]) => Record<string, unknown>[];

/**
 * In-process executor answering every statement with `answer` and recording
 * what it was asked. `events` records transaction hooks when `transactional`;
 * the hook named `failingHook` rejects after being recorded.
 */
export const scriptedExecutor = (answer: Answer = () => [], transactional = false, failingHook?: string) => {
  const calls: RecordedCall[] = [];
  const events: string[] = [];
  const hook = (name: string) => async () => {
    events.push(name);
    if (name === failingHook) {
      throw new Error(`SQLITE_BUSY: ${name} failed`);
    }
  };

  const executor: DbExecutor = createSqliteExecutor({
    async all(sql, params = []) {
      calls.push({ sql, params });
      return answer(sql, params);
    },
    ...(transactional
      ? { beginTransaction: hook('begin'), commitTransaction: hook('commit'), rollbackTransaction: hook('rollback') }
      : {})
  });

  return { executor, calls, events };
};
