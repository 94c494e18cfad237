/**
 * 有界并发执行
 *
 * 最多 limit 个任务同时进行，结果按输入顺序返回。
 * 任一任务失败后不再启动新任务，并以该错误拒绝；signal abort 后同样停止。
 */

import { ConfigurationError } from '../core/errors';

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ConfigurationError('concurrency limit must be a positive integer', { limit });
  }

  const results: R[] = [];
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      signal?.throwIfAborted();
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
