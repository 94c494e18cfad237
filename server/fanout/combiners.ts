/**
 * 扇出合并策略
 *
 * 所有策略都满足交换律/结合律，结果与端点返回顺序无关；
 * 都接受空数组（代表所有端点都失败）。
 */

/** 按键求和 */
export function sumByKey<K>(results: readonly ReadonlyMap<K, number>[]): Map<K, number> {
  const totals = new Map<K, number>();
  for (const partial of results) {
    for (const [key, n] of partial) {
      totals.set(key, (totals.get(key) ?? 0) + n);
    }
  }
  return totals;
}

export function sum(results: readonly number[]): number {
  return results.reduce((acc, n) => acc + n, 0);
}

/** 集合并集 */
export function union<T>(results: readonly Iterable<T>[]): Set<T> {
  const out = new Set<T>();
  for (const items of results) {
    for (const item of items) out.add(item);
  }
  return out;
}

/** 集合交集：只保留出现在每个结果中的元素；空输入返回空集 */
export function intersection<T>(results: readonly Iterable<T>[]): Set<T> {
  if (results.length === 0) return new Set();
  const sets = results.map(r => new Set(r));
  const [smallest, ...rest] = [...sets].sort((a, b) => a.size - b.size);
  const out = new Set<T>();
  for (const item of smallest) {
    if (rest.every(s => s.has(item))) out.add(item);
  }
  return out;
}

/**
 * 按端点收集：endpointOf 从结果中取出它所属的端点。
 * 返回的 Map 以端点为键，与结果到达顺序无关。
 */
export function collectByEndpoint<R>(endpointOf: (result: R) => string): (results: readonly R[]) => Map<string, R> {
  return results => new Map(results.map((r): [string, R] => [endpointOf(r), r]));
}

/** 全部为真；没有任何成功结果时视为不成立 */
export function allTrue(results: readonly boolean[]): boolean {
  return results.length > 0 && results.every(Boolean);
}

export function anyTrue(results: readonly boolean[]): boolean {
  return results.some(Boolean);
}
