/**
 * 计数键空间模型
 *
 * 计数键文本格式：<prefix>;<matched>;<source>;<start_ts>
 *   - ';' 为保留分隔符，任何字段都不能包含
 *   - start_ts 为桶起始时间（Unix 秒），按桶宽向下取整
 *
 * 过期桶只依赖后端 TTL 淘汰，Agent 从不主动删除键。
 */

import { ConfigurationError, KeyParseError } from '../core/errors';

export const KEY_SEPARATOR = ';';

/** 未分类/任意的 matched 取值 */
export const UNCLASSIFIED = '-';

export const KEY_FIELDS = ['prefix', 'matched', 'source'] as const;
export type KeyField = typeof KEY_FIELDS[number];

export interface CounterKey {
  prefix: string;
  matched: string;
  source: string;
  /** 桶起始时间（Unix 秒） */
  startTs: number;
}

export interface BucketRing {
  readonly bucketWidthSeconds: number;
  readonly bucketCount: number;
  readonly ttlSeconds: number;
}

/**
 * 桶环声明：显式给出桶宽，或沿用 { ttl, buckets } 写法（桶宽 = floor(ttl / buckets)）
 */
export type BucketRingSpec =
  | { bucketWidthSeconds: number; bucketCount: number; ttlSeconds?: number }
  | { ttlSeconds: number; buckets: number };

export function createBucketRing(spec: BucketRingSpec): BucketRing {
  let width: number;
  let count: number;
  let ttl: number;

  if ('buckets' in spec) {
    count = spec.buckets;
    ttl = spec.ttlSeconds;
    width = Math.floor(ttl / count);
  } else {
    count = spec.bucketCount;
    width = spec.bucketWidthSeconds;
    ttl = spec.ttlSeconds ?? width * count;
  }

  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigurationError('bucket count must be an integer >= 1', { bucketCount: count });
  }
  if (!Number.isInteger(width) || width < 1) {
    throw new ConfigurationError('bucket width must be an integer >= 1 second', { bucketWidthSeconds: width });
  }
  if (!Number.isInteger(ttl) || ttl < width * count) {
    throw new ConfigurationError('ttl must cover the whole bucket ring (ttl >= width * count)', {
      ttlSeconds: ttl,
      bucketWidthSeconds: width,
      bucketCount: count,
    });
  }

  return Object.freeze({ bucketWidthSeconds: width, bucketCount: count, ttlSeconds: ttl });
}

/** 新建计数键时必须设置的 TTL（秒） */
export function ttlFor(ring: BucketRing): number {
  return ring.ttlSeconds;
}

export function bucketStart(nowSeconds: number, bucketWidthSeconds: number): number {
  return Math.floor(nowSeconds / bucketWidthSeconds) * bucketWidthSeconds;
}

/** 字段不能为空，也不能包含分隔符 */
export function assertKeyField(name: KeyField, value: string): void {
  if (value.length === 0) {
    throw new ConfigurationError(`counter key field '${name}' must not be empty`, { field: name });
  }
  if (value.includes(KEY_SEPARATOR)) {
    throw new ConfigurationError(`counter key field '${name}' contains the reserved separator '${KEY_SEPARATOR}'`, {
      field: name,
      value,
    });
  }
}

export function keyFor(
  prefix: string,
  matched: string,
  source: string,
  nowSeconds: number,
  ring: BucketRing,
): CounterKey {
  assertKeyField('prefix', prefix);
  assertKeyField('matched', matched);
  assertKeyField('source', source);
  if (!Number.isFinite(nowSeconds) || nowSeconds < 0) {
    throw new ConfigurationError('timestamp must be a finite, non-negative number', { now: nowSeconds });
  }
  return {
    prefix,
    matched,
    source,
    startTs: bucketStart(Math.floor(nowSeconds), ring.bucketWidthSeconds),
  };
}

export function encodeKey(key: CounterKey): string {
  return [key.prefix, key.matched, key.source, String(key.startTs)].join(KEY_SEPARATOR);
}

export type DecodeResult =
  | { ok: true; key: CounterKey }
  | { ok: false; error: KeyParseError };

export function decode(rawKey: string): DecodeResult {
  const parts = rawKey.split(KEY_SEPARATOR);
  if (parts.length !== 4) {
    return { ok: false, error: new KeyParseError(rawKey, `expected 4 fields, got ${parts.length}`) };
  }
  const [prefix, matched, source, ts] = parts;
  if (!prefix || !matched || !source) {
    return { ok: false, error: new KeyParseError(rawKey, 'empty field') };
  }
  if (!/^\d+$/.test(ts)) {
    return { ok: false, error: new KeyParseError(rawKey, `invalid bucket timestamp '${ts}'`) };
  }
  const startTs = Number(ts);
  if (!Number.isSafeInteger(startTs)) {
    return { ok: false, error: new KeyParseError(rawKey, `bucket timestamp out of range '${ts}'`) };
  }
  return { ok: true, key: { prefix, matched, source, startTs } };
}
