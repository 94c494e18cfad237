/**
 * keyspace.ts 单元测试
 *
 * 覆盖范围：
 * - 桶环声明的两种写法与验证
 * - 桶起点对齐（边界时刻）
 * - 编码 / 解码往返与畸形键
 */
import { describe, it, expect } from 'vitest';
import { ConfigurationError, KeyParseError } from '../../core/errors';
import { bucketStart, createBucketRing, decode, encodeKey, keyFor, ttlFor } from '../keyspace';

describe('createBucketRing', () => {
  it('{ ttl, buckets } 写法：桶宽 = floor(ttl / buckets)', () => {
    const ring = createBucketRing({ ttlSeconds: 3600, buckets: 4 });
    expect(ring).toEqual({ bucketWidthSeconds: 900, bucketCount: 4, ttlSeconds: 3600 });
    expect(ttlFor(ring)).toBe(3600);
  });

  it('显式桶宽写法：ttl 缺省为 width * count', () => {
    const ring = createBucketRing({ bucketWidthSeconds: 60, bucketCount: 10 });
    expect(ring.ttlSeconds).toBe(600);
  });

  it('返回冻结对象', () => {
    expect(Object.isFrozen(createBucketRing({ ttlSeconds: 60, buckets: 1 }))).toBe(true);
  });

  it('ttl 不足以覆盖整个桶环时抛出 ConfigurationError', () => {
    expect(() => createBucketRing({ bucketWidthSeconds: 60, bucketCount: 10, ttlSeconds: 300 }))
      .toThrow(ConfigurationError);
  });

  it('桶宽不足 1 秒时抛出 ConfigurationError', () => {
    expect(() => createBucketRing({ ttlSeconds: 3, buckets: 4 })).toThrow(/bucket width/);
  });

  it('桶数量为 0 时抛出 ConfigurationError', () => {
    expect(() => createBucketRing({ bucketWidthSeconds: 60, bucketCount: 0 })).toThrow(/bucket count/);
  });
});

describe('keyFor', () => {
  const ring = createBucketRing({ ttlSeconds: 3600, buckets: 4 });

  it('桶起点按桶宽向下取整', () => {
    const key = keyFor('web', '/a,200', 'host1', 1_700_000_123, ring);
    expect(key).toEqual({ prefix: 'web', matched: '/a,200', source: 'host1', startTs: 1_700_000_100 });
    expect(encodeKey(key)).toBe('web;/a,200;host1;1700000100');
  });

  it('恰好落在边界上的时刻属于新桶，前一秒属于旧桶', () => {
    expect(keyFor('web', 'x', 'h', 1_700_000_100, ring).startTs).toBe(1_700_000_100);
    expect(keyFor('web', 'x', 'h', 1_700_000_099, ring).startTs).toBe(1_699_999_200);
  });

  it('小数秒向下取整', () => {
    expect(keyFor('web', 'x', 'h', 1799.9, ring).startTs).toBe(900);
  });

  it('字段包含保留分隔符时抛出 ConfigurationError', () => {
    expect(() => keyFor('web', 'a;b', 'h', 0, ring)).toThrow(/'matched' contains the reserved separator/);
    expect(() => keyFor('w;b', 'a', 'h', 0, ring)).toThrow(ConfigurationError);
  });

  it('空字段抛出 ConfigurationError', () => {
    expect(() => keyFor('web', 'a', '', 0, ring)).toThrow("counter key field 'source' must not be empty");
  });

  it('非法时间戳抛出 ConfigurationError', () => {
    expect(() => keyFor('web', 'a', 'h', Number.NaN, ring)).toThrow(ConfigurationError);
    expect(() => keyFor('web', 'a', 'h', -1, ring)).toThrow(ConfigurationError);
  });
});

describe('bucketStart', () => {
  it('对齐到桶宽的整数倍', () => {
    expect(bucketStart(0, 60)).toBe(0);
    expect(bucketStart(59, 60)).toBe(0);
    expect(bucketStart(60, 60)).toBe(60);
    expect(bucketStart(125, 60)).toBe(120);
  });
});

describe('decode', () => {
  it('编码结果可以原样解码', () => {
    const ring = createBucketRing({ bucketWidthSeconds: 300, bucketCount: 12 });
    const key = keyFor('dns', 'example.com', 'resolver-2', 1_650_000_001, ring);
    const decoded = decode(encodeKey(key));
    expect(decoded).toEqual({ ok: true, key });
  });

  it('字段数量不对', () => {
    const r = decode('web;/a;host1');
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error).toBeInstanceOf(KeyParseError);
      expect(r.error.message).toBe("Malformed counter key 'web;/a;host1': expected 4 fields, got 3");
    }
  });

  it('空字段', () => {
    const r = decode('web;;host1;100');
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.message).toBe("Malformed counter key 'web;;host1;100': empty field");
  });

  it('时间戳不是十进制整数', () => {
    const r = decode('web;/a;host1;12ab');
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.message).toBe("Malformed counter key 'web;/a;host1;12ab': invalid bucket timestamp '12ab'");
  });
});
