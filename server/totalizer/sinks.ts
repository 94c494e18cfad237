/**
 * 计数 sink：Agent 产生的 (键, TTL) 自增流的落点
 *
 *   RedisCounterSink   生产环境，INCR + 首次创建时 EXPIRE
 *   ConsoleCounterSink 测试模式，把键写到 stdout
 *   MemoryCounterSink  进程内记录，用于确定性测试
 */

import type { RedisClientManager } from '../lib/clients/redis.client';

export interface CounterSink {
  /** 对键自增 1，返回自增后的值 */
  increment(key: string, ttlSeconds: number): Promise<number>;
  close?(): Promise<void>;
}

export class RedisCounterSink implements CounterSink {
  constructor(private readonly redis: RedisClientManager) {}

  increment(key: string, ttlSeconds: number): Promise<number> {
    return this.redis.incrementCounter(key, ttlSeconds);
  }

  close(): Promise<void> {
    return this.redis.shutdown();
  }
}

export class ConsoleCounterSink implements CounterSink {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  async increment(key: string): Promise<number> {
    this.out.write(`>> ${key} <<\n`);
    return 0;
  }
}

export interface RecordedIncrement {
  key: string;
  ttlSeconds: number;
  value: number;
}

export class MemoryCounterSink implements CounterSink {
  readonly values = new Map<string, number>();
  /** 每个键最近一次设置的 TTL（仅在键创建时设置） */
  readonly ttls = new Map<string, number>();
  readonly log: RecordedIncrement[] = [];

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const value = (this.values.get(key) ?? 0) + 1;
    this.values.set(key, value);
    if (value === 1) this.ttls.set(key, ttlSeconds);
    this.log.push({ key, ttlSeconds, value });
    return value;
  }
}
