import { describe, it, expect, vi, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import { RedisClientManager, type RedisCommands } from '../../lib/clients/redis.client';
import { ConsoleCounterSink, MemoryCounterSink, RedisCounterSink } from '../sinks';
import { AgentStatistics, StatisticsReporter } from '../statistics';

class InMemoryRedis implements RedisCommands {
  readonly store = new Map<string, string>();
  readonly expiries = new Map<string, number>();

  async incr(key: string) {
    const n = Number(this.store.get(key) ?? '0') + 1;
    this.store.set(key, String(n));
    return n;
  }
  async expire(key: string, seconds: number) {
    if (!this.store.has(key)) return 0;
    this.expiries.set(key, seconds);
    return 1;
  }
  async get(key: string) { return this.store.get(key) ?? null; }
  async keys() { return [...this.store.keys()]; }
  async ping() { return 'PONG'; }
  async quit() { return 'OK'; }
}

describe('ConsoleCounterSink', () => {
  it('把键写成 ">> key <<" 行', async () => {
    const chunks: string[] = [];
    const out = new Writable({
      write(chunk, _enc, cb) {
        chunks.push(String(chunk));
        cb();
      },
    });
    const sink = new ConsoleCounterSink(out);
    expect(await sink.increment('web;/a;h;0')).toBe(0);
    expect(chunks).toEqual(['>> web;/a;h;0 <<\n']);
  });
});

describe('MemoryCounterSink', () => {
  it('记录每次自增', async () => {
    const sink = new MemoryCounterSink();
    await sink.increment('k', 60);
    await sink.increment('k', 60);
    expect(sink.values.get('k')).toBe(2);
    expect(sink.log).toEqual([
      { key: 'k', ttlSeconds: 60, value: 1 },
      { key: 'k', ttlSeconds: 60, value: 2 },
    ]);
  });
});

describe('RedisCounterSink', () => {
  it('INCR，首次创建时 EXPIRE', async () => {
    const redis = new InMemoryRedis();
    const manager = new RedisClientManager({ host: 'localhost', port: 6379 }, () => redis);
    await manager.initialize();
    const sink = new RedisCounterSink(manager);

    expect(await sink.increment('web;/a;h;0', 3600)).toBe(1);
    redis.expiries.clear();
    expect(await sink.increment('web;/a;h;0', 3600)).toBe(2);
    expect(redis.expiries.size).toBe(0);

    await sink.close();
    expect(manager.getConnectionStatus()).toBe(false);
  });
});

describe('StatisticsReporter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('按间隔报告', () => {
    vi.useFakeTimers();
    const stats = new AgentStatistics();
    const reporter = new StatisticsReporter(stats, 60);
    const report = vi.spyOn(reporter, 'report');

    reporter.start();
    vi.advanceTimersByTime(120_000);
    reporter.stop();
    vi.advanceTimersByTime(60_000);

    expect(report).toHaveBeenCalledTimes(2);
  });

  it('间隔为 0 时不启动', () => {
    vi.useFakeTimers();
    const reporter = new StatisticsReporter(new AgentStatistics(), 0);
    const report = vi.spyOn(reporter, 'report');
    reporter.start();
    vi.advanceTimersByTime(600_000);
    expect(report).not.toHaveBeenCalled();
  });

  it('快照包含平均与最大延迟', () => {
    const stats = new AgentStatistics();
    stats.recordIncrement(2);
    stats.recordIncrement(6);
    stats.bump('dropped', 3);
    const snap = stats.snapshot();
    expect(snap.incrementLatency).toEqual({ avgMs: 4, maxMs: 6 });
    expect(snap.dropped).toBe(3);

    stats.reset();
    expect(stats.snapshot().increments).toBe(0);
  });
});
