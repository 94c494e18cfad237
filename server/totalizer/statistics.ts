/**
 * Agent 自身统计
 *
 * 所有监听端点共享同一个 AgentStatistics 实例（按引用传入）。
 * Node 事件循环串行执行回调，计数器更新不会交错。
 */

import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('agent:stats');

export interface StatisticsSnapshot {
  datagrams: number;
  linesSeen: number;
  matched: number;
  unmatched: number;
  dropped: number;
  backendErrors: number;
  increments: number;
  /** 后端自增耗时（毫秒） */
  incrementLatency: { avgMs: number; maxMs: number };
}

export type CounterName = 'datagrams' | 'linesSeen' | 'matched' | 'unmatched' | 'dropped' | 'backendErrors';

function emptyCounters(): Record<CounterName, number> {
  return { datagrams: 0, linesSeen: 0, matched: 0, unmatched: 0, dropped: 0, backendErrors: 0 };
}

export class AgentStatistics {
  private counters = emptyCounters();
  private increments = 0;
  private latencyTotalMs = 0;
  private latencyMaxMs = 0;

  bump(name: CounterName, by = 1): void {
    this.counters[name] += by;
  }

  recordIncrement(elapsedMs: number): void {
    this.increments++;
    this.latencyTotalMs += elapsedMs;
    if (elapsedMs > this.latencyMaxMs) this.latencyMaxMs = elapsedMs;
  }

  snapshot(): StatisticsSnapshot {
    return {
      ...this.counters,
      increments: this.increments,
      incrementLatency: {
        avgMs: this.increments > 0 ? this.latencyTotalMs / this.increments : 0,
        maxMs: this.latencyMaxMs,
      },
    };
  }

  reset(): void {
    this.counters = emptyCounters();
    this.increments = 0;
    this.latencyTotalMs = 0;
    this.latencyMaxMs = 0;
  }
}

/**
 * 周期性输出统计摘要，定时器 unref，不阻止进程退出
 */
export class StatisticsReporter {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly stats: AgentStatistics,
    private readonly intervalSeconds: number,
  ) {}

  start(): void {
    if (this.timer || this.intervalSeconds <= 0) return;
    this.timer = setInterval(() => this.report(), this.intervalSeconds * 1000);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  report(): StatisticsSnapshot {
    const snap = this.stats.snapshot();
    log.info({ ...snap }, 'Agent statistics');
    return snap;
  }
}
