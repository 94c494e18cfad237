/**
 * 扇出引擎：scatter/gather
 *
 * 1. 解析扇出名称为端点集合；解析为空 → ResolutionEmptyError
 * 2. 对每个端点并发执行同一读操作，每个调用单独限时；
 *    单个端点失败只记录到 failures，不影响其他端点
 * 3. combine 只接收成功结果，必须接受空数组且与结果顺序无关
 * 4. 可选整体截止时间：到期后放弃未完成的调用（abort + 记为 timeout），
 *    已完成的结果照常合并；若到期时没有任何成功结果 → FanoutDeadlineError
 */

import { config } from '../core/config';
import { FanoutDeadlineError, ResolutionEmptyError, TimeoutError, errorMessage } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import { normalizeTargets, type NameResolver } from './resolver';

const log = createModuleLogger('fanout');

/** 对单个端点执行的读操作；应在 signal abort 时尽快放弃 */
export type FanoutOperation<R> = (endpoint: string, signal: AbortSignal) => Promise<R>;

/** 合并成功结果 */
export type Combiner<R, M> = (results: readonly R[]) => M;

export type FailureReason = 'timeout' | 'error';

export interface FanoutFailure {
  endpoint: string;
  reason: FailureReason;
  message: string;
}

export interface FanoutOptions {
  /** 单端点超时（毫秒） */
  timeoutMs?: number;
  /** 整体截止时间（毫秒），0 表示不设置 */
  deadlineMs?: number;
}

export interface FanoutOutcome<R, M> {
  name: string;
  /** 解析得到的全部端点（有序、去重） */
  endpoints: string[];
  merged: M;
  /** 成功的端点，按 endpoints 的顺序 */
  succeeded: string[];
  /** 成功端点 → 结果 */
  results: ReadonlyMap<string, R>;
  failures: FanoutFailure[];
}

type Settled<R> =
  | { ok: true; endpoint: string; result: R }
  | { ok: false; failure: FanoutFailure };

export class FanoutEngine {
  private readonly defaults: Required<FanoutOptions>;

  constructor(
    private readonly resolver: NameResolver,
    defaults: FanoutOptions = {},
  ) {
    this.defaults = {
      timeoutMs: defaults.timeoutMs ?? config.fanout.timeoutMs,
      deadlineMs: defaults.deadlineMs ?? config.fanout.deadlineMs,
    };
  }

  /** 解析扇出名称；每次调用都重新解析 */
  async resolve(name: string): Promise<string[]> {
    return normalizeTargets(await this.resolver.resolve(name));
  }

  async fanout<R, M>(
    name: string,
    operation: FanoutOperation<R>,
    combine: Combiner<R, M>,
    options: FanoutOptions = {},
  ): Promise<FanoutOutcome<R, M>> {
    const endpoints = await this.resolve(name);
    if (endpoints.length === 0) {
      throw new ResolutionEmptyError(name);
    }

    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    const deadlineMs = options.deadlineMs ?? this.defaults.deadlineMs;

    const results = new Map<string, R>();
    const successes: R[] = [];
    const failures: FanoutFailure[] = [];
    const controllers = new Map<string, AbortController>();
    let abandoned = false;

    const calls = endpoints.map(async (endpoint) => {
      const controller = new AbortController();
      controllers.set(endpoint, controller);
      const settled = await this.invoke(endpoint, operation, timeoutMs, controller);
      // 截止时间之后到达的结果丢弃
      if (abandoned) return;
      controllers.delete(endpoint);
      if (settled.ok) {
        results.set(settled.endpoint, settled.result);
        successes.push(settled.result);
      } else {
        failures.push(settled.failure);
      }
    });

    const finished = await this.awaitWithDeadline(Promise.all(calls), deadlineMs);
    if (!finished) {
      abandoned = true;
      for (const [endpoint, controller] of controllers) {
        controller.abort();
        failures.push({ endpoint, reason: 'timeout', message: `abandoned at ${deadlineMs}ms fanout deadline` });
      }
      if (successes.length === 0) {
        throw new FanoutDeadlineError(name, deadlineMs, failures);
      }
    }

    if (failures.length > 0) {
      log.warn({ name, failed: failures.map(f => `${f.endpoint} (${f.reason})`) },
        `Fanout partial failure: ${failures.length}/${endpoints.length} endpoint(s)`);
    }

    const succeeded = endpoints.filter(e => results.has(e));
    return { name, endpoints, merged: combine(successes), succeeded, results, failures };
  }

  /** 返回 true 表示全部完成，false 表示截止时间先到 */
  private async awaitWithDeadline(all: Promise<unknown>, deadlineMs: number): Promise<boolean> {
    if (deadlineMs <= 0) {
      await all;
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), deadlineMs);
    });
    try {
      return await Promise.race([all.then(() => true), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async invoke<R>(
    endpoint: string,
    operation: FanoutOperation<R>,
    timeoutMs: number,
    controller: AbortController,
  ): Promise<Settled<R>> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(`fanout call to ${endpoint}`, timeoutMs, { endpoint }));
      }, timeoutMs);
    });

    try {
      // operation 同步抛出也按失败处理
      const call = Promise.resolve().then(() => operation(endpoint, controller.signal));
      const result = await Promise.race([call, timeout]);
      return { ok: true, endpoint, result };
    } catch (err) {
      return {
        ok: false,
        failure: {
          endpoint,
          reason: err instanceof TimeoutError ? 'timeout' : 'error',
          message: errorMessage(err),
        },
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
