/**
 * 聚合客户端
 *
 * total(searchSpec, window, fanoutName)：
 *   search spec → KEYS 通配模式 → 扇出到每个端点枚举键 → 解码 → 按窗口过滤
 *   → 读取计数值 → 按组合键分组求和 → 跨端点求和
 *
 * 跨端点不去重：计数模型假设每个端点的 source 互不重叠。
 * 同一端点内的 GET 共享一个读取会话，并发数受 readConcurrency 限制。
 */

import { config } from '../core/config';
import { SearchSpecError, BackendUnavailableError } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import { sumByKey } from '../fanout/combiners';
import type { FanoutEngine, FanoutFailure, FanoutOptions } from '../fanout/fanout';
import { mapWithConcurrency } from '../fanout/pool';
import type { RkvdnsClient } from '../lib/clients/rkvdns.client';
import { decode, KEY_FIELDS, KEY_SEPARATOR, type CounterKey, type KeyField } from './keyspace';

const log = createModuleLogger('aggregation');

export const WILDCARD = '*';
const GLOB_CHARS = /[*?[\]\\]/;

/** [prefix, matched?, source?]，null 表示不限 */
export type SearchSpec = readonly (string | null)[];

export type ValueMode = 'value' | 'occurrence';

/** 一次端点操作内的读取会话 */
export interface CounterSession {
  keys(pattern: string): Promise<string[]>;
  /** 键不存在（例如刚过期）时返回 null */
  get(key: string): Promise<number | null>;
  close(): void;
}

/**
 * 单端点计数读取能力
 */
export interface CounterReader {
  open(endpoint: string, signal: AbortSignal): CounterSession;
}

export function parseCounterValue(raw: string, key: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new BackendUnavailableError('counter-store', `malformed counter value '${raw}'`, { key });
  }
  return Number(raw);
}

/** 端点即 RKVDNS 域名 */
export class RkvdnsCounterReader implements CounterReader {
  constructor(private readonly client: RkvdnsClient) {}

  open(endpoint: string, signal: AbortSignal): CounterSession {
    const session = this.client.open(signal);
    return {
      keys: pattern => session.keys(endpoint, pattern),
      get: async (key) => {
        const raw = await session.get(endpoint, key);
        return raw === null ? null : parseCounterValue(raw, key);
      },
      close: () => session.close(),
    };
  }
}

export interface TotalOptions extends FanoutOptions {
  /** 趋势计算用的最近子窗口（秒） */
  subWindowSeconds?: number;
  /** 组合键字段，缺省为 search spec 中为 null 的字段 */
  combineBy?: readonly KeyField[];
  valueMode?: ValueMode;
  /** 当前时间（Unix 秒） */
  now?: number;
  /** 跨越窗口下沿的桶按比例计入 */
  prorate?: boolean;
  /** 单端点同时进行的 GET 上限 */
  readConcurrency?: number;
}

export interface AggregationResult {
  totals: Record<string, number>;
  /** 仅在指定 subWindowSeconds 时存在 */
  recent?: Record<string, number>;
  endpoints: string[];
  failures: FanoutFailure[];
}

interface PartialTotals {
  totals: Map<string, number>;
  recent: Map<string, number>;
}

interface TotalContext {
  search: CompiledSearch;
  now: number;
  floor: number;
  recentFloor: number | null;
  valueMode: ValueMode;
  prorate: boolean;
  readConcurrency: number;
}

// ============================================================
// search spec
// ============================================================

export interface CompiledSearch {
  pattern: string;
  combineBy: readonly KeyField[];
}

export function compileSearchSpec(spec: SearchSpec, combineBy?: readonly KeyField[]): CompiledSearch {
  if (spec.length === 0 || spec.length > KEY_FIELDS.length) {
    throw new SearchSpecError(`search spec must have 1 to ${KEY_FIELDS.length} fields`, { spec });
  }

  const fields: string[] = [];
  const wildcarded: KeyField[] = [];
  KEY_FIELDS.forEach((field, i) => {
    const value = i < spec.length ? spec[i] : null;
    if (value === null) {
      fields.push(WILDCARD);
      wildcarded.push(field);
      return;
    }
    if (value.length === 0 || value.includes(KEY_SEPARATOR) || GLOB_CHARS.test(value)) {
      throw new SearchSpecError(`search spec field '${field}' has an invalid value '${value}'`, { spec, field });
    }
    fields.push(value);
  });
  // 桶时间戳始终通配
  fields.push(WILDCARD);

  const by = combineBy ?? wildcarded;
  if (by.length === 0) {
    throw new SearchSpecError('search spec has no wildcarded field and no combination key was given', { spec });
  }

  return { pattern: fields.join(KEY_SEPARATOR), combineBy: by };
}

/** 多字段组合键用 ';' 连接：matched 本身可以含 ','，但任何字段都不含 ';' */
export function combinationKey(key: CounterKey, by: readonly KeyField[]): string {
  return by.map(f => key[f]).join(KEY_SEPARATOR);
}

// ============================================================
// 窗口贡献
// ============================================================

interface Bucket {
  key: CounterKey;
  raw: string;
}

/**
 * 计算一个序列（同一 prefix/matched/source）在窗口 [floor, now] 内的计数。
 * buckets 按 startTs 降序；prorate 时，第一个起点早于 floor 的桶按
 * (newer - floor) / (newer - startTs) 的比例计入，newer 为更新一个桶的起点（或 now）。
 */
export function windowContribution(
  buckets: readonly { startTs: number; value: number }[],
  floor: number,
  now: number,
  prorate: boolean,
): number {
  let total = 0;
  let newer = now;
  for (const b of buckets) {
    if (b.startTs > now) continue;
    if (b.startTs >= floor) {
      total += b.value;
      newer = b.startTs;
      continue;
    }
    if (prorate && newer > floor && newer > b.startTs) {
      total += Math.floor(b.value * (newer - floor) / (newer - b.startTs));
    }
    break;
  }
  return total;
}

// ============================================================
// 聚合客户端
// ============================================================

export class AggregationClient {
  constructor(
    private readonly engine: FanoutEngine,
    private readonly reader: CounterReader,
  ) {}

  async total(
    searchSpec: SearchSpec,
    windowSeconds: number,
    fanoutName: string,
    options: TotalOptions = {},
  ): Promise<AggregationResult> {
    if (!Number.isFinite(windowSeconds) || windowSeconds <= 0) {
      throw new SearchSpecError('window must be a positive number of seconds', { windowSeconds });
    }
    const sub = options.subWindowSeconds;
    if (sub !== undefined && (!Number.isFinite(sub) || sub <= 0 || sub > windowSeconds)) {
      throw new SearchSpecError('sub-window must be positive and no longer than the window', { subWindowSeconds: sub, windowSeconds });
    }

    const search = compileSearchSpec(searchSpec, options.combineBy);
    const now = Math.floor(options.now ?? Date.now() / 1000);
    const ctx: TotalContext = {
      search,
      now,
      floor: now - windowSeconds,
      recentFloor: sub !== undefined ? now - sub : null,
      valueMode: options.valueMode ?? 'value',
      prorate: options.prorate ?? false,
      readConcurrency: options.readConcurrency ?? config.rkvdns.readConcurrency,
    };

    const outcome = await this.engine.fanout(
      fanoutName,
      (endpoint, signal) => this.totalAt(endpoint, signal, ctx),
      (partials: readonly PartialTotals[]) => ({
        totals: sumByKey(partials.map(p => p.totals)),
        recent: sumByKey(partials.map(p => p.recent)),
      }),
      { timeoutMs: options.timeoutMs, deadlineMs: options.deadlineMs },
    );

    const result: AggregationResult = {
      totals: Object.fromEntries(outcome.merged.totals),
      endpoints: outcome.endpoints,
      failures: outcome.failures,
    };
    if (ctx.recentFloor !== null) {
      result.recent = Object.fromEntries(outcome.merged.recent);
    }
    return result;
  }

  private async totalAt(
    endpoint: string,
    signal: AbortSignal,
    ctx: TotalContext,
  ): Promise<PartialTotals> {
    const session = this.reader.open(endpoint, signal);
    try {
      return await this.totalWith(session, endpoint, signal, ctx);
    } finally {
      session.close();
    }
  }

  private async totalWith(
    session: CounterSession,
    endpoint: string,
    signal: AbortSignal,
    ctx: TotalContext,
  ): Promise<PartialTotals> {
    const rawKeys = await session.keys(ctx.search.pattern);

    // 按序列分组
    const series = new Map<string, Bucket[]>();
    for (const raw of rawKeys) {
      const decoded = decode(raw);
      if (!decoded.ok) {
        log.warn({ endpoint, err: decoded.error.message }, 'Skipping malformed counter key');
        continue;
      }
      const id = [decoded.key.prefix, decoded.key.matched, decoded.key.source].join(KEY_SEPARATOR);
      const list = series.get(id) ?? [];
      list.push({ key: decoded.key, raw });
      series.set(id, list);
    }

    const selected = [...series.values()]
      .map((buckets) => {
        buckets.sort((a, b) => b.key.startTs - a.key.startTs);
        return {
          group: combinationKey(buckets[0].key, ctx.search.combineBy),
          needed: this.selectBuckets(buckets, ctx.floor, ctx.now, ctx.prorate),
        };
      })
      .filter(s => s.needed.length > 0);

    const reads = selected.flatMap(s => s.needed);
    const values = new Map<Bucket, number | null>();
    if (ctx.valueMode === 'occurrence') {
      reads.forEach(b => values.set(b, 1));
    } else {
      const fetched = await mapWithConcurrency(reads, ctx.readConcurrency, b => session.get(b.raw), signal);
      reads.forEach((b, i) => values.set(b, fetched[i]));
    }

    const partial: PartialTotals = { totals: new Map(), recent: new Map() };
    for (const { group, needed } of selected) {
      const present = needed.flatMap((b) => {
        const value = values.get(b) ?? null;
        return value === null ? [] : [{ startTs: b.key.startTs, value }];
      });
      addTo(partial.totals, group, windowContribution(present, ctx.floor, ctx.now, ctx.prorate));
      if (ctx.recentFloor !== null) {
        addTo(partial.recent, group, windowContribution(present, ctx.recentFloor, ctx.now, ctx.prorate));
      }
    }

    return partial;
  }

  /** 只读取会参与计算的桶：窗口内的，以及 prorate 时紧邻窗口下沿的那一个 */
  private selectBuckets(desc: readonly Bucket[], floor: number, now: number, prorate: boolean): Bucket[] {
    const out: Bucket[] = [];
    for (const b of desc) {
      if (b.key.startTs > now) continue;
      if (b.key.startTs >= floor) {
        out.push(b);
        continue;
      }
      if (prorate) out.push(b);
      break;
    }
    return out;
  }
}

function addTo(map: Map<string, number>, key: string, n: number): void {
  map.set(key, (map.get(key) ?? 0) + n);
}

// ============================================================
// 趋势
// ============================================================

/** 最近子窗口计数占整个窗口计数的比例；total 为 0 时返回 0 */
export function trendRatio(total: number, recent: number): number {
  return total > 0 ? recent / total : 0;
}

export function trends(result: AggregationResult): Record<string, number> {
  const recent = result.recent ?? {};
  return Object.fromEntries(
    Object.entries(result.totals).map(([k, total]) => [k, trendRatio(total, recent[k] ?? 0)]),
  );
}
