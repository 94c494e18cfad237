/**
 * 扇出健康检查
 *
 * 对扇出下的每个 RKVDNS 实例：
 *   - SOA 主名称与第一个 NS 记录一致 → zoneOk
 *   - 读取健康键（默认 "health"），按预期值校验 → valueOk
 *
 * 预期值：
 *   literal       所有实例返回同一个字面量
 *   fanout-name   返回值应等于实例自身的域名（小写、忽略末尾 '.'）
 *   no-check      只要求读取成功
 */

import type { SoaRecord } from 'node:dns';
import { config } from '../core/config';
import type { FanoutEngine, FanoutFailure, FanoutOptions } from './fanout';
import { collectByEndpoint } from './combiners';

export type HealthExpectation =
  | { kind: 'literal'; value: string }
  | { kind: 'fanout-name' }
  | { kind: 'no-check' };

export function healthExpectationFromConfig(cfg: typeof config.health = config.health): HealthExpectation {
  switch (cfg.expect) {
    case 'literal':
      return { kind: 'literal', value: cfg.value };
    case 'no-check':
      return { kind: 'no-check' };
    case 'fanout-name':
      return { kind: 'fanout-name' };
  }
}

/** RkvdnsClient 满足该接口 */
export interface HealthProbe {
  soa(zone: string, signal?: AbortSignal): Promise<SoaRecord | null>;
  ns(zone: string, signal?: AbortSignal): Promise<string[] | null>;
  get(zone: string, key: string, signal?: AbortSignal): Promise<string | null>;
}

export interface HealthRow {
  instance: string;
  zoneOk: boolean;
  valueOk: boolean;
}

export interface HealthReport {
  rows: HealthRow[];
  failures: FanoutFailure[];
}

export interface HealthCheckOptions extends FanoutOptions {
  key?: string;
  expectation?: HealthExpectation;
}

const stripDot = (s: string) => s.replace(/\.+$/, '').toLowerCase();

export function zoneOk(soa: SoaRecord | null, ns: readonly string[] | null): boolean {
  if (!soa || !ns || ns.length === 0) return false;
  return stripDot(soa.nsname) === stripDot(ns[0]);
}

export function valueOk(value: string | null, instance: string, expectation: HealthExpectation): boolean {
  if (value === null) return false;
  switch (expectation.kind) {
    case 'no-check':
      return true;
    case 'fanout-name':
      return stripDot(value) === stripDot(instance);
    case 'literal':
      return value === expectation.value;
  }
}

async function settle<T>(p: Promise<T>): Promise<T | null> {
  try {
    return await p;
  } catch {
    // 探测失败等同于校验不通过
    return null;
  }
}

export async function checkHealth(
  engine: FanoutEngine,
  probe: HealthProbe,
  fanoutName: string,
  options: HealthCheckOptions = {},
): Promise<HealthReport> {
  const key = options.key ?? config.health.key;
  const expectation = options.expectation ?? healthExpectationFromConfig();

  const outcome = await engine.fanout(
    fanoutName,
    async (instance, signal): Promise<HealthRow> => {
      const [soa, ns, value] = await Promise.all([
        settle(probe.soa(instance, signal)),
        settle(probe.ns(instance, signal)),
        settle(probe.get(instance, key, signal)),
      ]);
      return { instance, zoneOk: zoneOk(soa, ns), valueOk: valueOk(value, instance, expectation) };
    },
    collectByEndpoint((row: HealthRow) => row.instance),
    { timeoutMs: options.timeoutMs, deadlineMs: options.deadlineMs },
  );

  // 失败的实例也要出现在报告里（两项都不通过）
  const rows = [...outcome.endpoints].sort().map(instance =>
    outcome.merged.get(instance) ?? { instance, zoneOk: false, valueOk: false });

  return { rows, failures: outcome.failures };
}

export function formatHealthReport(rows: readonly HealthRow[]): string[] {
  if (rows.length === 0) return [];
  const width = Math.max(...rows.map(r => r.instance.length)) + 1;
  return rows.map(r =>
    `${r.instance.padEnd(width)} [${r.zoneOk ? 'SOA' : '   '}] [${r.valueOk ? 'VAL' : '   '}]`);
}
