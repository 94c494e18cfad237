/**
 * 扇出名称解析
 *
 * 生产环境：一个扇出名称下挂多条 PTR 记录，每条指向一个 RKVDNS 实例域名。
 * 每次扇出调用都重新解析，不做缓存（缓存交给 DNS 解析器基础设施）。
 */

import { Resolver } from 'node:dns/promises';
import { ResolutionFailedError, errorMessage } from '../core/errors';

export interface NameResolver {
  /** 返回有序端点列表；名称不存在或无记录时返回空数组 */
  resolve(name: string): Promise<string[]>;
}

/** 小写、去掉末尾 '.'、去重（保持首次出现的顺序） */
export function normalizeTargets(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of names) {
    const name = raw.trim().replace(/\.+$/, '').toLowerCase();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    out.push(name);
  }
  return out;
}

/** 读取 node:dns 错误上的 code（ENOTFOUND / ENODATA 等） */
export function dnsErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** 表示"名称不存在/无此类型记录"的 DNS 错误码，其余视为解析失败 */
const NO_ANSWER_CODES = new Set(['ENOTFOUND', 'ENODATA']);

export function isNoAnswer(err: unknown): boolean {
  const code = dnsErrorCode(err);
  return code !== undefined && NO_ANSWER_CODES.has(code);
}

export interface DnsResolverOptions {
  /** DNS 服务器地址，空表示系统默认 */
  servers?: readonly string[];
  timeoutMs?: number;
  tries?: number;
}

export function createDnsResolver(options: DnsResolverOptions = {}): Resolver {
  const resolver = new Resolver({ timeout: options.timeoutMs ?? 5000, tries: options.tries ?? 2 });
  if (options.servers && options.servers.length > 0) {
    resolver.setServers([...options.servers]);
  }
  return resolver;
}

/**
 * 基于 PTR 记录的扇出解析
 */
export class PtrNameResolver implements NameResolver {
  private readonly resolver: Resolver;

  constructor(options: DnsResolverOptions = {}) {
    this.resolver = createDnsResolver(options);
  }

  async resolve(name: string): Promise<string[]> {
    try {
      return normalizeTargets(await this.resolver.resolvePtr(name));
    } catch (err) {
      if (isNoAnswer(err)) return [];
      throw new ResolutionFailedError(name, errorMessage(err), { code: dnsErrorCode(err) });
    }
  }
}

/**
 * 静态映射解析（单实例部署、测试）
 */
export class StaticNameResolver implements NameResolver {
  private readonly table: Map<string, string[]>;

  constructor(table: Record<string, readonly string[]>) {
    this.table = new Map(
      Object.entries(table).map(([name, targets]): [string, string[]] => [normalizeTargets([name])[0] ?? name, [...targets]]),
    );
  }

  async resolve(name: string): Promise<string[]> {
    const key = normalizeTargets([name])[0] ?? name;
    return normalizeTargets(this.table.get(key) ?? []);
  }
}
