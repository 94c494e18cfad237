/**
 * RKVDNS 客户端
 * RKVDNS 是 Redis 前面的只读 DNS 代理：
 *   <key>.get.<zone>        TXT → GET key
 *   <pattern>.keys.<zone>   TXT → KEYS pattern（每个键一条 TXT 记录）
 *
 * 键和模式中的 '.' 与 ';' 需要反斜杠转义后才能放进查询名。
 * 同一端点的批量读取应在一个 RkvdnsSession 内进行，共享 resolver。
 * NXDOMAIN / NODATA 表示"没有值"，其他 DNS 错误按后端不可用处理。
 */

import type { SoaRecord } from 'node:dns';
import type { Resolver } from 'node:dns/promises';
import { BackendUnavailableError, errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { createDnsResolver, dnsErrorCode, isNoAnswer, type DnsResolverOptions } from '../../fanout/resolver';

const log = createModuleLogger('rkvdns');

const ESCAPED = /[.;]/g;

export function escapeQname(value: string): string {
  return value.replace(ESCAPED, c => `\\${c}`);
}

export function getQname(key: string, zone: string): string {
  return `${escapeQname(key)}.get.${zone}`;
}

export function keysQname(pattern: string, zone: string): string {
  return `${escapeQname(pattern)}.keys.${zone}`;
}

/**
 * 一次端点操作内的查询会话：所有查询共享同一个 resolver，
 * signal abort 时整体取消。用完必须 close()。
 */
export class RkvdnsSession {
  private readonly resolver: Resolver;
  private readonly onAbort = () => this.resolver.cancel();

  constructor(options: DnsResolverOptions, private readonly signal?: AbortSignal) {
    this.resolver = createDnsResolver(options);
    signal?.addEventListener('abort', this.onAbort, { once: true });
  }

  close(): void {
    this.signal?.removeEventListener('abort', this.onAbort);
  }

  private async query<T>(qname: string, fn: (resolver: Resolver) => Promise<T>): Promise<T | null> {
    try {
      return await fn(this.resolver);
    } catch (err) {
      if (isNoAnswer(err)) return null;
      log.debug({ qname, code: dnsErrorCode(err) }, 'RKVDNS query failed');
      throw new BackendUnavailableError('rkvdns', errorMessage(err), { qname, code: dnsErrorCode(err) });
    }
  }

  /** TXT 查询，每条记录的字符串分片拼接成一个值 */
  async txt(qname: string): Promise<string[] | null> {
    const records = await this.query(qname, r => r.resolveTxt(qname));
    return records ? records.map(chunks => chunks.join('')) : null;
  }

  async get(zone: string, key: string): Promise<string | null> {
    const values = await this.txt(getQname(key, zone));
    return values && values.length > 0 ? values[0] : null;
  }

  async keys(zone: string, pattern: string): Promise<string[]> {
    return (await this.txt(keysQname(pattern, zone))) ?? [];
  }

  soa(zone: string): Promise<SoaRecord | null> {
    return this.query(zone, r => r.resolveSoa(zone));
  }

  ns(zone: string): Promise<string[] | null> {
    return this.query(zone, r => r.resolveNs(zone));
  }
}

export class RkvdnsClient {
  constructor(private readonly options: DnsResolverOptions = {}) {}

  open(signal?: AbortSignal): RkvdnsSession {
    return new RkvdnsSession(this.options, signal);
  }

  /** 单次查询：独立会话，abort 只取消这一次 */
  private async once<T>(signal: AbortSignal | undefined, fn: (session: RkvdnsSession) => Promise<T>): Promise<T> {
    const session = this.open(signal);
    try {
      return await fn(session);
    } finally {
      session.close();
    }
  }

  get(zone: string, key: string, signal?: AbortSignal): Promise<string | null> {
    return this.once(signal, s => s.get(zone, key));
  }

  keys(zone: string, pattern: string, signal?: AbortSignal): Promise<string[]> {
    return this.once(signal, s => s.keys(zone, pattern));
  }

  soa(zone: string, signal?: AbortSignal): Promise<SoaRecord | null> {
    return this.once(signal, s => s.soa(zone));
  }

  ns(zone: string, signal?: AbortSignal): Promise<string[] | null> {
    return this.once(signal, s => s.ns(zone));
  }
}
