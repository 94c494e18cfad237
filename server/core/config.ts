/**
 * Fleet Totalizer：统一配置中心
 * Redis 地址、扇出超时、RKVDNS 域名、Agent 规则文件路径的唯一来源
 *
 * 使用方式：
 *   import { config } from '../core/config';
 *   const zone = config.rkvdns.zone;
 *   const ttl = config.fanout.timeoutMs;
 *
 * 环境变量优先级：
 *   环境变量 > 默认值
 *
 * 零依赖原则：本文件仅依赖 process.env 和 node:os，不导入任何其他模块
 */

import os from 'node:os';

// ============================================
// 辅助函数
// ============================================

function env(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function envInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? parseInt(v, 10) : defaultValue;
}

function envFloat(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? parseFloat(v) : defaultValue;
}

function envBool(key: string, defaultValue: boolean): boolean {
  const v = process.env[key];
  if (!v) return defaultValue;
  return v === 'true' || v === '1' || v === 'yes';
}

function envList(key: string, defaultValue: string[]): string[] {
  const v = process.env[key];
  return v ? v.split(',').map(s => s.trim()).filter(Boolean) : defaultValue;
}

function envEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const v = process.env[key];
  const match = allowed.find(a => a === v);
  return match ?? defaultValue;
}

// ============================================
// 配置结构
// ============================================

export const config = {

  /** 应用基础配置 */
  app: {
    name: env('APP_NAME', 'Fleet Totalizer'),
    version: env('APP_VERSION', '1.0.0'),
    env: envEnum('NODE_ENV', ['development', 'production', 'test'] as const, 'development'),
    logLevel: envEnum('LOG_LEVEL', ['trace', 'debug', 'info', 'warn', 'error'] as const, 'info'),
  },

  /** Redis（计数后端） */
  redis: {
    url: env('REDIS_URL', ''),
    host: env('REDIS_HOST', 'localhost'),
    port: envInt('REDIS_PORT', 6379),
    password: env('REDIS_PASSWORD', ''),
    db: envInt('REDIS_DB', 0),
    /** 计数键必须与 RKVDNS 查询到的键完全一致，默认不加前缀 */
    keyPrefix: env('REDIS_KEY_PREFIX', ''),
    maxRetries: envInt('REDIS_MAX_RETRIES', 3),
    connectTimeoutMs: envInt('REDIS_CONNECT_TIMEOUT_MS', 5000),
  },

  /** 采集 Agent */
  agent: {
    /** 来源标识（写入计数键的 source 字段） */
    sourceId: env('TOTALIZER_SOURCE', os.hostname().split('.')[0].toLowerCase()),
    /** 规则文件（JSON） */
    rulesFile: env('TOTALIZER_RULES_FILE', 'config/agent.rules.json'),
    /** 统计报告间隔（秒），0 表示关闭 */
    statsIntervalSeconds: envInt('TOTALIZER_STATS_INTERVAL', 60),
    /** 在途自增上限，超出后丢弃新行 */
    maxPending: envInt('TOTALIZER_MAX_PENDING', 100),
    /** 测试模式：不写 Redis，把键打印到 stdout */
    testMode: envBool('TOTALIZER_TEST_MODE', false),
  },

  /** 扇出查询 */
  fanout: {
    /** 单端点超时（毫秒） */
    timeoutMs: envInt('FANOUT_TIMEOUT_MS', 5000),
    /** 整体截止时间（毫秒），0 表示不设置 */
    deadlineMs: envInt('FANOUT_DEADLINE_MS', 0),
    /** 解析使用的 DNS 服务器，空表示系统默认 */
    dnsServers: envList('DNS_SERVERS', []),
  },

  /** RKVDNS（DNS 代理的只读 Redis 视图） */
  rkvdns: {
    /** 扇出名称或单个 RKVDNS 域名 */
    zone: env('RKVDNS_ZONE', ''),
    /** 单端点同时进行的 GET 查询上限 */
    readConcurrency: envInt('RKVDNS_READ_CONCURRENCY', 8),
  },

  /** 查询端报表 */
  report: {
    /** 趋势子窗口占报表窗口的比例 */
    trendFraction: envFloat('TREND_FRACTION', 0.25),
  },

  /** 健康检查 */
  health: {
    key: env('HEALTH_KEY', 'health'),
    expect: envEnum('HEALTH_EXPECT', ['fanout-name', 'no-check', 'literal'] as const, 'fanout-name'),
    value: env('HEALTH_VALUE', ''),
  },
};

export type AppConfig = typeof config;
