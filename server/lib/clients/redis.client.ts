/**
 * Redis 客户端服务
 * 计数后端：INCR / EXPIRE / GET / KEYS，附带连接管理与健康检查
 *
 * 与缓存类客户端不同，这里的命令失败不会被吞掉：
 * 调用方（Agent 的计数 sink、聚合读取器）需要区分"值为空"和"后端不可用"。
 */

import Redis from 'ioredis';
import { config } from '../../core/config';
import { BackendUnavailableError, errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';

const log = createModuleLogger('redis');

// Redis 配置接口

export interface RedisConfig {
  url?: string;
  host: string;
  port: number;
  password?: string;
  db?: number;
  keyPrefix?: string;
  maxRetriesPerRequest?: number;
  connectTimeoutMs?: number;
  retryDelayMs?: number;
}

/** 本模块用到的命令子集，ioredis 实例天然满足；测试可注入内存实现 */
export interface RedisCommands {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  get(key: string): Promise<string | null>;
  keys(pattern: string): Promise<string[]>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

export function redisConfigFromEnv(): RedisConfig {
  return {
    url: config.redis.url || undefined,
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password || undefined,
    db: config.redis.db,
    keyPrefix: config.redis.keyPrefix,
    maxRetriesPerRequest: config.redis.maxRetries,
    connectTimeoutMs: config.redis.connectTimeoutMs,
    retryDelayMs: 100,
  };
}

// Redis 客户端管理器
export class RedisClientManager {
  private client: RedisCommands | null = null;
  private isConnected: boolean = false;
  private readonly maxConnectionAttempts: number = 5;

  constructor(
    private readonly redisConfig: RedisConfig = redisConfigFromEnv(),
    private readonly factory?: () => RedisCommands,
  ) {}

  /**
   * 初始化 Redis 连接
   */
  async initialize(): Promise<void> {
    if (this.client && this.isConnected) {
      return;
    }

    log.debug('[Redis] Initializing Redis client...');

    try {
      this.client = this.factory ? this.factory() : this.createIoredis();
      await this.client.ping();
      this.isConnected = true;
      log.info({ host: this.redisConfig.url ?? `${this.redisConfig.host}:${this.redisConfig.port}` }, 'Redis client initialized');
    } catch (error) {
      this.isConnected = false;
      // ping 失败时连接仍保留，ioredis 会按 retryStrategy 重连
      log.error({ err: errorMessage(error) }, '[Redis] Initial ping failed');
    }
  }

  private createIoredis(): Redis {
    const cfg = this.redisConfig;
    const retryDelayMs = cfg.retryDelayMs ?? 100;
    const options = {
      keyPrefix: cfg.keyPrefix || undefined,
      maxRetriesPerRequest: cfg.maxRetriesPerRequest ?? 3,
      connectTimeout: cfg.connectTimeoutMs ?? 5000,
      retryStrategy: (times: number) => {
        if (times > this.maxConnectionAttempts) {
          log.error('[Redis] Max connection attempts reached, backing off');
        }
        return Math.min(times * retryDelayMs, 3000);
      },
    };

    const client = cfg.url
      ? new Redis(cfg.url, options)
      : new Redis({ ...options, host: cfg.host, port: cfg.port, password: cfg.password, db: cfg.db });

    client.on('connect', () => {
      log.debug('[Redis] Connected to Redis server');
      this.isConnected = true;
    });

    client.on('error', (err: Error) => {
      log.error({ err: err.message }, '[Redis] Connection error');
      this.isConnected = false;
    });

    client.on('close', () => {
      log.debug('[Redis] Connection closed');
      this.isConnected = false;
    });

    return client;
  }

  /**
   * 获取连接状态
   */
  getConnectionStatus(): boolean {
    return this.isConnected && this.client !== null;
  }

  private require(op: string): RedisCommands {
    if (!this.client) {
      throw new BackendUnavailableError('redis', 'client not initialized', { op });
    }
    return this.client;
  }

  private async run<T>(op: string, fn: (client: RedisCommands) => Promise<T>): Promise<T> {
    const client = this.require(op);
    try {
      return await fn(client);
    } catch (error) {
      throw new BackendUnavailableError('redis', errorMessage(error), { op });
    }
  }

  // ============ 计数操作 ============

  /**
   * 自增计数；键刚创建（结果为 1）时设置 TTL
   * 每次都刷新 TTL 会让持续热点的桶永不过期
   */
  async incrementCounter(key: string, ttlSeconds: number): Promise<number> {
    return this.run('incr', async (client) => {
      const count = await client.incr(key);
      if (count === 1) {
        await client.expire(key, ttlSeconds);
      }
      return count;
    });
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    return this.run('expire', async client => (await client.expire(key, seconds)) === 1);
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', client => client.get(key));
  }

  /**
   * 按 glob 模式获取键
   */
  async keys(pattern: string): Promise<string[]> {
    return this.run('keys', client => client.keys(pattern));
  }

  async healthCheck(): Promise<{ connected: boolean; latencyMs: number; error?: string }> {
    if (!this.client) {
      return { connected: false, latencyMs: -1, error: 'Client not initialized' };
    }

    const start = Date.now();
    try {
      await this.client.ping();
      return { connected: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { connected: false, latencyMs: Date.now() - start, error: errorMessage(error) };
    }
  }

  /**
   * 关闭连接
   */
  async shutdown(): Promise<void> {
    if (this.client) {
      log.debug('[Redis] Shutting down Redis connection...');
      const client = this.client;
      this.client = null;
      this.isConnected = false;
      try {
        await client.quit();
      } catch (error) {
        log.warn({ err: errorMessage(error) }, '[Redis] Quit failed');
      }
    }
  }
}
