/**
 * Fleet Totalizer：统一错误体系
 * 分层错误类 + 错误码
 *
 * 使用方式：
 *   import { ConfigurationError, ResolutionEmptyError } from '../core/errors';
 *   throw new ConfigurationError('bucket ring ttl too short', { ttlSeconds, bucketCount });
 *   throw new ResolutionEmptyError('pages.fanout.example');
 *
 * 分类原则：
 *   - ConfigurationError 只在启动/规则编译阶段抛出，属于致命错误
 *   - BackendUnavailableError 针对单次操作，记录日志后丢弃，不终止进程
 *   - ResolutionEmptyError / FanoutDeadlineError 是整体操作失败，需上报给调用方
 *   - 分类未命中（ClassificationMiss）不是错误，只计入诊断计数
 */

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  TIMEOUT = 1004,

  // 配置/验证错误 (2xxx)
  CONFIGURATION = 2000,
  INVALID_SEARCH_SPEC = 2001,

  // 数据错误 (3xxx)
  KEY_PARSE = 3000,

  // 后端错误 (5xxx)
  BACKEND_UNAVAILABLE = 5000,

  // 扇出错误 (6xxx)
  RESOLUTION_EMPTY = 6000,
  RESOLUTION_FAILED = 6001,
  FANOUT_DEADLINE = 6002,
}

// ============================================
// 基础错误类
// ============================================

export class TotalizerError extends Error {
  public readonly code: ErrorCode;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /** 序列化为结构化日志格式 */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** 配置错误（规则模板、桶环 TTL、字面量含保留分隔符） */
export class ConfigurationError extends TotalizerError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.CONFIGURATION, context, false);
  }
}

/** 计数键解析失败 */
export class KeyParseError extends TotalizerError {
  constructor(rawKey: string, reason: string) {
    super(`Malformed counter key '${rawKey}': ${reason}`, ErrorCode.KEY_PARSE, { rawKey, reason });
  }
}

/** 查询规格（search spec）非法 */
export class SearchSpecError extends TotalizerError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.INVALID_SEARCH_SPEC, context);
  }
}

/** 后端（Redis / RKVDNS）不可用 */
export class BackendUnavailableError extends TotalizerError {
  constructor(backend: string, message: string, context: Record<string, unknown> = {}) {
    super(`Backend '${backend}' unavailable: ${message}`, ErrorCode.BACKEND_UNAVAILABLE, { backend, ...context });
  }
}

/** 操作超时 */
export class TimeoutError extends TotalizerError {
  constructor(operation: string, timeoutMs: number, context: Record<string, unknown> = {}) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, { operation, timeoutMs, ...context });
  }
}

/** 扇出名称解析为空（通常是命名/委派配置问题，而非瞬时故障） */
export class ResolutionEmptyError extends TotalizerError {
  constructor(name: string) {
    super(`Fanout name '${name}' resolved to no endpoints`, ErrorCode.RESOLUTION_EMPTY, { name });
  }
}

/** 扇出名称解析失败（DNS 服务器错误等） */
export class ResolutionFailedError extends TotalizerError {
  constructor(name: string, message: string, context: Record<string, unknown> = {}) {
    super(`Resolving fanout name '${name}' failed: ${message}`, ErrorCode.RESOLUTION_FAILED, { name, ...context });
  }
}

/** 扇出整体截止时间到达且没有任何端点成功 */
export class FanoutDeadlineError extends TotalizerError {
  public readonly failures: ReadonlyArray<{ endpoint: string; reason: string; message: string }>;

  constructor(
    name: string,
    deadlineMs: number,
    failures: ReadonlyArray<{ endpoint: string; reason: string; message: string }>,
  ) {
    super(
      `Fanout '${name}' exceeded its ${deadlineMs}ms deadline with no successful endpoint`,
      ErrorCode.FANOUT_DEADLINE,
      { name, deadlineMs, failed: failures.map(f => f.endpoint) },
    );
    this.failures = failures;
  }
}

// ============================================
// 错误处理工具
// ============================================

/** 判断是否为 TotalizerError */
export function isTotalizerError(err: unknown): err is TotalizerError {
  return err instanceof TotalizerError;
}

/** 判断是否为可恢复的运营性错误 */
export function isOperationalError(err: unknown): boolean {
  if (isTotalizerError(err)) return err.isOperational;
  return false;
}

/** 提取任意异常的消息文本 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 将未知错误包装为 TotalizerError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): TotalizerError {
  if (isTotalizerError(err)) return err;

  if (err instanceof Error) {
    return new TotalizerError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      stack: err.stack,
      ...context,
    });
  }

  return new TotalizerError(String(err), ErrorCode.UNKNOWN, context);
}
