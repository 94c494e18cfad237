/**
 * ============================================================================
 * 配置验证 Schema：Zod 强类型验证
 * ============================================================================
 *
 * 用途：
 *   1. 启动时验证所有环境变量的类型和范围
 *   2. 生产环境额外约束（Agent 不允许测试模式、截止时间不短于单端点超时）
 *   3. 提供清晰的错误消息，帮助快速定位配置问题
 *
 * 使用方式：
 *   import { validateConfigOrDie } from './config-schema';
 *   validateConfigOrDie(config);
 *
 * ============================================================================
 */

import { z } from 'zod';
import { createModuleLogger } from './logger';
import type { AppConfig } from './config';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

const portSchema = z.number().int().min(1).max(65535);

const appSchema = z.object({
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+/, 'must be semver format (e.g., 1.0.0)'),
  env: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
});

const redisSchema = z.object({
  url: z.string().refine(u => u === '' || /^rediss?:\/\/[^/\s]+/.test(u), 'must be empty or a redis:// / rediss:// URL'),
  host: z.string().min(1),
  port: portSchema,
  password: z.string(),
  db: z.number().int().min(0).max(15),
  keyPrefix: z.string(),
  maxRetries: z.number().int().min(0).max(100),
  connectTimeoutMs: z.number().int().min(100),
});

const agentSchema = z.object({
  sourceId: z.string().min(1).refine(s => !s.includes(';'), 'must not contain ";"'),
  rulesFile: z.string().min(1),
  statsIntervalSeconds: z.number().int().min(0),
  maxPending: z.number().int().min(1),
  testMode: z.boolean(),
});

const fanoutSchema = z.object({
  timeoutMs: z.number().int().min(1),
  deadlineMs: z.number().int().min(0),
  dnsServers: z.array(z.string().min(1)),
});

const rkvdnsSchema = z.object({
  zone: z.string(),
  readConcurrency: z.number().int().min(1).max(256),
});

const reportSchema = z.object({
  trendFraction: z.number().gt(0).max(1),
});

const healthSchema = z.object({
  key: z.string().min(1),
  expect: z.enum(['fanout-name', 'no-check', 'literal']),
  value: z.string(),
});

/** 完整配置 Schema */
const configSchema = z.object({
  app: appSchema,
  redis: redisSchema,
  agent: agentSchema,
  fanout: fanoutSchema,
  rkvdns: rkvdnsSchema,
  report: reportSchema,
  health: healthSchema,
});

// ============================================================
// 生产环境额外验证
// ============================================================

function validateProductionConstraints(cfg: AppConfig): string[] {
  const errors: string[] = [];

  if (cfg.agent.testMode) {
    errors.push('[CRITICAL] agent.testMode: test mode must not be enabled in production');
  }

  if (cfg.fanout.deadlineMs > 0 && cfg.fanout.deadlineMs < cfg.fanout.timeoutMs) {
    errors.push('[CRITICAL] fanout.deadlineMs: must not be shorter than fanout.timeoutMs');
  }

  return errors;
}

// ============================================================
// 公开 API
// ============================================================

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * 使用 Zod Schema 验证配置
 */
export function validateConfigWithSchema(cfg: AppConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // 第一层：Zod schema 验证（类型 + 范围）
  const result = configSchema.safeParse(cfg);
  if (!result.success) {
    for (const issue of result.error.issues) {
      errors.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }

  // 第二层：生产环境业务规则
  if (cfg.app.env === 'production') {
    errors.push(...validateProductionConstraints(cfg));
  }

  // 第三层：警告
  if (cfg.health.expect === 'literal' && cfg.health.value === '') {
    warnings.push('health.value: literal expectation with an empty value');
  }
  if (cfg.agent.statsIntervalSeconds === 0) {
    warnings.push('agent.statsIntervalSeconds: periodic statistics are disabled');
  }

  const success = errors.length === 0;

  if (errors.length > 0) {
    log.warn({ errors }, `Configuration validation found ${errors.length} error(s)`);
  }
  if (warnings.length > 0) {
    log.warn({ warnings }, `Configuration warnings (${warnings.length})`);
  }
  if (success) {
    log.info('Configuration validation passed');
  }

  return { success, errors, warnings };
}

/**
 * 启动时验证配置并快速失败
 */
export function validateConfigOrDie(cfg: AppConfig): void {
  const result = validateConfigWithSchema(cfg);
  if (!result.success) {
    log.fatal(
      { errors: result.errors },
      'Configuration validation failed. Fix the above errors and restart.',
    );
    process.exit(1);
  }
}
