/**
 * Agent 规则文件（JSON）的加载与验证
 *
 * {
 *   "ring": { "ttlSeconds": 86400, "buckets": 4 },
 *   "bindings": [
 *     { "address": "127.0.0.1", "port": 3430,
 *       "rules": [ { "prefix": "web", "pattern": "^(\\S+) (\\S+) (\\d{3})", "template": "$2,$3" } ] }
 *   ]
 * }
 *
 * 规则可单独覆盖 ring 与 source；验证一次后编译成不可变的分类器。
 */

import { readFile } from 'node:fs/promises';
import { isIP } from 'node:net';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../core/errors';
import { compileClassifier, type Classifier } from './classifier';
import { createBucketRing, KEY_SEPARATOR, type BucketRing } from './keyspace';

// ============================================================
// Schema 定义
// ============================================================

const ringSchema = z.union([
  z.object({
    ttlSeconds: z.number().int().positive(),
    buckets: z.number().int().min(1),
  }).strict(),
  z.object({
    bucketWidthSeconds: z.number().int().positive(),
    bucketCount: z.number().int().min(1),
    ttlSeconds: z.number().int().positive().optional(),
  }).strict(),
]);

const sourceSchema = z.string().min(1).refine(s => !s.includes(KEY_SEPARATOR), `must not contain "${KEY_SEPARATOR}"`);

const ruleSchema = z.object({
  prefix: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().optional(),
  template: z.string().optional(),
  lowercase: z.boolean().optional(),
  maxLength: z.number().int().positive().optional(),
  onSeparator: z.enum(['reject', 'truncate']).optional(),
  ring: ringSchema.optional(),
  source: sourceSchema.optional(),
});

const bindingSchema = z.object({
  address: z.string().refine(a => isIP(a) !== 0, 'must be an IP address'),
  port: z.number().int().min(1).max(65535),
  rules: z.array(ruleSchema).min(1, 'at least one rule required'),
});

const rulesFileSchema = z.object({
  source: sourceSchema.optional(),
  ring: ringSchema,
  bindings: z.array(bindingSchema).min(1, 'at least one binding required'),
});

export type AgentRulesFile = z.infer<typeof rulesFileSchema>;

// ============================================================
// 编译结果
// ============================================================

export interface RuleSettings {
  ring: BucketRing;
  /** 规则级 source 覆盖，undefined 表示使用 Agent 的 source */
  source?: string;
}

export interface ListenBinding {
  address: string;
  port: number;
  classifier: Classifier;
  /** 与 classifier.rules 一一对应 */
  settings: readonly RuleSettings[];
}

export interface AgentRules {
  source?: string;
  bindings: readonly ListenBinding[];
}

export function bindingId(binding: { address: string; port: number }): string {
  return isIP(binding.address) === 6 ? `[${binding.address}]:${binding.port}` : `${binding.address}:${binding.port}`;
}

/**
 * 验证并编译规则（来自 JSON 或代码中的对象字面量）
 */
export function parseAgentRules(input: unknown): AgentRules {
  const result = rulesFileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`invalid agent rules: ${issues.join('; ')}`, { issues });
  }

  const file = result.data;
  const defaultRing = createBucketRing(file.ring);
  const seen = new Set<string>();

  const bindings = file.bindings.map((b): ListenBinding => {
    const id = bindingId(b);
    if (seen.has(id)) {
      throw new ConfigurationError(`duplicate listen binding ${id}`, { binding: id });
    }
    seen.add(id);

    return {
      address: b.address,
      port: b.port,
      classifier: compileClassifier(b.rules),
      settings: b.rules.map(r => ({
        ring: r.ring ? createBucketRing(r.ring) : defaultRing,
        source: r.source,
      })),
    };
  });

  return { source: file.source, bindings };
}

export async function loadAgentRules(path: string): Promise<AgentRules> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`cannot read rules file: ${errorMessage(err)}`, { path });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`rules file is not valid JSON: ${errorMessage(err)}`, { path });
  }

  return parseAgentRules(json);
}
