/**
 * rules.ts 规则文件验证测试
 */
import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../../core/errors';
import { bindingId, loadAgentRules, parseAgentRules } from '../rules';

const webRule = { prefix: 'web', pattern: '^(\\S+) (\\S+) (\\d{3})$', template: '$2,$3' };

function rulesFile(overrides: Record<string, unknown> = {}) {
  return {
    ring: { ttlSeconds: 3600, buckets: 4 },
    bindings: [{ address: '127.0.0.1', port: 3430, rules: [webRule] }],
    ...overrides,
  };
}

describe('parseAgentRules', () => {
  it('编译监听端点与分类器', () => {
    const rules = parseAgentRules(rulesFile());
    expect(rules.source).toBeUndefined();
    expect(rules.bindings).toHaveLength(1);
    const [binding] = rules.bindings;
    expect(binding.classifier.classify('GET /a 200')?.matched).toBe('/a,200');
    expect(binding.settings).toEqual([
      { ring: { bucketWidthSeconds: 900, bucketCount: 4, ttlSeconds: 3600 }, source: undefined },
    ]);
  });

  it('规则可以覆盖桶环与 source', () => {
    const rules = parseAgentRules(rulesFile({
      bindings: [{
        address: '127.0.0.1',
        port: 3430,
        rules: [{ ...webRule, ring: { bucketWidthSeconds: 60, bucketCount: 5 }, source: 'edge-1' }],
      }],
    }));
    expect(rules.bindings[0].settings[0]).toEqual({
      ring: { bucketWidthSeconds: 60, bucketCount: 5, ttlSeconds: 300 },
      source: 'edge-1',
    });
  });

  it('缺少 bindings', () => {
    expect(() => parseAgentRules({ ring: { ttlSeconds: 60, buckets: 1 } })).toThrow(/^invalid agent rules: bindings/);
  });

  it('地址必须是 IP', () => {
    expect(() => parseAgentRules(rulesFile({
      bindings: [{ address: 'localhost', port: 3430, rules: [webRule] }],
    }))).toThrow('invalid agent rules: bindings.0.address: must be an IP address');
  });

  it('桶环声明不允许未知字段', () => {
    expect(() => parseAgentRules(rulesFile({ ring: { ttlSeconds: 60, buckets: 1, width: 5 } })))
      .toThrow(ConfigurationError);
  });

  it('桶环 ttl 不足时抛出 ConfigurationError', () => {
    expect(() => parseAgentRules(rulesFile({ ring: { bucketWidthSeconds: 60, bucketCount: 10, ttlSeconds: 300 } })))
      .toThrow(/ttl must cover the whole bucket ring/);
  });

  it('重复的监听端点', () => {
    const binding = { address: '127.0.0.1', port: 3430, rules: [webRule] };
    expect(() => parseAgentRules(rulesFile({ bindings: [binding, binding] })))
      .toThrow('duplicate listen binding 127.0.0.1:3430');
  });

  it('模板错误在加载时抛出', () => {
    expect(() => parseAgentRules(rulesFile({
      bindings: [{ address: '127.0.0.1', port: 3430, rules: [{ prefix: 'web', pattern: '(a)', template: '$4' }] }],
    }))).toThrow(/capture group \$4/);
  });
});

describe('bindingId', () => {
  it('IPv6 地址加方括号', () => {
    expect(bindingId({ address: '::1', port: 3431 })).toBe('[::1]:3431');
    expect(bindingId({ address: '10.0.0.1', port: 53 })).toBe('10.0.0.1:53');
  });
});

describe('loadAgentRules', () => {
  it('加载示例规则文件', async () => {
    const path = fileURLToPath(new URL('../../../config/agent.rules.sample.json', import.meta.url));
    const rules = await loadAgentRules(path);
    expect(rules.bindings.map(bindingId)).toEqual(['127.0.0.1:3430', '[::1]:3431']);
    expect(rules.bindings[0].settings[1].ring.ttlSeconds).toBe(3600);
    expect(rules.bindings[1].classifier.classify('sshd[42]: Failed password for root')?.matched).toBe('failed');
  });

  it('文件不存在', async () => {
    await expect(loadAgentRules('/nonexistent/agent.rules.json')).rejects.toThrow(/cannot read rules file/);
  });
});
