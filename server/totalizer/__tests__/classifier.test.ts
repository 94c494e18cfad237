/**
 * classifier.ts 单元测试
 */
import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../core/errors';
import { asciify, classify, compileClassifier } from '../classifier';
import { UNCLASSIFIED } from '../keyspace';

describe('模板提取', () => {
  it('按序号引用捕获组', () => {
    const c = compileClassifier([{ prefix: 'web', pattern: '^(\\S+) (\\S+) (\\d{3})$', template: '$2,$3' }]);
    expect(c.classify('GET /a 200')).toEqual({ prefix: 'web', matched: '/a,200', rule: 0 });
  });

  it('按名称引用捕获组并转小写', () => {
    const c = compileClassifier([
      { prefix: 'dns', pattern: 'query: (?<qname>\\S+) IN', template: '$<qname>', lowercase: true },
    ]);
    expect(c.classify('client 10.0.0.1 query: Example.COM IN A')?.matched).toBe('example.com');
  });

  it('缺省模板为 $1', () => {
    const c = compileClassifier([{ prefix: 'auth', pattern: 'user=(\\w+)' }]);
    expect(c.classify('login user=alice ok')?.matched).toBe('alice');
  });

  it('没有捕获组时 matched 为 UNCLASSIFIED', () => {
    const c = compileClassifier([{ prefix: 'kern', pattern: 'panic' }]);
    expect(c.classify('kernel panic now')).toEqual({ prefix: 'kern', matched: UNCLASSIFIED, rule: 0 });
  });

  it('$$ 表示字面量 $', () => {
    const c = compileClassifier([{ prefix: 'p', pattern: '(\\d+)', template: 'x$$$1' }]);
    expect(c.classify('n=42')?.matched).toBe('x$42');
  });

  it('search 语义：不要求整行匹配', () => {
    const c = compileClassifier([{ prefix: 'p', pattern: 'code (\\d+)' }]);
    expect(c.classify('prefix text code 7 trailing')?.matched).toBe('7');
  });

  it('maxLength 截断提取值', () => {
    const c = compileClassifier([{ prefix: 'p', pattern: '(\\S+)', maxLength: 3 }]);
    expect(c.classify('abcdef')?.matched).toBe('abc');
  });

  it('提取值为空时视为未命中', () => {
    const c = compileClassifier([{ prefix: 'p', pattern: 'x=(\\S*)' }]);
    expect(c.classify('x=')).toBeNull();
  });
});

describe('规则顺序', () => {
  const c = compileClassifier([
    { prefix: 'err', pattern: 'error' },
    { prefix: 'any', pattern: '(\\w+)' },
  ]);

  it('首个命中的规则生效', () => {
    expect(c.classify('an error here')).toEqual({ prefix: 'err', matched: '-', rule: 0 });
  });

  it('前面的规则未命中时继续尝试后续规则', () => {
    expect(c.classify('hello world')).toEqual({ prefix: 'any', matched: 'hello', rule: 1 });
  });

  it('没有规则命中时返回 null', () => {
    expect(classify('!!!', c)).toBeNull();
  });
});

describe('保留分隔符处理', () => {
  it('reject（缺省）：提取值含 ";" 时丢弃该行，不再尝试后续规则', () => {
    const c = compileClassifier([
      { prefix: 'p', pattern: 'path=(\\S+)' },
      { prefix: 'fallback', pattern: '(path)' },
    ]);
    expect(c.classify('path=a;b')).toBeNull();
  });

  it('truncate：去掉首尾分隔符后取第一段', () => {
    const c = compileClassifier([{ prefix: 'p', pattern: 'path=(\\S+)', onSeparator: 'truncate' }]);
    expect(c.classify('path=;a;b;')?.matched).toBe('a');
  });
});

describe('编译期验证', () => {
  it('引用不存在的序号组', () => {
    expect(() => compileClassifier([{ prefix: 'p', pattern: '(a)', template: '$2' }]))
      .toThrow('template references capture group $2 but the pattern defines 1');
  });

  it('引用不存在的命名组', () => {
    expect(() => compileClassifier([{ prefix: 'p', pattern: '(?<a>x)', template: '$<b>' }]))
      .toThrow('template references unknown named group $<b>');
  });

  it('模板字面量含保留分隔符', () => {
    expect(() => compileClassifier([{ prefix: 'p', pattern: '(a)', template: 'x;$1' }]))
      .toThrow(/template literal contains the reserved separator/);
  });

  it('非法正则', () => {
    expect(() => compileClassifier([{ prefix: 'p', pattern: '(' }])).toThrow(/invalid rule pattern/);
  });

  it('禁止 g / y 标志', () => {
    expect(() => compileClassifier([{ prefix: 'p', pattern: 'a', flags: 'g' }])).toThrow(ConfigurationError);
  });

  it('prefix 为空或含分隔符', () => {
    expect(() => compileClassifier([{ prefix: '', pattern: 'a' }])).toThrow('rule prefix must not be empty');
    expect(() => compileClassifier([{ prefix: 'a;b', pattern: 'a' }])).toThrow(ConfigurationError);
  });

  it('maxLength 必须为正整数', () => {
    expect(() => compileClassifier([{ prefix: 'p', pattern: '(a)', maxLength: 0 }]))
      .toThrow('maxLength must be a positive integer');
  });

  it('错误上下文包含规则序号', () => {
    try {
      compileClassifier([{ prefix: 'ok', pattern: 'a' }, { prefix: 'bad', pattern: '(a)', template: '$3' }]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) expect(err.context.rule).toBe(1);
    }
  });
});

describe('asciify', () => {
  it('可打印 ASCII 原样保留，其余字节转为 \\xHH', () => {
    expect(asciify(new Uint8Array([0x41, 0x09, 0xff, 0x7e]))).toBe('A\\x09\\xff~');
  });

  it('多字节 UTF-8 逐字节转义', () => {
    expect(asciify(new TextEncoder().encode('é'))).toBe('\\xc3\\xa9');
  });
});

describe('全函数性', () => {
  it('对任意输入都不抛出异常', () => {
    const c = compileClassifier([
      { prefix: 'a', pattern: '^(\\S+) (\\S+)$', template: '$1$2' },
      { prefix: 'b', pattern: '(?<w>\\w+)$', template: '$<w>' },
    ]);
    const inputs = ['', ' ', 'x'.repeat(10_000), '\\x00\\xff', 'a b', ';;;', '$1 $2'];
    for (const line of inputs) {
      expect(() => c.classify(line)).not.toThrow();
    }
  });
});
