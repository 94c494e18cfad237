/**
 * 行分类器
 *
 * 规则按声明顺序求值，首个命中的规则生效。提取模板支持：
 *   $1 … $n     按序号引用捕获组
 *   $<name>     按名称引用捕获组
 *   $$          字面量 '$'
 *
 * 模板/正则错误在 compileClassifier() 时一次性抛出 ConfigurationError，
 * classify() 对任意输入都不会抛出异常。
 */

import { ConfigurationError, errorMessage } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import { KEY_SEPARATOR, UNCLASSIFIED } from './keyspace';

const log = createModuleLogger('classifier');

export type SeparatorPolicy = 'reject' | 'truncate';

export interface ClassificationRuleSpec {
  /** 正则表达式源文本（search 语义，不要求整行匹配） */
  pattern: string;
  /** 正则标志，不允许 g / y */
  flags?: string;
  prefix: string;
  /** 提取模板，缺省为 $1（无捕获组时为 UNCLASSIFIED） */
  template?: string;
  lowercase?: boolean;
  maxLength?: number;
  /** 提取值包含 ';' 时：reject 丢弃该行，truncate 取第一段 */
  onSeparator?: SeparatorPolicy;
}

type TemplateToken =
  | { kind: 'literal'; text: string }
  | { kind: 'group'; index: number }
  | { kind: 'named'; name: string };

export interface CompiledRule {
  readonly index: number;
  readonly prefix: string;
  readonly regex: RegExp;
  readonly template: readonly TemplateToken[];
  readonly lowercase: boolean;
  readonly maxLength: number | null;
  readonly onSeparator: SeparatorPolicy;
}

export interface Match {
  prefix: string;
  matched: string;
  /** 命中规则的声明序号 */
  rule: number;
}

// ============================================================
// 模板解析
// ============================================================

const TEMPLATE_TOKEN = /\$(?:(\$)|(\d+)|<([A-Za-z_$][\w$]*)>)/g;

function parseTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let last = 0;
  for (const m of template.matchAll(TEMPLATE_TOKEN)) {
    const at = m.index ?? 0;
    if (at > last) tokens.push({ kind: 'literal', text: template.slice(last, at) });
    if (m[1]) {
      tokens.push({ kind: 'literal', text: '$' });
    } else if (m[2]) {
      tokens.push({ kind: 'group', index: parseInt(m[2], 10) });
    } else {
      tokens.push({ kind: 'named', name: m[3] });
    }
    last = at + m[0].length;
  }
  if (last < template.length) tokens.push({ kind: 'literal', text: template.slice(last) });
  return tokens;
}

/** 统计正则的捕获组数量和命名组 */
function describeGroups(regex: RegExp): { count: number; names: Set<string> } {
  // 追加空分支，保证对空串必定匹配；外层非捕获组不改变编号
  const probe = new RegExp(`(?:${regex.source})|`, regex.flags).exec('');
  if (!probe) return { count: 0, names: new Set() };
  return {
    count: probe.length - 1,
    names: new Set(Object.keys(probe.groups ?? {})),
  };
}

function compileRule(spec: ClassificationRuleSpec, index: number): CompiledRule {
  const where = { rule: index, prefix: spec.prefix };

  if (!spec.prefix) {
    throw new ConfigurationError('rule prefix must not be empty', where);
  }
  if (spec.prefix.includes(KEY_SEPARATOR)) {
    throw new ConfigurationError(`rule prefix contains the reserved separator '${KEY_SEPARATOR}'`, where);
  }

  const flags = spec.flags ?? '';
  if (/[gy]/.test(flags)) {
    throw new ConfigurationError(`rule flags must not include 'g' or 'y' (got '${flags}')`, where);
  }

  let regex: RegExp;
  try {
    regex = new RegExp(spec.pattern, flags);
  } catch (err) {
    throw new ConfigurationError(`invalid rule pattern: ${errorMessage(err)}`, { ...where, pattern: spec.pattern });
  }

  const groups = describeGroups(regex);
  const templateText = spec.template ?? (groups.count > 0 ? '$1' : UNCLASSIFIED);
  const template = parseTemplate(templateText);

  for (const token of template) {
    if (token.kind === 'group' && (token.index < 1 || token.index > groups.count)) {
      throw new ConfigurationError(
        `template references capture group $${token.index} but the pattern defines ${groups.count}`,
        { ...where, template: templateText },
      );
    }
    if (token.kind === 'named' && !groups.names.has(token.name)) {
      throw new ConfigurationError(
        `template references unknown named group $<${token.name}>`,
        { ...where, template: templateText },
      );
    }
    if (token.kind === 'literal' && token.text.includes(KEY_SEPARATOR)) {
      throw new ConfigurationError(
        `template literal contains the reserved separator '${KEY_SEPARATOR}'`,
        { ...where, template: templateText },
      );
    }
  }

  if (spec.maxLength !== undefined && (!Number.isInteger(spec.maxLength) || spec.maxLength < 1)) {
    throw new ConfigurationError('maxLength must be a positive integer', { ...where, maxLength: spec.maxLength });
  }

  return Object.freeze({
    index,
    prefix: spec.prefix,
    regex,
    template: Object.freeze(template),
    lowercase: spec.lowercase ?? false,
    maxLength: spec.maxLength ?? null,
    onSeparator: spec.onSeparator ?? 'reject',
  });
}

// ============================================================
// 提取
// ============================================================

function render(rule: CompiledRule, m: RegExpExecArray): string {
  let out = '';
  for (const token of rule.template) {
    switch (token.kind) {
      case 'literal':
        out += token.text;
        break;
      case 'group':
        out += m[token.index] ?? '';
        break;
      case 'named':
        out += m.groups?.[token.name] ?? '';
        break;
    }
  }
  return out;
}

function postprocess(rule: CompiledRule, value: string): string | null {
  let v = rule.maxLength !== null ? value.slice(0, rule.maxLength) : value;

  if (v.includes(KEY_SEPARATOR)) {
    if (rule.onSeparator === 'reject') return null;
    v = v.replace(/^;+|;+$/g, '').split(KEY_SEPARATOR)[0];
  }

  if (rule.lowercase) v = v.toLowerCase();
  return v.length > 0 ? v : null;
}

/**
 * 不可变分类器：规则在构造时验证，之后不再修改
 */
export class Classifier {
  readonly rules: readonly CompiledRule[];

  constructor(rules: readonly CompiledRule[]) {
    this.rules = Object.freeze([...rules]);
  }

  classify(line: string): Match | null {
    for (const rule of this.rules) {
      let m: RegExpExecArray | null;
      try {
        m = rule.regex.exec(line);
      } catch (err) {
        // 例如超长输入导致的栈溢出，按未命中处理
        log.debug({ rule: rule.index, err: errorMessage(err) }, 'Rule evaluation failed');
        continue;
      }
      if (!m) continue;

      const matched = postprocess(rule, render(rule, m));
      if (matched === null) return null;
      return { prefix: rule.prefix, matched, rule: rule.index };
    }
    return null;
  }
}

export function compileClassifier(specs: readonly ClassificationRuleSpec[]): Classifier {
  return new Classifier(specs.map((spec, i) => compileRule(spec, i)));
}

export function classify(line: string, classifier: Classifier): Match | null {
  return classifier.classify(line);
}

// ============================================================
// 数据报行 → 文本
// ============================================================

const MIN_PRINTABLE = 32;
const MAX_PRINTABLE = 126;

/** 非可打印 ASCII 字节转为 \xHH */
export function asciify(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) {
    if (b >= MIN_PRINTABLE && b <= MAX_PRINTABLE) {
      out += String.fromCharCode(b);
    } else {
      out += `\\x${b.toString(16).padStart(2, '0')}`;
    }
  }
  return out;
}
