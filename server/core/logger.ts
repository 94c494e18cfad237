/**
 * Fleet Totalizer：统一日志框架
 * 结构化日志：开发环境彩色单行输出，生产环境 JSON 行输出
 *
 * 使用方式：
 *   import { createModuleLogger } from '../core/logger';
 *   const log = createModuleLogger('agent');
 *   log.info({ binding }, 'Listening for datagrams');
 *   log.error({ key, err }, 'Counter increment failed, event dropped');
 */

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

interface LogEntry {
  level: LogLevel;
  module: string;
  timestamp: string;
  message: string;
  [key: string]: unknown;
}

interface LoggerOptions {
  /** 固定级别；缺省时跟随全局级别 */
  level?: LogLevel;
  module?: string;
  pretty?: boolean;
}

type LogData = Record<string, unknown> | string;
type LogListener = (entry: LogEntry) => void;

const SEVERITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const COLOR: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const RESET = '\x1b[0m';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(SEVERITY, value);
}

// ============================================
// 进程级状态
// ============================================

interface LoggerState {
  level: LogLevel;
  recent: LogEntry[];
  capacity: number;
  listeners: Set<LogListener>;
}

// logger 在 config 之前加载，这里直接读取 process.env
const state: LoggerState = {
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
  recent: [],
  capacity: Math.max(10, parseInt(process.env.LOG_BUFFER_SIZE || '1000', 10) || 1000),
  listeners: new Set(),
};

function remember(entry: LogEntry): void {
  state.recent.push(entry);
  if (state.recent.length > state.capacity) {
    state.recent.splice(0, state.recent.length - state.capacity);
  }
  for (const listener of state.listeners) {
    try {
      listener(entry);
    } catch {
      // 监听器异常不影响日志输出
    }
  }
}

function streamFor(level: LogLevel): NodeJS.WriteStream {
  return SEVERITY[level] >= SEVERITY.error ? process.stderr : process.stdout;
}

/** (data, message) 两种调用形式归一为 消息 + 附加字段 */
function normalize(data: LogData, message: unknown): { msg: string; fields: Record<string, unknown> } {
  if (typeof data !== 'string') {
    return { msg: message === undefined ? '' : String(message), fields: data };
  }
  if (message === undefined) return { msg: data, fields: {} };
  if (typeof message === 'string') return { msg: `${data} ${message}`, fields: {} };
  const err = message instanceof Error ? { message: message.message, stack: message.stack } : message;
  return { msg: data, fields: { err } };
}

function renderFields(fields: Record<string, unknown>): string {
  if (Object.keys(fields).length === 0) return '';
  const { err, ...rest } = fields;
  if (!(err instanceof Error)) return ` ${JSON.stringify(fields)}`;
  const tail = Object.keys(rest).length > 0 ? `\n  ${JSON.stringify(rest)}` : '';
  return `\n  ${err.stack || err.message}${tail}`;
}

// ============================================
// Logger
// ============================================

class Logger {
  private readonly fixedLevel: LogLevel | null;
  private readonly module: string;
  private readonly pretty: boolean;

  constructor(options: LoggerOptions = {}) {
    this.fixedLevel = options.level ?? null;
    this.module = options.module || 'totalizer';
    this.pretty = options.pretty ?? process.env.NODE_ENV !== 'production';
  }

  static setGlobalLevel(level: LogLevel): void {
    state.level = level;
  }

  static addListener(fn: LogListener): () => void {
    state.listeners.add(fn);
    return () => {
      state.listeners.delete(fn);
    };
  }

  static getRecentLogs(count = 100): LogEntry[] {
    return state.recent.slice(-count);
  }

  /** 子日志器，模块名为 parent:sub */
  child(subModule: string): Logger {
    return new Logger({ module: `${this.module}:${subModule}`, pretty: this.pretty, level: this.fixedLevel ?? undefined });
  }

  enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.fixedLevel ?? state.level];
  }

  trace(data: LogData, message?: unknown): void {
    this.write('trace', data, message);
  }

  debug(data: LogData, message?: unknown): void {
    this.write('debug', data, message);
  }

  info(data: LogData, message?: unknown): void {
    this.write('info', data, message);
  }

  warn(data: LogData, message?: unknown): void {
    this.write('warn', data, message);
  }

  error(data: LogData, message?: unknown): void {
    this.write('error', data, message);
  }

  fatal(data: LogData, message?: unknown): void {
    this.write('fatal', data, message);
  }

  private write(level: LogLevel, data: LogData, message: unknown): void {
    if (!this.enabled(level)) return;

    const { msg, fields } = normalize(data, message);
    const timestamp = new Date().toISOString();
    const entry: LogEntry = { ...fields, level, module: this.module, timestamp, message: msg };
    remember(entry);

    if (!this.pretty) {
      streamFor(level).write(`${JSON.stringify(entry)}\n`);
      return;
    }
    const time = timestamp.slice(11, 23);
    const tag = level.toUpperCase().padEnd(5);
    streamFor(level).write(`${COLOR[level]}${time} ${tag}${RESET} [${this.module}] ${msg}${renderFields(fields)}\n`);
  }
}

// ============================================
// 导出 API
// ============================================

export function createModuleLogger(module: string): Logger {
  return new Logger({ module });
}

export function setLogLevel(level: LogLevel): void {
  Logger.setGlobalLevel(level);
}

export function addLogListener(fn: LogListener): () => void {
  return Logger.addListener(fn);
}

/** 最近的日志条目（诊断用） */
export function getRecentLogs(count?: number): LogEntry[] {
  return Logger.getRecentLogs(count);
}

export { Logger, isLogLevel };
export type { LogLevel, LogEntry };
