/**
 * 采集 Agent
 *
 * 每个监听端点一个 UDP socket。收到的数据报按 '\n' 拆行，逐行：
 *   1. 分类；未命中 → unmatched 计数，结束
 *   2. keyFor(rule.prefix, matched, source, now)
 *   3. sink.increment(key, ttl)；后端失败只记录日志并丢弃该事件
 *
 * 在途自增数量受 maxPending 限制，超出时丢弃新行（计入 dropped）。
 */

import { createSocket, type Socket } from 'node:dgram';
import { isIP } from 'node:net';
import { ConfigurationError, errorMessage } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import { asciify } from './classifier';
import { assertKeyField, encodeKey, keyFor, ttlFor } from './keyspace';
import { bindingId, type AgentRules, type ListenBinding } from './rules';
import type { CounterSink } from './sinks';
import { AgentStatistics, StatisticsReporter } from './statistics';

const log = createModuleLogger('agent');

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export interface IngestionAgentOptions {
  rules: AgentRules;
  /** 缺省来源标识；规则文件或单条规则中的 source 优先 */
  sourceId: string;
  sink: CounterSink;
  stats?: AgentStatistics;
  /** 统计报告间隔（秒），0 或缺省表示关闭 */
  statsIntervalSeconds?: number;
  maxPending?: number;
  /** 当前时间（Unix 秒） */
  clock?: () => number;
}

export type LineOutcome = 'unmatched' | 'counted' | 'dropped' | 'backend-error';

export class IngestionAgent {
  readonly stats: AgentStatistics;
  private readonly reporter: StatisticsReporter;
  private readonly sockets: Socket[] = [];
  private readonly inflight = new Set<Promise<unknown>>();
  private readonly clock: () => number;
  private readonly maxPending: number;
  private readonly sourceId: string;
  private running = false;

  constructor(private readonly options: IngestionAgentOptions) {
    this.stats = options.stats ?? new AgentStatistics();
    this.reporter = new StatisticsReporter(this.stats, options.statsIntervalSeconds ?? 0);
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.maxPending = options.maxPending ?? 100;
    this.sourceId = options.rules.source ?? options.sourceId;

    // 来源在构造时校验，运行期的 keyFor 不会再因为 source 失败
    for (const binding of options.rules.bindings) {
      for (const settings of binding.settings) {
        assertKeyField('source', settings.source ?? this.sourceId);
      }
    }
  }

  get pending(): number {
    return this.inflight.size;
  }

  get bindings(): readonly ListenBinding[] {
    return this.options.rules.bindings;
  }

  /**
   * 绑定所有监听端点；任一绑定失败则关闭已绑定的 socket 与 sink，并抛出 ConfigurationError
   */
  async start(): Promise<void> {
    if (this.running) return;

    try {
      for (const binding of this.bindings) {
        this.sockets.push(await this.bind(binding));
      }
    } catch (err) {
      await this.closeSockets();
      await this.options.sink.close?.();
      throw err;
    }

    this.running = true;
    this.reporter.start();
    log.info({ bindings: this.bindings.map(bindingId), source: this.sourceId }, 'Agent started');
  }

  private bind(binding: ListenBinding): Promise<Socket> {
    const id = bindingId(binding);
    const socket = createSocket(isIP(binding.address) === 6 ? 'udp6' : 'udp4');

    return new Promise((resolve, reject) => {
      const onBindError = (err: Error) => {
        socket.close();
        reject(new ConfigurationError(`cannot listen on ${id}: ${err.message}`, { binding: id }));
      };
      socket.once('error', onBindError);
      socket.bind(binding.port, binding.address, () => {
        socket.off('error', onBindError);
        socket.on('error', (err) => log.error({ binding: id, err: err.message }, 'Socket error'));
        socket.on('message', (msg) => {
          this.handleDatagram(binding, msg).catch((e: unknown) =>
            log.error({ binding: id, err: errorMessage(e) }, 'Datagram handler failed'));
        });
        log.debug({ binding: id }, 'Listening for datagrams');
        resolve(socket);
      });
    });
  }

  /**
   * 停止：关闭 socket、停止统计报告，并等待在途自增完成
   */
  async stop(): Promise<void> {
    this.running = false;
    this.reporter.stop();
    await this.closeSockets();
    await Promise.allSettled([...this.inflight]);
    await this.options.sink.close?.();
    log.info({ ...this.stats.snapshot() }, 'Agent stopped');
  }

  private async closeSockets(): Promise<void> {
    const sockets = this.sockets.splice(0);
    await Promise.all(sockets.map(s => new Promise<void>(resolve => s.close(() => resolve()))));
  }

  /**
   * 处理一个数据报；同一数据报内的行顺序处理
   */
  async handleDatagram(binding: ListenBinding, data: Uint8Array): Promise<LineOutcome[]> {
    this.stats.bump('datagrams');
    const outcomes: LineOutcome[] = [];

    let start = 0;
    while (start <= data.length) {
      let end = data.indexOf(NEWLINE, start);
      if (end === -1) end = data.length;

      let lineEnd = end;
      if (lineEnd > start && data[lineEnd - 1] === CARRIAGE_RETURN) lineEnd--;
      if (lineEnd > start) {
        outcomes.push(await this.handleLine(binding, asciify(data.subarray(start, lineEnd))));
      }
      start = end + 1;
    }

    return outcomes;
  }

  async handleLine(binding: ListenBinding, line: string): Promise<LineOutcome> {
    this.stats.bump('linesSeen');

    const match = binding.classifier.classify(line);
    if (!match) {
      this.stats.bump('unmatched');
      return 'unmatched';
    }
    this.stats.bump('matched');

    if (this.inflight.size >= this.maxPending) {
      this.stats.bump('dropped');
      return 'dropped';
    }

    const settings = binding.settings[match.rule];
    const key = encodeKey(keyFor(match.prefix, match.matched, settings.source ?? this.sourceId, this.clock(), settings.ring));

    const started = Date.now();
    const op = this.options.sink.increment(key, ttlFor(settings.ring));
    this.inflight.add(op);
    try {
      await op;
      this.stats.recordIncrement(Date.now() - started);
      return 'counted';
    } catch (err) {
      this.stats.bump('backendErrors');
      log.error({ key, err: errorMessage(err) }, 'Counter increment failed, event dropped');
      return 'backend-error';
    } finally {
      this.inflight.delete(op);
    }
  }
}
