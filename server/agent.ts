/**
 * 采集 Agent 启动入口
 *
 *   TOTALIZER_RULES_FILE=config/agent.rules.json tsx server/agent.ts
 *
 * 测试模式（TOTALIZER_TEST_MODE=true）下不连接 Redis，计数键直接打印到 stdout。
 */

import { createModuleLogger, setLogLevel } from './core/logger';
import { config } from './core/config';
import { validateConfigOrDie } from './core/config-schema';
import { RedisClientManager } from './lib/clients/redis.client';
import { IngestionAgent } from './totalizer/agent';
import { loadAgentRules, type AgentRules } from './totalizer/rules';
import { ConsoleCounterSink, RedisCounterSink, type CounterSink } from './totalizer/sinks';

const log = createModuleLogger('main');

async function createSink(): Promise<CounterSink> {
  if (config.agent.testMode) {
    log.info('Test mode: counter keys are printed, Redis is not used');
    return new ConsoleCounterSink();
  }
  const redis = new RedisClientManager();
  await redis.initialize();
  return new RedisCounterSink(redis);
}

async function startIngestion(rules: AgentRules, sink: CounterSink): Promise<IngestionAgent> {
  const agent = new IngestionAgent({
    rules,
    sourceId: config.agent.sourceId,
    sink,
    statsIntervalSeconds: config.agent.statsIntervalSeconds,
    maxPending: config.agent.maxPending,
  });
  await agent.start();
  return agent;
}

async function startAgent() {
  setLogLevel(config.app.logLevel);
  validateConfigOrDie(config);

  const rules = await loadAgentRules(config.agent.rulesFile);
  const sink = await createSink();
  // Redis 连接会让进程一直存活，启动失败时关闭 sink
  const agent = await startIngestion(rules, sink).catch(async (err: unknown) => {
    await sink.close?.();
    throw err;
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.debug(`Received ${signal}, shutting down gracefully...`);
    // 强制超时退出，防止后端自增永远不返回
    const force = setTimeout(() => {
      log.fatal('Forced shutdown after timeout');
      process.exit(1);
    }, 10_000);
    force.unref();
    agent.stop()
      .then(() => process.exit(0))
      .catch((err) => {
        log.fatal({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startAgent().catch((err) => {
  log.fatal({ err }, 'Agent startup failed');
  process.exitCode = 1;
});
