/**
 * 查询端报表
 *
 *   tsx server/report.ts pages <fanout> --prefix=web [--matched=..] [--source=..] [--window=3600] [--by=matched] [--trend] [--prorate]
 *   tsx server/report.ts health <fanout>
 */

import { config } from './core/config';
import { validateConfigOrDie } from './core/config-schema';
import { errorMessage, isTotalizerError } from './core/errors';
import { createModuleLogger, setLogLevel } from './core/logger';
import { FanoutEngine } from './fanout/fanout';
import { checkHealth, formatHealthReport } from './fanout/health';
import { PtrNameResolver } from './fanout/resolver';
import { RkvdnsClient } from './lib/clients/rkvdns.client';
import { formatPagesReport, trendSubWindow } from './reports/pages';
import { AggregationClient, RkvdnsCounterReader } from './totalizer/aggregation';
import { KEY_FIELDS, type KeyField } from './totalizer/keyspace';

const log = createModuleLogger('report');

const USAGE = [
  '用法: tsx server/report.ts pages <fanout> --prefix=<prefix> [--matched=<v>] [--source=<v>] [--window=<s>] [--by=<fields>] [--trend] [--prorate]',
  '      tsx server/report.ts health <fanout>',
];

function option(args: string[], name: string): string | undefined {
  const arg = args.find(a => a.startsWith(`--${name}=`));
  return arg?.slice(name.length + 3);
}

function isKeyField(value: string): value is KeyField {
  return KEY_FIELDS.some(f => f === value);
}

async function main(): Promise<number> {
  setLogLevel(config.app.logLevel);
  validateConfigOrDie(config);
  const [command, fanoutName = config.rkvdns.zone, ...args] = process.argv.slice(2);
  if (!command || !fanoutName) {
    USAGE.forEach(line => console.error(line));
    return 1;
  }

  const dns = { servers: config.fanout.dnsServers, timeoutMs: config.fanout.timeoutMs };
  const engine = new FanoutEngine(new PtrNameResolver(dns));
  const rkvdns = new RkvdnsClient(dns);

  switch (command) {
    case 'health': {
      const report = await checkHealth(engine, rkvdns, fanoutName);
      formatHealthReport(report.rows).forEach(line => console.log(line));
      return report.rows.every(r => r.zoneOk && r.valueOk) ? 0 : 2;
    }

    case 'pages': {
      const prefix = option(args, 'prefix');
      if (!prefix) {
        USAGE.forEach(line => console.error(line));
        return 1;
      }
      const window = Number(option(args, 'window') ?? '3600');
      const by = option(args, 'by')?.split(',');
      const combineBy = by?.filter(isKeyField);
      if (by && combineBy && combineBy.length !== by.length) {
        console.error(`--by 只接受 ${KEY_FIELDS.join(', ')}`);
        return 1;
      }
      const trend = args.includes('--trend');
      // 缺省只计入窗口内的桶；--prorate 按比例计入跨越窗口下沿的桶
      const prorate = args.includes('--prorate');

      const client = new AggregationClient(engine, new RkvdnsCounterReader(rkvdns));
      const result = await client.total(
        [prefix, option(args, 'matched') ?? null, option(args, 'source') ?? null],
        window,
        fanoutName,
        { combineBy, prorate, subWindowSeconds: trend ? trendSubWindow(window) : undefined },
      );
      formatPagesReport(result, { counts: true, trend }).forEach(line => console.log(line));
      for (const f of result.failures) {
        console.error(`${f.endpoint}: ${f.reason} (${f.message})`);
      }
      return 0;
    }

    default:
      USAGE.forEach(line => console.error(line));
      return 1;
  }
}

main()
  .then((code) => { process.exitCode = code; })
  .catch((err) => {
    if (isTotalizerError(err)) {
      log.error(err.toJSON(), err.message);
    } else {
      log.fatal({ err: errorMessage(err) }, 'Report failed');
    }
    process.exitCode = 1;
  });
