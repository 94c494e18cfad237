/**
 * 文本报表：每个组合键一行，按键排序，只列出非零计数
 *
 *   /a,200   2  1.00
 *   /b,404   1  1.00
 */

import { config } from '../core/config';
import { trends, type AggregationResult } from '../totalizer/aggregation';

export interface PagesReportOptions {
  counts?: boolean;
  trend?: boolean;
}

const COUNT_WIDTH = 6;
const TREND_WIDTH = 6;
const TREND_CAP = 9.99;

/** 趋势子窗口（秒）：报表窗口乘以比例，至少 1 秒 */
export function trendSubWindow(windowSeconds: number, fraction: number = config.report.trendFraction): number {
  return Math.max(1, Math.floor(windowSeconds * fraction));
}

export function formatTrend(ratio: number): string {
  return Math.min(ratio, TREND_CAP).toFixed(2).padStart(TREND_WIDTH);
}

export function formatPagesReport(result: AggregationResult, options: PagesReportOptions = {}): string[] {
  const showCounts = options.counts ?? true;
  const showTrend = options.trend ?? false;

  const rows = Object.entries(result.totals)
    .filter(([, n]) => n !== 0)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (rows.length === 0) return [];

  const width = Math.max(...rows.map(([k]) => k.length));
  const ratios = showTrend ? trends(result) : {};

  return rows.map(([key, n]) => {
    let line = key.padEnd(width);
    if (showCounts) line += ` ${String(n).padStart(COUNT_WIDTH)}`;
    if (showTrend) line += ` ${formatTrend(ratios[key] ?? 0)}`;
    return line.trimEnd();
  });
}
