import { describe, it, expect } from 'vitest';
import type { AggregationResult } from '../../totalizer/aggregation';
import { formatPagesReport, formatTrend, trendSubWindow } from '../pages';

const result: AggregationResult = {
  totals: { '/b,404': 1, '/a,200': 12, '/c,500': 0 },
  recent: { '/a,200': 3, '/b,404': 1 },
  endpoints: ['r1.example'],
  failures: [],
};

describe('formatPagesReport', () => {
  it('按键排序，跳过零计数，计数右对齐', () => {
    expect(formatPagesReport(result)).toEqual([
      '/a,200     12',
      '/b,404      1',
    ]);
  });

  it('附带趋势列', () => {
    expect(formatPagesReport(result, { trend: true })).toEqual([
      '/a,200     12   0.25',
      '/b,404      1   1.00',
    ]);
  });

  it('只显示趋势', () => {
    expect(formatPagesReport(result, { counts: false, trend: true })).toEqual([
      '/a,200   0.25',
      '/b,404   1.00',
    ]);
  });

  it('键按最长键左对齐', () => {
    const lines = formatPagesReport({ totals: { '/x': 5, '/longer': 2 }, endpoints: [], failures: [] });
    expect(lines).toEqual([
      '/longer      2',
      '/x           5',
    ]);
  });

  it('没有非零计数时输出为空', () => {
    expect(formatPagesReport({ totals: { '/a': 0 }, endpoints: [], failures: [] })).toEqual([]);
  });
});

describe('formatTrend', () => {
  it('保留两位小数，上限 9.99', () => {
    expect(formatTrend(0.5)).toBe('  0.50');
    expect(formatTrend(12.5)).toBe('  9.99');
  });
});

describe('trendSubWindow', () => {
  it('按比例截取报表窗口，至少 1 秒', () => {
    expect(trendSubWindow(3600, 0.25)).toBe(900);
    expect(trendSubWindow(10, 0.25)).toBe(2);
    expect(trendSubWindow(2, 0.25)).toBe(1);
  });
});
