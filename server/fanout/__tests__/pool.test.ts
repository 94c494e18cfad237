import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '../../core/errors';
import { mapWithConcurrency } from '../pool';

function delay(ms: number) {
  return new Promise<void>(resolve => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('同时进行的任务不超过上限，结果保持输入顺序', async () => {
    let active = 0;
    let peak = 0;
    const items = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

    const out = await mapWithConcurrency(items, 3, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await delay(12 - n);
      active--;
      return n * 2;
    });

    expect(out).toEqual([2, 4, 6, 8, 10, 12, 14, 16, 18, 20]);
    expect(peak).toBe(3);
  });

  it('任务失败后不再启动新任务', async () => {
    const started: number[] = [];
    const run = mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
      started.push(n);
      if (n === 2) throw new Error('read failed');
      await delay(5);
      return n;
    });

    await expect(run).rejects.toThrow('read failed');
    await delay(20);
    expect(started).toEqual([1, 2]);
  });

  it('signal 已 abort 时不执行任何任务', async () => {
    const fn = vi.fn(async (n: number) => n);
    const controller = new AbortController();
    controller.abort();

    await expect(mapWithConcurrency([1, 2], 2, fn, controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    expect(fn).not.toHaveBeenCalled();
  });

  it('空输入', async () => {
    await expect(mapWithConcurrency([], 4, async n => n)).resolves.toEqual([]);
  });

  it('非法上限', async () => {
    await expect(mapWithConcurrency([1], 0, async n => n)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
