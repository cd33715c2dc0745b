import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_PARALLEL_LIMIT, getParallelLimit, runWithConcurrency } from './parallel';

describe('getParallelLimit', () => {
  afterEach(() => {
    delete process.env.RPYFMT_PARALLEL_LIMIT;
  });

  it('reads RPYFMT_PARALLEL_LIMIT', () => {
    process.env.RPYFMT_PARALLEL_LIMIT = '7';
    expect(getParallelLimit()).toBe(7);
  });

  it('falls back to the default for missing or invalid values', () => {
    expect(getParallelLimit()).toBe(DEFAULT_PARALLEL_LIMIT);
    process.env.RPYFMT_PARALLEL_LIMIT = 'lots';
    expect(getParallelLimit()).toBe(DEFAULT_PARALLEL_LIMIT);
    process.env.RPYFMT_PARALLEL_LIMIT = '0';
    expect(getParallelLimit()).toBe(DEFAULT_PARALLEL_LIMIT);
  });
});

describe('runWithConcurrency', () => {
  it('returns results in item order whatever the finishing order', async () => {
    const delays = [30, 5, 15, 0];
    const results = await runWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('keeps at most `limit` tasks in flight', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
    });

    expect(peak).toBe(3);
  });

  it('handles an empty list', async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
