import { setTimeout as sleep } from 'node:timers/promises';
import { describe, expect, it, vi } from 'vitest';
import type { Logger } from '../logger.js';
import type { ProgressHandle, ProgressReporter } from '../progress.js';
import { runBounded } from '../runner.js';

const spyLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const range = (length: number): number[] => Array.from({ length }, (_, index) => index);

describe('runBounded', () => {
  it.each([
    [1, 1],
    [5, 1],
    [6, 3],
    [10, 4],
    [3, 8],
  ])('never runs more than the ceiling (%i items, ceiling %i)', async (count, ceiling) => {
    let active = 0;
    let peak = 0;
    const finished: number[] = [];

    const outcomes = await runBounded(
      range(count),
      async (item) => {
        active += 1;
        peak = Math.max(peak, active);
        await sleep(5);
        active -= 1;
        finished.push(item);
        return item * 2;
      },
      { concurrency: ceiling, logger: spyLogger(), describe: (item) => `item ${item}` },
    );

    expect(peak).toBe(Math.min(count, ceiling));
    expect(finished).toHaveLength(count);
    expect(outcomes.map((outcome) => (outcome.ok ? outcome.value : null))).toEqual(range(count).map((n) => n * 2));
  });

  it('starts items in input order', async () => {
    const started: number[] = [];
    await runBounded(
      range(8),
      async (item) => {
        started.push(item);
        await sleep(item % 2 === 0 ? 8 : 1);
      },
      { concurrency: 3, logger: spyLogger(), describe: String },
    );
    expect(started).toEqual(range(8));
  });

  it('isolates and logs failing items', async () => {
    const logger = spyLogger();
    const outcomes = await runBounded(
      ['a', 'b', 'c'],
      async (item) => {
        if (item === 'b') {
          throw new Error('boom');
        }
        return item.toUpperCase();
      },
      { concurrency: 2, logger, describe: (item) => `item ${item}` },
    );

    expect(outcomes.map((outcome) => outcome.ok)).toEqual([true, false, true]);
    const failed = outcomes[1];
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.message).toBe('boom');
      expect(failed.item).toBe('b');
      expect(failed.index).toBe(1);
    }
    expect(logger.error).toHaveBeenCalledWith('item b :: boom');
  });

  it('wraps non-Error rejections', async () => {
    const outcomes = await runBounded(
      [1],
      async () => {
        throw 'plain string';
      },
      { concurrency: 1, logger: spyLogger(), describe: String },
    );
    const [outcome] = outcomes;
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('plain string');
    }
  });

  it('supports nesting with independent ceilings', async () => {
    let innerActive = 0;
    let innerPeak = 0;

    const outcomes = await runBounded(
      range(3),
      async (outer) => {
        const inner = await runBounded(
          range(4),
          async (leaf) => {
            innerActive += 1;
            innerPeak = Math.max(innerPeak, innerActive);
            await sleep(3);
            innerActive -= 1;
            return `${outer}.${leaf}`;
          },
          { concurrency: 2, logger: spyLogger(), describe: String },
        );
        return inner.filter((outcome) => outcome.ok).length;
      },
      { concurrency: 1, logger: spyLogger(), describe: String },
    );

    expect(outcomes.map((outcome) => (outcome.ok ? outcome.value : -1))).toEqual([4, 4, 4]);
    expect(innerPeak).toBe(2);
  });

  it('returns immediately for no items', async () => {
    const handler = vi.fn(async () => 1);
    await expect(runBounded([], handler, { concurrency: 2, logger: spyLogger(), describe: String })).resolves.toEqual([]);
    expect(handler).not.toHaveBeenCalled();
  });

  it('rejects invalid ceilings', async () => {
    const options = { logger: spyLogger(), describe: String };
    await expect(runBounded([1], async () => 1, { ...options, concurrency: 0 })).rejects.toThrow(RangeError);
    await expect(runBounded([1], async () => 1, { ...options, concurrency: 1.5 })).rejects.toThrow(RangeError);
  });

  it('advances a labelled progress bar once per item', async () => {
    const handle: ProgressHandle = { increment: vi.fn(), stop: vi.fn() };
    const progress: ProgressReporter = { track: vi.fn(() => handle), log: vi.fn(), stop: vi.fn() };

    await runBounded(
      range(3),
      async (item) => {
        if (item === 1) {
          throw new Error('nope');
        }
      },
      { concurrency: 2, logger: spyLogger(), describe: String, label: 'Release', progress },
    );

    expect(progress.track).toHaveBeenCalledWith('Release', 3);
    expect(handle.increment).toHaveBeenCalledTimes(3);
    expect(handle.stop).toHaveBeenCalledTimes(1);
  });
});
