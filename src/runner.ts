import pLimit from 'p-limit';
import { toError } from './errors.js';
import type { Logger } from './logger.js';
import type { ProgressReporter } from './progress.js';

export interface RunOptions<I> {
  readonly concurrency: number;
  readonly logger: Logger;
  /**
   * Names an item in failure log lines.
   */
  readonly describe: (item: I) => string;
  readonly label?: string;
  readonly progress?: ProgressReporter;
}

interface OutcomeBase<I> {
  readonly item: I;
  readonly index: number;
}

export type Outcome<I, R> =
  | (OutcomeBase<I> & { readonly ok: true; readonly value: R })
  | (OutcomeBase<I> & { readonly ok: false; readonly error: Error });

/**
 * Runs `handler` over `items` with at most `concurrency` invocations in flight.
 *
 * Items start in input order; they may finish in any order. A failing handler
 * is logged and recorded as a failed outcome, and never cancels the others.
 * Every call owns its limiter, so a handler may call `runBounded` again.
 */
export const runBounded = async <I, R>(
  items: readonly I[],
  handler: (item: I, index: number) => Promise<R>,
  options: RunOptions<I>,
): Promise<Outcome<I, R>[]> => {
  const { concurrency, logger, describe } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const limit = pLimit(concurrency);
  const bar = options.label ? options.progress?.track(options.label, items.length) : undefined;

  const settle = async (item: I, index: number): Promise<Outcome<I, R>> => {
    try {
      const value = await handler(item, index);
      return { item, index, ok: true, value };
    } catch (error) {
      const failure = toError(error);
      logger.error(`${describe(item)} :: ${failure.message}`);
      return { item, index, ok: false, error: failure };
    } finally {
      bar?.increment();
    }
  };

  try {
    return await Promise.all(items.map((item, index) => limit(() => settle(item, index))));
  } finally {
    bar?.stop();
  }
};
