/**
 * MultiManager - one read or write applied across many arrays at once
 */

import type { Empty, NDArray } from './types.js';
import type { Selector } from './core/selection.js';
import type { RemoteArray } from './RemoteArray.js';
import { FanoutError, InvalidSelectionError } from './errors.js';
import { Semaphore } from './utils/semaphore.js';

export interface MultiManagerOptions {
  /** Targets worked on at the same time */
  maxWorkers?: number;
}

/**
 * The index terms for a fan-out: one list applied to every target, or one
 * list per target
 */
export type FanoutExpression = readonly Selector[] | { perTarget: readonly (readonly Selector[])[] };

type Operation = 'read' | 'write';

export class MultiManager {
  readonly targets: readonly RemoteArray[];
  private readonly _maxWorkers: number;

  constructor(targets: readonly RemoteArray[], options: MultiManagerOptions = {}) {
    const { maxWorkers = 16 } = options;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new Error('maxWorkers must be a positive integer');
    }
    this.targets = [...targets];
    this._maxWorkers = maxWorkers;
  }

  /**
   * Read from every target; results are in target order
   */
  async read(expr: FanoutExpression = []): Promise<(NDArray | Empty)[]> {
    const terms = this.termsPerTarget(expr);
    return this.run('read', (target, i, signal) => target.readAt(terms[i], { signal }));
  }

  /**
   * Write `values[i]` to target `i`. Writes that completed before a failure
   * are not undone.
   */
  async write(expr: FanoutExpression, values: readonly (NDArray | Empty)[]): Promise<void> {
    const terms = this.termsPerTarget(expr);
    if (values.length !== this.targets.length) {
      throw new InvalidSelectionError(
        `Got ${values.length} values for ${this.targets.length} targets`
      );
    }
    await this.run('write', (target, i, signal) => target.writeAt(terms[i], values[i], { signal }));
  }

  private termsPerTarget(expr: FanoutExpression): (readonly Selector[])[] {
    if ('perTarget' in expr) {
      if (expr.perTarget.length !== this.targets.length) {
        throw new InvalidSelectionError(
          `Got ${expr.perTarget.length} selections for ${this.targets.length} targets`
        );
      }
      return [...expr.perTarget];
    }
    return this.targets.map(() => expr);
  }

  /**
   * Run one task per target, at most `maxWorkers` at a time. The first
   * failure aborts the shared signal so queued tasks never start, and the
   * call rejects at once; tasks still in flight finish unobserved.
   */
  private async run<T>(
    operation: Operation,
    task: (target: RemoteArray, index: number, signal: AbortSignal) => Promise<T>
  ): Promise<T[]> {
    const sem = new Semaphore(this._maxWorkers);
    const controller = new AbortController();
    const results: T[] = new Array(this.targets.length);
    const state: { failure?: FanoutError } = {};

    let fail: (err: FanoutError) => void = () => {};
    const failed = new Promise<never>((_, reject) => {
      fail = reject;
    });

    const settled = Promise.all(
      this.targets.map((target, i) =>
        sem.withPermit(async () => {
          if (controller.signal.aborted) return;
          try {
            results[i] = await task(target, i, controller.signal);
          } catch (err: unknown) {
            if (state.failure === undefined) {
              state.failure = new FanoutError(operation, i, err);
              controller.abort();
              fail(state.failure);
            }
          }
        })
      )
    );

    await Promise.race([settled, failed]);
    return results;
  }
}
