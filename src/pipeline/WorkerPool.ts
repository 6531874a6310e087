import { PromisePool } from '@supercharge/promise-pool';

import { describeError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('pool');

export interface WorkerPoolOptions {
  concurrency: number;
  /** How long in-flight items may keep running after an abort. */
  drainTimeoutMs: number;
  signal?: AbortSignal;
}

export interface WorkerPoolOutcome<R> {
  /** In completion order. */
  results: R[];
  /** Items that never started, plus in-flight items the drain gave up on. */
  interrupted: number;
  failed: number;
  aborted: boolean;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Once the
 * signal aborts no further item starts; items already running get
 * `drainTimeoutMs` to finish.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  options: WorkerPoolOptions
): Promise<WorkerPoolOutcome<R>> {
  const { signal } = options;
  const results: R[] = [];
  let started = 0;
  let settled = 0;
  let failed = 0;

  const execution = PromisePool.withConcurrency(Math.max(1, options.concurrency))
    .for(items)
    .handleError((error) => {
      failed += 1;
      log.error(`Worker failed: ${describeError(error)}`);
    })
    .process(async (item, _index, pool) => {
      if (signal?.aborted) {
        pool.stop();
        return;
      }
      started += 1;
      try {
        results.push(await worker(item));
      } finally {
        settled += 1;
      }
    });

  let drainTimer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;
  const drained = await new Promise<boolean>((resolve, reject) => {
    execution.then(() => resolve(true), reject);
    if (signal) {
      onAbort = () => {
        log.warn(`Run aborted, waiting up to ${options.drainTimeoutMs}ms for ${started - settled} in-flight item(s)`);
        drainTimer = setTimeout(() => resolve(false), options.drainTimeoutMs);
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }
  }).finally(() => {
    clearTimeout(drainTimer);
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  });

  const inFlight = drained ? 0 : started - settled;
  return {
    results: results.slice(),
    interrupted: items.length - started + inFlight,
    failed,
    aborted: signal?.aborted ?? false
  };
}
