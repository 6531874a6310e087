import { setTimeout as delay } from 'node:timers/promises';

export interface RateGateOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Single-slot gate shared by every worker: callers queue behind each other and
 * each one is released at least `minIntervalMs` after the previous release.
 */
export class RateGate {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private lastReleaseAt = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateGateOptions) {
    this.minIntervalMs = options.minIntervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  acquire(): Promise<void> {
    const turn = this.tail.then(async () => {
      const wait = this.lastReleaseAt + this.minIntervalMs - this.now();
      if (wait > 0) {
        await this.sleep(wait);
      }
      this.lastReleaseAt = this.now();
    });
    // a rejected sleep must not wedge later callers
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire();
    return operation();
  }
}
