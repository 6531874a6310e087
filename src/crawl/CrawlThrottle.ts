import { setTimeout as delay } from 'node:timers/promises';

import type { AppConfig } from '../config.js';

export type CrawlThrottleConfig = Pick<AppConfig, 'minCrawlDelayMs' | 'maxCrawlDelayMs'>;

export interface CrawlThrottleOptions {
  sleep?: (ms: number) => Promise<unknown>;
  random?: () => number;
}

/**
 * Random politeness delay in `[minCrawlDelayMs, maxCrawlDelayMs]` between two
 * fetches of the same domain. The first fetch of a domain is not delayed
 * unless the domain was marked visited beforehand.
 */
export class CrawlThrottle {
  private readonly config: CrawlThrottleConfig;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly random: () => number;
  private readonly visited = new Set<string>();

  constructor(config: CrawlThrottleConfig, options: CrawlThrottleOptions = {}) {
    this.config = config;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
    this.random = options.random ?? Math.random;
  }

  nextDelay(): number {
    const { minCrawlDelayMs, maxCrawlDelayMs } = this.config;
    return minCrawlDelayMs + Math.floor(this.random() * (maxCrawlDelayMs - minCrawlDelayMs + 1));
  }

  /** Records a request made outside the throttle, such as sitemap discovery. */
  markVisited(domain: string): void {
    this.visited.add(domain);
  }

  /** Resolves with the delay that was waited. */
  async wait(domain: string): Promise<number> {
    if (!this.visited.has(domain)) {
      this.visited.add(domain);
      return 0;
    }
    const ms = this.nextDelay();
    if (ms > 0) {
      await this.sleep(ms);
    }
    return ms;
  }
}
