import type { RunStats } from '../pipeline/RunStats.js';
import type { FetchOptions, FetchResponse, Fetcher } from '../types.js';

/** Records every request, and every failed one, in the run statistics. */
export class CountingFetcher implements Fetcher {
  private readonly inner: Fetcher;
  private readonly stats: RunStats;

  constructor(inner: Fetcher, stats: RunStats) {
    this.inner = inner;
    this.stats = stats;
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResponse> {
    this.stats.increment('http_requests');
    try {
      return await this.inner.fetch(url, options);
    } catch (error) {
      this.stats.increment('http_errors');
      throw error;
    }
  }
}
