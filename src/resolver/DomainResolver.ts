import type { AppConfig } from '../config.js';
import { describeError, SearchApiError } from '../errors.js';
import type { RunStats } from '../pipeline/RunStats.js';
import { RateGate } from '../search/RateGate.js';
import type { CompanyInput, ResolutionOutcome, SearchHit, SearchProvider } from '../types.js';
import { runWithRetry } from '../utils/backoff.js';
import { normaliseDomain } from '../utils/domain.js';
import { createLogger } from '../utils/logger.js';

import { findBestDomain } from './DomainScorer.js';

const log = createLogger('resolver');

export type ResolverConfig = Pick<
  AppConfig,
  | 'blockedDomains'
  | 'domainScoreThreshold'
  | 'searchMaxRetries'
  | 'searchMinIntervalMs'
  | 'searchBackoffBaseMs'
  | 'searchBackoffMaxMs'
>;

export interface DomainResolverDependencies {
  search: SearchProvider;
  stats?: RunStats;
  /** Workers share one resolver, so its gate is the run-wide search gate. */
  gate?: RateGate;
  sleep?: (ms: number) => Promise<unknown>;
  random?: () => number;
}

export function isRetryableSearchError(error: unknown): boolean {
  if (error instanceof SearchApiError) {
    return error.transient;
  }
  return true;
}

export class DomainResolver {
  private readonly config: ResolverConfig;
  private readonly search: SearchProvider;
  private readonly gate: RateGate;
  private readonly stats: RunStats | undefined;
  private readonly sleep: ((ms: number) => Promise<unknown>) | undefined;
  private readonly random: (() => number) | undefined;

  constructor(config: ResolverConfig, dependencies: DomainResolverDependencies) {
    this.config = config;
    this.search = dependencies.search;
    this.stats = dependencies.stats;
    this.gate = dependencies.gate ?? new RateGate({ minIntervalMs: config.searchMinIntervalMs });
    this.sleep = dependencies.sleep;
    this.random = dependencies.random;
  }

  async resolve(input: CompanyInput): Promise<ResolutionOutcome> {
    const supplied = input.domain ? normaliseDomain(input.domain) : '';
    if (supplied) {
      log.debug(`Using supplied domain ${supplied} for ${input.name}`);
      return {
        kind: 'resolved',
        resolved: { domain: supplied, resolutionMethod: 'supplied', confidence: 100 }
      };
    }

    const result = await runWithRetry<SearchHit[]>(
      async () => {
        await this.gate.acquire();
        this.stats?.increment('search_requests');
        return this.search.search(input.name);
      },
      {
        maxAttempts: this.config.searchMaxRetries,
        baseDelayMs: this.config.searchBackoffBaseMs,
        maxDelayMs: this.config.searchBackoffMaxMs
      },
      {
        isRetryable: isRetryableSearchError,
        onRetry: (attempt, delayMs, error) =>
          log.warn(
            `Search for "${input.name}" failed (attempt ${attempt + 1}/${this.config.searchMaxRetries}), retrying in ${delayMs}ms: ${describeError(error)}`
          ),
        ...(this.sleep ? { sleep: this.sleep } : {}),
        ...(this.random ? { random: this.random } : {})
      }
    );

    if (result.phase === 'failed') {
      this.stats?.increment('google_error');
      const error = describeError(result.lastError);
      log.error(`Search failed for "${input.name}" after ${result.attempt + 1} attempt(s): ${error}`);
      return { kind: 'search_failed', error };
    }

    const hits = result.value;
    if (hits.length === 0) {
      log.warn(`No search results for "${input.name}"`);
      return { kind: 'no_results' };
    }

    const best = findBestDomain(input.name, hits, this.config.blockedDomains);
    if (!best) {
      log.info(`Every search result for "${input.name}" is blocklisted`);
      return { kind: 'unclear', bestScore: 0 };
    }
    if (best.score < this.config.domainScoreThreshold) {
      log.info(
        `Domain score too low (${best.score} < ${this.config.domainScoreThreshold}): ${best.host} for "${input.name}"`
      );
      return { kind: 'unclear', bestScore: best.score, bestHost: best.host };
    }

    log.info(`Resolved "${input.name}" to ${best.host} (score ${best.score})`);
    return {
      kind: 'resolved',
      resolved: { domain: best.host, resolutionMethod: 'searched', confidence: best.score }
    };
  }
}
