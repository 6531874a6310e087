import fetch, { type Response } from 'node-fetch';
import { z } from 'zod';

import { SearchApiError } from '../errors.js';
import type { FetchImpl } from '../fetch/HttpFetcher.js';
import type { SearchHit, SearchProvider } from '../types.js';
import { CacheManager } from '../utils/CacheManager.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('search');

const ENDPOINT = 'https://www.googleapis.com/customsearch/v1';

const customSearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        link: z.string().optional(),
        formattedUrl: z.string().optional(),
        title: z.string().optional(),
        snippet: z.string().optional()
      })
    )
    .optional()
});

export interface ProgrammableSearchClientOptions {
  apiKey: string;
  cx: string;
  resultsPerQuery?: number;
  language?: string;
  timeoutMs?: number;
  fetchImpl?: FetchImpl;
  cache?: CacheManager<SearchHit[]>;
}

/** A status the API may answer differently on a later attempt. */
export function isTransientStatus(status: number): boolean {
  return status === 403 || status === 408 || status === 429 || status >= 500;
}

/**
 * Google Programmable Search (Custom Search JSON API). Issues exactly one HTTP
 * call per uncached query; rate limiting and retries belong to the caller.
 */
export class ProgrammableSearchClient implements SearchProvider {
  private readonly apiKey: string;
  private readonly cx: string;
  private readonly resultsPerQuery: number;
  private readonly language: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchImpl;
  private readonly cache: CacheManager<SearchHit[]>;

  constructor(options: ProgrammableSearchClientOptions) {
    this.apiKey = options.apiKey;
    this.cx = options.cx;
    this.resultsPerQuery = Math.min(10, Math.max(1, options.resultsPerQuery ?? 10));
    this.language = options.language ?? 'en';
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.cache = options.cache ?? new CacheManager<SearchHit[]>({ maxSize: 5_000 });
  }

  async search(query: string): Promise<SearchHit[]> {
    const normalized = query.trim();
    if (!normalized) {
      return [];
    }
    const cacheKey = normalized.toLowerCase();
    const cached = this.cache.get(cacheKey);
    if (cached) {
      log.debug(`Cache hit for "${normalized}"`);
      return cached;
    }

    const url = new URL(ENDPOINT);
    url.searchParams.set('key', this.apiKey);
    url.searchParams.set('cx', this.cx);
    url.searchParams.set('q', normalized);
    url.searchParams.set('num', String(this.resultsPerQuery));
    url.searchParams.set('lr', `lang_${this.language}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new SearchApiError(`Search request failed for "${normalized}"`, { transient: true, cause: error });
    }

    if (!response.ok) {
      const payload = await response.text().catch(() => '');
      throw new SearchApiError(
        `Search API error ${response.status} ${response.statusText} for "${normalized}": ${payload.slice(0, 200)}`,
        { status: response.status, transient: isTransientStatus(response.status) }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SearchApiError(`Malformed search response for "${normalized}"`, { transient: false, cause: error });
    }
    const parsed = customSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchApiError(`Unexpected search response shape for "${normalized}"`, {
        transient: false,
        cause: parsed.error
      });
    }
    const json = parsed.data;

    const hits: SearchHit[] = [];
    for (const item of json.items ?? []) {
      const link = item.link ?? item.formattedUrl ?? '';
      if (!link) continue;
      hits.push({ url: link, title: item.title ?? '', snippet: item.snippet ?? '' });
    }
    log.debug(`"${normalized}" returned ${hits.length} results`);
    this.cache.set(cacheKey, hits);
    return hits;
  }
}
