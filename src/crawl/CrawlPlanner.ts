import type { AppConfig } from '../config.js';
import type { RunStats } from '../pipeline/RunStats.js';
import type { CrawlOrigin, CrawlPlan, CrawlTask, Fetcher } from '../types.js';
import { canonicaliseUrl, isBlockedDomain, isOnDomain, isValidUrl, normaliseDomain, pathDepth } from '../utils/domain.js';
import { createLogger } from '../utils/logger.js';

import { SitemapParser } from './SitemapParser.js';

const log = createLogger('planner');

const BAND_WIDTH = 100;
const MAX_DEPTH = 99;

export type CrawlPlannerConfig = Pick<
  AppConfig,
  | 'blockedDomains'
  | 'priorityParts'
  | 'fallbackPaths'
  | 'maxFallbackPages'
  | 'maxUrlLength'
  | 'sitemapFilenames'
  | 'maxUrlsPerSitemap'
  | 'maxNestedSitemaps'
>;

/** Index of the first priority part found in the URL path, or `parts.length`. */
export function priorityBand(url: string, parts: readonly string[]): number {
  let path: string;
  try {
    const parsed = new URL(url);
    path = `${parsed.pathname}${parsed.search}`.toLowerCase();
  } catch {
    path = url.toLowerCase();
  }
  const index = parts.findIndex((part) => path.includes(part.toLowerCase()));
  return index === -1 ? parts.length : index;
}

/** Lower runs first: the band dominates, then path depth. */
export function computePriority(url: string, parts: readonly string[]): number {
  return priorityBand(url, parts) * BAND_WIDTH + Math.min(pathDepth(url), MAX_DEPTH);
}

/** Stable: equal priorities keep their discovery order. */
export function rankTasks(urls: readonly string[], origin: CrawlOrigin, parts: readonly string[]): CrawlTask[] {
  return urls
    .map((url, index) => ({ task: { url, priority: computePriority(url, parts), origin }, index }))
    .sort((a, b) => a.task.priority - b.task.priority || a.index - b.index)
    .map(({ task }) => task);
}

export function fallbackFrontier(domain: string, paths: readonly string[]): string[] {
  const root = `https://${domain}/`;
  const urls = [root];
  for (const path of paths) {
    try {
      urls.push(new URL(path, root).toString());
    } catch {
      log.debug(`Skipping malformed fallback path "${path}"`);
    }
  }
  return urls;
}

export class CrawlPlanner {
  private readonly config: CrawlPlannerConfig;
  private readonly sitemaps: SitemapParser;
  private readonly stats: RunStats | undefined;

  constructor(config: CrawlPlannerConfig, fetcher: Fetcher, stats?: RunStats) {
    this.config = config;
    this.sitemaps = new SitemapParser(config, fetcher);
    this.stats = stats;
  }

  async plan(domainInput: string): Promise<CrawlPlan> {
    const domain = normaliseDomain(domainInput);
    if (!domain || isBlockedDomain(domain, this.config.blockedDomains)) {
      log.info(`Skipping blocklisted domain ${domainInput}`);
      return { domain, tasks: [], usedSitemap: false, sitemapUrls: [] };
    }

    const { urls, sitemapUrls } = await this.sitemaps.collectUrls(domain);
    const usedSitemap = urls.length > 0;
    let tasks: CrawlTask[];
    if (usedSitemap) {
      this.stats?.increment('sitemap');
      tasks = rankTasks(urls, 'sitemap', this.config.priorityParts);
      log.info(`${domain}: ${urls.length} sitemap URL(s) from ${sitemapUrls.length} sitemap(s)`);
    } else {
      const frontier = this.dedupe(fallbackFrontier(domain, this.config.fallbackPaths), domain);
      tasks = rankTasks(frontier, 'fallback_heuristic', this.config.priorityParts);
      log.info(`${domain}: no usable sitemap, using ${frontier.length} fallback URL(s)`);
    }

    return {
      domain,
      tasks: tasks.slice(0, this.config.maxFallbackPages),
      usedSitemap,
      sitemapUrls
    };
  }

  private dedupe(urls: readonly string[], domain: string): string[] {
    const seen = new Set<string>();
    const kept: string[] = [];
    for (const url of urls) {
      if (!isValidUrl(url, this.config.maxUrlLength) || !isOnDomain(url, domain)) continue;
      const canonical = canonicaliseUrl(url);
      if (seen.has(canonical)) continue;
      seen.add(canonical);
      kept.push(url);
    }
    return kept;
  }
}
