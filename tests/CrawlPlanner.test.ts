import { gzipSync } from 'node:zlib';

import { describe, expect, it } from 'vitest';

import { createConfig } from '../src/config.js';
import { CrawlPlanner, computePriority, rankTasks } from '../src/crawl/CrawlPlanner.js';
import { CrawlThrottle } from '../src/crawl/CrawlThrottle.js';
import { decodeSitemapBody, extractRobotsSitemaps, parseSitemap } from '../src/crawl/SitemapParser.js';
import { RunStats } from '../src/pipeline/RunStats.js';

import { FakeFetcher, sitemapIndex, urlset } from './helpers/fakes.js';

describe('parseSitemap', () => {
  it('reads <loc> entries up to the limit', () => {
    const xml = urlset(['https://acme.example/a', 'https://acme.example/b', 'https://acme.example/c']);
    expect(parseSitemap(xml, 2)).toEqual({ kind: 'urlset', urls: ['https://acme.example/a', 'https://acme.example/b'] });
  });

  it('recognises sitemap indexes', () => {
    const xml = sitemapIndex(['https://acme.example/pages.xml']);
    expect(parseSitemap(xml, 10)).toEqual({ kind: 'index', sitemaps: ['https://acme.example/pages.xml'] });
  });

  it('treats malformed XML and non-XML content as invalid', () => {
    expect(parseSitemap('<urlset><url><loc>https://acme.example/</loc></urlset>', 10).kind).toBe('invalid');
    expect(parseSitemap('<html><body>Not found</body></html>', 10).kind).toBe('invalid');
    expect(parseSitemap('', 10).kind).toBe('invalid');
  });

  it('inflates gzip bodies', () => {
    const xml = urlset(['https://acme.example/contact']);
    expect(decodeSitemapBody({ body: '', bytes: gzipSync(xml) })).toBe(xml);
    expect(decodeSitemapBody({ body: xml })).toBe(xml);
  });

  it('stops inflating once the output passes the size limit', () => {
    const bytes = gzipSync('a'.repeat(4_096));
    expect(() => decodeSitemapBody({ body: '', bytes }, 1_024)).toThrow(RangeError);
    expect(decodeSitemapBody({ body: '', bytes }, 8_192)).toHaveLength(4_096);
  });

  it('reads Sitemap lines from robots.txt', () => {
    const robots = 'User-agent: *\nDisallow: /admin\nSitemap: https://acme.example/map.xml\r\nsitemap: /other.xml';
    expect(extractRobotsSitemaps(robots)).toEqual(['https://acme.example/map.xml', '/other.xml']);
  });
});

describe('computePriority', () => {
  const parts = ['contact', 'about', 'impressum'];

  it('ranks by priority band, then path depth', () => {
    expect(computePriority('https://acme.example/contact', parts)).toBe(1);
    expect(computePriority('https://acme.example/en/about/team', parts)).toBe(103);
    expect(computePriority('https://acme.example/', parts)).toBe(300);
    expect(computePriority('https://acme.example/products/widgets', parts)).toBe(302);
  });

  it('keeps discovery order between equal priorities', () => {
    const tasks = rankTasks(['https://acme.example/b', 'https://acme.example/a', 'https://acme.example/contact'], 'sitemap', parts);
    expect(tasks.map((task) => task.url)).toEqual([
      'https://acme.example/contact',
      'https://acme.example/b',
      'https://acme.example/a'
    ]);
  });
});

describe('CrawlPlanner', () => {
  const config = createConfig({ blockedDomains: new Set(['blocked.example']) });

  it('plans contact pages before product pages from the sitemap', async () => {
    const fetcher = new FakeFetcher({
      'https://acme.example/sitemap.xml': urlset([
        'https://acme.example/products',
        'https://acme.example/contact',
        'https://www.acme.example/contact/',
        'https://other.example/contact',
        'mailto:info@acme.example'
      ])
    });
    const stats = new RunStats();
    const plan = await new CrawlPlanner(config, fetcher, stats).plan('acme.example');

    expect(plan.usedSitemap).toBe(true);
    expect(plan.sitemapUrls).toEqual(['https://acme.example/sitemap.xml']);
    expect(plan.tasks).toEqual([
      { url: 'https://acme.example/contact', priority: 1, origin: 'sitemap' },
      { url: 'https://acme.example/products', priority: 1001, origin: 'sitemap' }
    ]);
    expect(stats.snapshot().counters.sitemap).toBe(1);
  });

  it('produces no tasks and no requests for a blocklisted domain', async () => {
    const fetcher = new FakeFetcher();
    const plan = await new CrawlPlanner(config, fetcher).plan('www.blocked.example');
    expect(plan.tasks).toEqual([]);
    expect(plan.usedSitemap).toBe(false);
    expect(fetcher.requests).toEqual([]);
  });

  it('falls back to well-known paths when no sitemap exists', async () => {
    const fetcher = new FakeFetcher();
    const plan = await new CrawlPlanner(createConfig({ maxFallbackPages: 3 }), fetcher).plan('acme.example');
    expect(plan.usedSitemap).toBe(false);
    expect(plan.tasks).toEqual([
      { url: 'https://acme.example/contact', priority: 1, origin: 'fallback_heuristic' },
      { url: 'https://acme.example/contact-us', priority: 1, origin: 'fallback_heuristic' },
      { url: 'https://acme.example/about', priority: 101, origin: 'fallback_heuristic' }
    ]);
    expect(fetcher.requests).toEqual([
      'https://acme.example/sitemap.xml',
      'https://acme.example/sitemap_index.xml',
      'https://acme.example/sitemap-index.xml',
      'https://acme.example/sitemap1.xml',
      'https://acme.example/robots.txt'
    ]);
  });

  it('follows Sitemap lines in robots.txt on the same host', async () => {
    const fetcher = new FakeFetcher({
      'https://acme.example/robots.txt': 'User-agent: *\nSitemap: https://acme.example/custom-map.xml\nSitemap: https://cdn.other.example/map.xml',
      'https://acme.example/custom-map.xml': urlset(['https://acme.example/kontakt'])
    });
    const plan = await new CrawlPlanner(config, fetcher).plan('acme.example');
    expect(plan.tasks.map((task) => task.url)).toEqual(['https://acme.example/kontakt']);
    expect(plan.sitemapUrls).toEqual(['https://acme.example/custom-map.xml']);
    expect(fetcher.requests).not.toContain('https://cdn.other.example/map.xml');
  });

  it('caps nested sitemaps, entries per sitemap and tasks per company', async () => {
    const fetcher = new FakeFetcher({
      'https://acme.example/sitemap.xml': sitemapIndex([
        'https://acme.example/pages-1.xml',
        'https://acme.example/pages-2.xml'
      ]),
      'https://acme.example/pages-1.xml': urlset([
        'https://acme.example/a',
        'https://acme.example/b',
        'https://acme.example/c'
      ]),
      'https://acme.example/pages-2.xml': urlset(['https://acme.example/d'])
    });
    const capped = createConfig({ maxNestedSitemaps: 1, maxUrlsPerSitemap: 2, maxFallbackPages: 5 });
    const plan = await new CrawlPlanner(capped, fetcher).plan('acme.example');
    expect(plan.tasks.map((task) => task.url)).toEqual(['https://acme.example/a', 'https://acme.example/b']);
    expect(fetcher.requests).not.toContain('https://acme.example/pages-2.xml');

    const single = await new CrawlPlanner(createConfig({ maxFallbackPages: 1 }), fetcher).plan('acme.example');
    expect(single.tasks).toHaveLength(1);
  });

  it('plans the same domain identically every time', async () => {
    const fetcher = new FakeFetcher({
      'https://acme.example/sitemap.xml': urlset([
        'https://acme.example/news/2024',
        'https://acme.example/about',
        'https://acme.example/privacy',
        'https://acme.example/contact'
      ])
    });
    const planner = new CrawlPlanner(config, fetcher);
    const first = await planner.plan('acme.example');
    const second = await planner.plan('acme.example');
    expect(second).toEqual(first);
    expect(first.tasks.map((task) => task.url)).toEqual([
      'https://acme.example/contact',
      'https://acme.example/about',
      'https://acme.example/privacy',
      'https://acme.example/news/2024'
    ]);
  });
});

describe('CrawlThrottle', () => {
  it('waits a random delay between fetches of the same domain only', async () => {
    const sleeps: number[] = [];
    const throttle = new CrawlThrottle(
      { minCrawlDelayMs: 500, maxCrawlDelayMs: 2_000 },
      {
        sleep: async (ms) => {
          sleeps.push(ms);
        },
        random: () => 0.5
      }
    );
    expect(await throttle.wait('acme.example')).toBe(0);
    expect(await throttle.wait('other.example')).toBe(0);
    expect(await throttle.wait('acme.example')).toBe(1_250);
    expect(sleeps).toEqual([1_250]);
  });

  it('delays the first page fetch of a domain marked as visited', async () => {
    const sleeps: number[] = [];
    const throttle = new CrawlThrottle(
      { minCrawlDelayMs: 100, maxCrawlDelayMs: 100 },
      {
        sleep: async (ms) => {
          sleeps.push(ms);
        }
      }
    );
    throttle.markVisited('acme.example');
    expect(await throttle.wait('acme.example')).toBe(100);
    expect(sleeps).toEqual([100]);
  });
});
