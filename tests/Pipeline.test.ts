import { describe, expect, it } from 'vitest';

import { createConfig } from '../src/config.js';
import { CrawlPlanner } from '../src/crawl/CrawlPlanner.js';
import { CrawlThrottle } from '../src/crawl/CrawlThrottle.js';
import { Pipeline } from '../src/pipeline/Pipeline.js';
import type { CompanyResult, CrawlPlan } from '../src/types.js';

import { FailingSearch, FakeFetcher, FakeRenderer, FakeSearch, hit, urlset } from './helpers/fakes.js';

const config = createConfig({
  maxWorkers: 2,
  minCrawlDelayMs: 0,
  maxCrawlDelayMs: 0,
  searchMinIntervalMs: 0,
  searchMaxRetries: 2,
  searchBackoffBaseMs: 1,
  searchBackoffMaxMs: 1,
  blockedDomains: new Set(['blocked.example'])
});

const acmeSite = {
  'https://acme.example/sitemap.xml': urlset(['https://acme.example/products', 'https://acme.example/contact']),
  'https://acme.example/contact': '<html><head><title>Contact</title></head><body><p>Email: sales@acme.example</p></body></html>',
  'https://acme.example/products': '<html><body><p>Widgets</p></body></html>'
};

class FailingPlanner extends CrawlPlanner {
  override async plan(): Promise<CrawlPlan> {
    throw new Error('boom');
  }
}

function byCompany(results: CompanyResult[]): CompanyResult[] {
  return [...results].sort((a, b) => a.company.localeCompare(b.company));
}

describe('Pipeline', () => {
  it('resolves, crawls and extracts e-mails for a company', async () => {
    const fetcher = new FakeFetcher(acmeSite);
    const search = new FakeSearch({ 'Acme Corp': [hit('https://www.acme.example/')] });
    const pipeline = new Pipeline(config, { fetcher, search, renderer: null });

    const result = await pipeline.processCompany({ name: 'Acme Corp' });

    expect(result.status).toBe('with_email');
    expect(result.domain).toBe('acme.example');
    expect(result.usedSitemap).toBe(true);
    expect(result.pageCount).toBe(2);
    expect(result.pages.map((page) => page.url)).toEqual([
      'https://acme.example/contact',
      'https://acme.example/products'
    ]);
    expect(result.pages[0]?.title).toBe('Contact');
    expect(result.emails).toEqual([
      { address: 'sales@acme.example', sourceUrl: 'https://acme.example/contact', score: 0.75 }
    ]);
    expect(result.resolution).toEqual({ domain: 'acme.example', resolutionMethod: 'searched', confidence: 100 });

    const { counters } = pipeline.stats.snapshot();
    expect(counters.http_requests).toBe(3);
    expect(counters.pages_fetched).toBe(2);
    expect(counters.domain).toBe(1);
  });

  it('drops pages that redirect to another site', async () => {
    const fetcher = new FakeFetcher({
      ...acmeSite,
      'https://acme.example/contact': {
        body: '<html><body><p>Email: sales@thirdparty.example</p></body></html>',
        finalUrl: 'https://forms.thirdparty.example/acme'
      }
    });
    const pipeline = new Pipeline(config, { fetcher, search: new FakeSearch(), renderer: null });

    const result = await pipeline.processCompany({ name: 'Acme Corp', domain: 'acme.example' });

    expect(result).toMatchObject({ status: 'without_email', pageCount: 1, emails: [] });
    expect(result.pages.map((page) => page.url)).toEqual(['https://acme.example/products']);
    expect(pipeline.stats.snapshot().counters.pages_fetched).toBe(1);
  });

  it('skips documents that are not HTML', async () => {
    const fetcher = new FakeFetcher({
      'https://acme.example/sitemap.xml': urlset(['https://acme.example/about/brochure.pdf', 'https://acme.example/contact']),
      'https://acme.example/contact': acmeSite['https://acme.example/contact'],
      'https://acme.example/about/brochure.pdf': { body: '%PDF-1.4 Widgets catalogue', contentType: 'application/pdf' }
    });
    const renderer = new FakeRenderer();
    const pipeline = new Pipeline(config, { fetcher, search: new FakeSearch(), renderer });

    const result = await pipeline.processCompany({ name: 'Acme Corp', domain: 'acme.example' });

    expect(result.pages.map((page) => page.url)).toEqual(['https://acme.example/contact']);
    expect(result.status).toBe('with_email');
    expect(fetcher.requests).toContain('https://acme.example/about/brochure.pdf');
    expect(renderer.rendered).toEqual([]);
  });

  it('waits before the first page because sitemap discovery already hit the domain', async () => {
    const sleeps: number[] = [];
    const throttle = new CrawlThrottle(
      { minCrawlDelayMs: 100, maxCrawlDelayMs: 100 },
      {
        sleep: async (ms) => {
          sleeps.push(ms);
        }
      }
    );
    const pipeline = new Pipeline(config, {
      fetcher: new FakeFetcher(acmeSite),
      search: new FakeSearch(),
      renderer: null,
      throttle
    });

    const result = await pipeline.processCompany({ name: 'Acme Corp', domain: 'acme.example' });

    expect(result.pageCount).toBe(2);
    expect(sleeps).toEqual([100, 100]);
  });

  it('reports no_google when the search keeps failing', async () => {
    const search = new FailingSearch();
    const pipeline = new Pipeline(config, { fetcher: new FakeFetcher(), search, renderer: null });
    const result = await pipeline.processCompany({ name: 'Ghost Inc' });
    expect(result.status).toBe('no_google');
    expect(result.domain).toBeNull();
    expect(result.error).toBe('SearchApiError: Search API error 503 for "Ghost Inc"');
    expect(search.calls).toBe(2);
    expect(pipeline.stats.snapshot().counters.google_error).toBe(1);
  });

  it('fetches nothing for a blocklisted supplied domain', async () => {
    const fetcher = new FakeFetcher();
    const pipeline = new Pipeline(config, { fetcher, search: new FakeSearch(), renderer: null });
    const result = await pipeline.processCompany({ name: 'Blocked Co', domain: 'https://blocked.example' });
    expect(result).toMatchObject({ status: 'without_email', domain: 'blocked.example', pageCount: 0, emails: [] });
    expect(fetcher.requests).toEqual([]);
  });

  it('crawls a domain only once per run', async () => {
    const fetcher = new FakeFetcher(acmeSite);
    const pipeline = new Pipeline(config, { fetcher, search: new FakeSearch(), renderer: null });

    const first = await pipeline.processCompany({ name: 'Acme Corp', domain: 'acme.example' });
    const requests = fetcher.requests.length;
    const second = await pipeline.processCompany({ name: 'Acme Holding', domain: 'www.acme.example' });

    expect(first.status).toBe('with_email');
    expect(second).toMatchObject({
      status: 'with_email',
      domain: 'acme.example',
      pageCount: 0,
      skippedDuplicateDomain: true,
      emails: [{ address: 'sales@acme.example', sourceUrl: 'https://acme.example/contact', score: 0.75 }]
    });
    expect(fetcher.requests).toHaveLength(requests);
    expect(pipeline.stats.snapshot().counters.skipped_domain).toBe(1);
  });

  it('shares one crawl between companies processed at the same time', async () => {
    const fetcher = new FakeFetcher(acmeSite);
    const pipeline = new Pipeline(config, { fetcher, search: new FakeSearch(), renderer: null });

    const outcome = await pipeline.run([
      { name: 'Acme Corp', domain: 'acme.example' },
      { name: 'Acme Holding', domain: 'www.acme.example' }
    ]);

    expect(byCompany(outcome.results).map((result) => [result.company, result.status, result.emails.length])).toEqual([
      ['Acme Corp', 'with_email', 1],
      ['Acme Holding', 'with_email', 1]
    ]);
    expect(fetcher.requests).toHaveLength(3);
    const snapshot = pipeline.stats.snapshot();
    expect(snapshot.counters.skipped_domain).toBe(1);
    expect(snapshot.statuses.with_email).toBe(2);
    expect(snapshot.uniqueEmails).toBe(1);
  });

  it('turns unexpected failures into processing_error', async () => {
    const fetcher = new FakeFetcher();
    const pipeline = new Pipeline(config, {
      fetcher,
      search: new FakeSearch(),
      renderer: null,
      planner: new FailingPlanner(config, fetcher)
    });
    const result = await pipeline.processCompany({ name: 'Acme Corp', domain: 'acme.example' });
    expect(result.status).toBe('processing_error');
    expect(result.domain).toBe('acme.example');
    expect(result.error).toBe('Error: boom');
    expect(pipeline.stats.snapshot().statuses.processing_error).toBe(1);
  });

  it('gives every company exactly one terminal status', async () => {
    const search = new FakeSearch({
      'Acme Corp': [hit('https://www.acme.example/')],
      'Acme Tools': [hit('https://unrelated.example/')]
    });
    const pipeline = new Pipeline(config, { fetcher: new FakeFetcher(acmeSite), search, renderer: null });
    const seen: string[] = [];

    const outcome = await pipeline.run(
      [
        { name: 'Acme Corp' },
        { name: 'Blocked Co', domain: 'blocked.example' },
        { name: 'Nobody Knows GmbH' },
        { name: 'Acme Tools' }
      ],
      { onResult: (result) => seen.push(result.company) }
    );

    expect(outcome.interrupted).toBe(0);
    expect(outcome.aborted).toBe(false);
    expect(byCompany(outcome.results).map((result) => [result.company, result.status])).toEqual([
      ['Acme Corp', 'with_email'],
      ['Acme Tools', 'domain_unclear'],
      ['Blocked Co', 'without_email'],
      ['Nobody Knows GmbH', 'no_google']
    ]);
    expect([...seen].sort()).toEqual(['Acme Corp', 'Acme Tools', 'Blocked Co', 'Nobody Knows GmbH']);

    const snapshot = pipeline.stats.snapshot();
    const total = Object.values(snapshot.statuses).reduce((sum, count) => sum + count, 0);
    expect(total).toBe(4);
    expect(snapshot.counters.leads).toBe(4);
    expect(snapshot.uniqueEmails).toBe(1);
  });

  it('processes nothing when the run is aborted up front', async () => {
    const controller = new AbortController();
    controller.abort();
    const pipeline = new Pipeline(config, { fetcher: new FakeFetcher(), search: new FakeSearch(), renderer: null });
    const outcome = await pipeline.run([{ name: 'Acme Corp' }, { name: 'Beta Ltd' }], { signal: controller.signal });
    expect(outcome).toEqual({ results: [], interrupted: 2, aborted: true });
    expect(pipeline.stats.snapshot().counters.leads).toBe(0);
  });
});
