import { FetchError, RenderError, SearchApiError } from '../../src/errors.js';
import type { FetchResponse, Fetcher, PageRenderer, SearchHit, SearchProvider } from '../../src/types.js';

export interface FakePage {
  body: string;
  finalUrl?: string;
  contentType?: string;
}

/** Serves canned bodies by URL; a number answers with that HTTP error status, anything unknown is a 404. */
export class FakeFetcher implements Fetcher {
  readonly requests: string[] = [];
  private readonly pages: Record<string, string | number | FakePage>;

  constructor(pages: Record<string, string | number | FakePage> = {}) {
    this.pages = pages;
  }

  async fetch(url: string): Promise<FetchResponse> {
    this.requests.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new FetchError(url, 'HTTP 404 Not Found', { status: 404 });
    }
    if (typeof page === 'number') {
      throw new FetchError(url, `HTTP ${page}`, { status: page });
    }
    const served: FakePage = typeof page === 'string' ? { body: page } : page;
    const { body, finalUrl = url, contentType = 'text/html' } = served;
    return { url, finalUrl, status: 200, headers: { 'content-type': contentType }, body };
  }
}

export class FakeSearch implements SearchProvider {
  readonly queries: string[] = [];
  private readonly answers: Record<string, SearchHit[]>;

  constructor(answers: Record<string, SearchHit[]> = {}) {
    this.answers = answers;
  }

  async search(query: string): Promise<SearchHit[]> {
    this.queries.push(query);
    return this.answers[query] ?? [];
  }
}

export class FailingSearch implements SearchProvider {
  calls = 0;
  private readonly transient: boolean;

  constructor(transient = true) {
    this.transient = transient;
  }

  async search(query: string): Promise<SearchHit[]> {
    this.calls += 1;
    throw new SearchApiError(`Search API error 503 for "${query}"`, { status: 503, transient: this.transient });
  }
}

export class FakeRenderer implements PageRenderer {
  readonly rendered: string[] = [];
  private readonly pages: Record<string, string>;

  constructor(pages: Record<string, string> = {}) {
    this.pages = pages;
  }

  async render(url: string): Promise<string> {
    this.rendered.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new RenderError(url, 'Render service answered 502 Bad Gateway');
    }
    return page;
  }
}

export function hit(url: string, title = ''): SearchHit {
  return { url, title, snippet: '' };
}

export function urlset(urls: readonly string[]): string {
  const entries = urls.map((url) => `  <url><loc>${url}</loc></url>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>\n<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n${entries}\n</urlset>`;
}

export function sitemapIndex(urls: readonly string[]): string {
  const entries = urls.map((url) => `  <sitemap><loc>${url}</loc></sitemap>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>\n<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n${entries}\n</sitemapindex>`;
}

export const noSleep = async (): Promise<void> => undefined;
