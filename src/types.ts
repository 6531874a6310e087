export interface CompanyInput {
  readonly name: string;
  readonly domain?: string;
}

export type ResolutionMethod = 'supplied' | 'searched';

export interface ResolvedDomain {
  domain: string;
  resolutionMethod: ResolutionMethod;
  confidence: number;
}

export type ResolutionOutcome =
  | { kind: 'resolved'; resolved: ResolvedDomain }
  | { kind: 'search_failed'; error: string }
  | { kind: 'no_results' }
  | { kind: 'unclear'; bestScore: number; bestHost?: string };

export interface SearchHit {
  url: string;
  title: string;
  snippet: string;
}

export interface SearchProvider {
  search(query: string): Promise<SearchHit[]>;
}

export type CrawlOrigin = 'sitemap' | 'fallback_heuristic';

export interface CrawlTask {
  url: string;
  priority: number;
  origin: CrawlOrigin;
}

export interface CrawlPlan {
  domain: string;
  tasks: CrawlTask[];
  usedSitemap: boolean;
  sitemapUrls: string[];
}

export interface EmailCandidate {
  address: string;
  sourceUrl: string;
  score: number;
}

export interface PageResult {
  url: string;
  httpStatus: number;
  title: string;
  metaDescription: string;
  metaKeywords: string;
  extractedText: string;
  emails: EmailCandidate[];
  rendered: boolean;
}

export type CompanyStatus =
  | 'with_email'
  | 'without_email'
  | 'no_google'
  | 'domain_unclear'
  | 'processing_error';

export interface CompanyResult {
  company: string;
  domain: string | null;
  status: CompanyStatus;
  pageCount: number;
  usedSitemap: boolean;
  pages: PageResult[];
  emails: EmailCandidate[];
  resolution?: ResolvedDomain;
  skippedDuplicateDomain?: boolean;
  error?: string;
}

export interface FetchOptions {
  method?: 'GET' | 'HEAD';
  timeoutMs?: number;
  maxRedirects?: number;
  proxy?: string;
}

export interface FetchResponse {
  url: string;
  finalUrl: string;
  status: number;
  headers: Record<string, string>;
  body: string;
  bytes?: Buffer;
}

/** Static HTTP transport. Throws `FetchError` on network failure or non-2xx status. */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResponse>;
}

/** Browser rendering fallback. Throws `RenderError`. */
export interface PageRenderer {
  render(url: string): Promise<string>;
}
