import type { AppConfig } from '../config.js';
import { CrawlPlanner } from '../crawl/CrawlPlanner.js';
import { CrawlThrottle } from '../crawl/CrawlThrottle.js';
import { describeError } from '../errors.js';
import { EmailExtractor, mergeCandidates } from '../extractors/EmailExtractor.js';
import { HybridEmailExtractor } from '../extractors/HybridEmailExtractor.js';
import { extractPageInfo } from '../extractors/PageInfoExtractor.js';
import { CountingFetcher } from '../fetch/CountingFetcher.js';
import { HttpFetcher } from '../fetch/HttpFetcher.js';
import { RenderServiceClient } from '../fetch/RenderServiceClient.js';
import { DomainResolver } from '../resolver/DomainResolver.js';
import { ProgrammableSearchClient } from '../search/ProgrammableSearchClient.js';
import type {
  CompanyInput,
  CompanyResult,
  CompanyStatus,
  CrawlPlan,
  CrawlTask,
  EmailCandidate,
  FetchResponse,
  Fetcher,
  PageRenderer,
  PageResult,
  ResolutionOutcome,
  ResolvedDomain,
  SearchProvider
} from '../types.js';
import { isOnDomain } from '../utils/domain.js';
import { createLogger } from '../utils/logger.js';

import { RunStats } from './RunStats.js';
import { runWorkerPool } from './WorkerPool.js';

const log = createLogger('pipeline');

export interface PipelineDependencies {
  stats?: RunStats;
  search?: SearchProvider;
  /** Raw transport; wrapped so every request is counted. */
  fetcher?: Fetcher;
  renderer?: PageRenderer | null;
  resolver?: DomainResolver;
  planner?: CrawlPlanner;
  extractor?: HybridEmailExtractor;
  throttle?: CrawlThrottle;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Called once per company, in completion order. */
  onResult?: (result: CompanyResult) => void;
}

export interface RunOutcome {
  results: CompanyResult[];
  interrupted: number;
  aborted: boolean;
}

interface DomainCrawl {
  plan: CrawlPlan;
  pages: PageResult[];
  emails: EmailCandidate[];
}

export class Pipeline {
  readonly stats: RunStats;
  private readonly config: AppConfig;
  private readonly resolver: DomainResolver;
  private readonly planner: CrawlPlanner;
  private readonly fetcher: Fetcher;
  private readonly extractor: HybridEmailExtractor;
  private readonly throttle: CrawlThrottle;
  /** First crawl of each domain; later claimants reuse its e-mails. */
  private readonly claimedDomains = new Map<string, Promise<EmailCandidate[]>>();
  private readonly transport: HttpFetcher | null;

  constructor(config: AppConfig, dependencies: PipelineDependencies = {}) {
    this.config = config;
    this.stats = dependencies.stats ?? new RunStats();

    if (dependencies.fetcher) {
      this.transport = null;
      this.fetcher = new CountingFetcher(dependencies.fetcher, this.stats);
    } else {
      this.transport = new HttpFetcher(config);
      this.fetcher = new CountingFetcher(this.transport, this.stats);
    }

    const search =
      dependencies.search ??
      new ProgrammableSearchClient({
        apiKey: config.googleApiKey,
        cx: config.googleCxId,
        timeoutMs: config.requestTimeoutMs
      });
    this.resolver = dependencies.resolver ?? new DomainResolver(config, { search, stats: this.stats });
    this.planner = dependencies.planner ?? new CrawlPlanner(config, this.fetcher, this.stats);

    const renderer =
      dependencies.renderer === undefined
        ? config.renderServiceUrl
          ? new RenderServiceClient({ endpoint: config.renderServiceUrl, timeoutMs: config.renderTimeoutMs })
          : undefined
        : dependencies.renderer ?? undefined;
    if (!renderer) {
      log.debug('Render fallback disabled (no RENDER_SERVICE_URL).');
    }
    this.extractor =
      dependencies.extractor ??
      new HybridEmailExtractor(new EmailExtractor(config), {
        ...(renderer ? { renderer } : {}),
        stats: this.stats
      });
    this.throttle = dependencies.throttle ?? new CrawlThrottle(config);
  }

  async run(inputs: readonly CompanyInput[], options: RunOptions = {}): Promise<RunOutcome> {
    log.info(`Processing ${inputs.length} compan${inputs.length === 1 ? 'y' : 'ies'} with ${this.config.maxWorkers} worker(s)`);
    const outcome = await runWorkerPool(
      inputs,
      async (input) => {
        const result = await this.processCompany(input);
        options.onResult?.(result);
        return result;
      },
      {
        concurrency: this.config.maxWorkers,
        drainTimeoutMs: this.config.drainTimeoutMs,
        ...(options.signal ? { signal: options.signal } : {})
      }
    );

    if (outcome.interrupted > 0) {
      log.warn(`${outcome.interrupted} compan${outcome.interrupted === 1 ? 'y was' : 'ies were'} not processed`);
    } else {
      log.success('Pipeline completed.');
    }
    return { results: outcome.results, interrupted: outcome.interrupted, aborted: outcome.aborted };
  }

  /** Takes one company to a terminal status. Never throws. */
  async processCompany(input: CompanyInput): Promise<CompanyResult> {
    this.stats.increment('leads');
    log.info(`Processing "${input.name}"`);

    let result: CompanyResult;
    let domain: string | null = null;
    try {
      const outcome = await this.resolver.resolve(input);
      if (outcome.kind === 'resolved') {
        domain = outcome.resolved.domain;
        this.stats.increment('domain');
        result = await this.crawlCompany(input, outcome.resolved);
      } else {
        result = this.unresolvedResult(input, outcome);
      }
    } catch (error) {
      const message = describeError(error);
      log.error(`Processing failed for "${input.name}": ${message}`);
      result = this.emptyResult(input, domain, 'processing_error');
      result.error = message;
    }

    this.stats.recordStatus(result.status);
    this.stats.recordEmails(result.emails.map((email) => email.address));
    return result;
  }

  private unresolvedResult(
    input: CompanyInput,
    outcome: Exclude<ResolutionOutcome, { kind: 'resolved' }>
  ): CompanyResult {
    switch (outcome.kind) {
      case 'search_failed': {
        const result = this.emptyResult(input, null, 'no_google');
        result.error = outcome.error;
        return result;
      }
      case 'no_results':
        return this.emptyResult(input, null, 'no_google');
      case 'unclear':
        return this.emptyResult(input, null, 'domain_unclear');
    }
  }

  private async crawlCompany(input: CompanyInput, resolved: ResolvedDomain): Promise<CompanyResult> {
    const claimed = this.claimedDomains.get(resolved.domain);
    if (claimed) {
      log.info(`Skipping ${resolved.domain} for "${input.name}", already crawled for another company`);
      this.stats.increment('skipped_domain');
      const emails = (await claimed).map((email) => ({ ...email }));
      const result = this.emptyResult(input, resolved.domain, emails.length > 0 ? 'with_email' : 'without_email');
      result.emails = emails;
      result.resolution = resolved;
      result.skippedDuplicateDomain = true;
      return result;
    }

    const crawl = this.crawlDomain(resolved.domain);
    this.claimedDomains.set(
      resolved.domain,
      crawl.then(
        ({ emails }) => emails,
        (): EmailCandidate[] => []
      )
    );
    const { plan, pages, emails } = await crawl;

    const status: CompanyStatus = emails.length > 0 ? 'with_email' : 'without_email';
    log.info(
      `"${input.name}" → ${resolved.domain}: ${pages.length}/${plan.tasks.length} page(s), ${emails.length} e-mail(s)`
    );
    return {
      company: input.name,
      domain: resolved.domain,
      status,
      pageCount: pages.length,
      usedSitemap: plan.usedSitemap,
      pages,
      emails,
      resolution: resolved
    };
  }

  private async crawlDomain(domain: string): Promise<DomainCrawl> {
    // Sitemap and robots.txt requests hit the domain before any page does.
    this.throttle.markVisited(domain);
    const plan = await this.planner.plan(domain);
    const pages: PageResult[] = [];
    for (const task of plan.tasks) {
      const page = await this.crawlPage(plan.domain, task);
      if (page) {
        pages.push(page);
      }
    }
    return { plan, pages, emails: mergeCandidates(pages.map((page) => page.emails)) };
  }

  private async crawlPage(domain: string, task: CrawlTask): Promise<PageResult | null> {
    await this.throttle.wait(domain);
    let response: FetchResponse;
    try {
      response = await this.fetcher.fetch(task.url);
    } catch (error) {
      log.warn(`Skipping ${task.url}: ${describeError(error)}`);
      return null;
    }
    if (!isOnDomain(response.finalUrl, domain)) {
      log.warn(`Skipping ${task.url}: redirected off-site to ${response.finalUrl}`);
      return null;
    }
    const contentType = response.headers['content-type'];
    if (contentType && !/html/i.test(contentType)) {
      log.debug(`Skipping ${task.url}: not an HTML page (${contentType})`);
      return null;
    }
    this.stats.increment('pages_fetched');

    const info = extractPageInfo(response.body);
    const { emails, rendered } = await this.extractor.extractPage(task.url, response.body);
    return { url: task.url, httpStatus: response.status, ...info, emails, rendered };
  }

  private emptyResult(input: CompanyInput, domain: string | null, status: CompanyStatus): CompanyResult {
    return {
      company: input.name,
      domain,
      status,
      pageCount: 0,
      usedSitemap: false,
      pages: [],
      emails: []
    };
  }

  /** Releases keep-alive sockets held by the default transport. */
  close(): void {
    this.transport?.destroy();
  }
}
