import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';

loadDotenv();

export const DEFAULT_PRIORITY_PARTS = [
  'contact',
  'about',
  'impress',
  'impressum',
  'kontakt',
  'privacy',
  'sales',
  'investor',
  'procurement',
  'suppliers'
];

export const DEFAULT_FALLBACK_PATHS = [
  '/contact',
  '/contact-us',
  '/kontakt',
  '/about',
  '/about-us',
  '/impressum',
  '/imprint',
  '/legal',
  '/privacy'
];

export const DEFAULT_SITEMAP_FILENAMES = [
  'sitemap.xml',
  'sitemap_index.xml',
  'sitemap-index.xml',
  'sitemap1.xml'
];

export const DEFAULT_EMAIL_KEYWORDS = ['contact', 'email', 'e-mail', 'mail', 'kontakt', 'inquiries', 'sales'];

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 13_4) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:124.0) Gecko/20100101 Firefox/124.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 13_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15'
];

const csvList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0)
  );

const csvListRaw = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envBoolean = z
  .string()
  .transform((value) => ['1', 'true', 'yes', 'y', 'on'].includes(value.trim().toLowerCase()));

const intInRange = (min: number, max: number) => z.coerce.number().int().min(min).max(max);
const numberInRange = (min: number, max: number) => z.coerce.number().min(min).max(max);

const emailWeightsSchema = z.object({
  base: numberInRange(0, 1),
  mailto: numberInRange(0, 1),
  priorityPage: numberInRange(0, 1),
  keywordProximity: numberInRange(0, 1),
  sameDomain: numberInRange(0, 1)
});

export type EmailScoringWeights = z.infer<typeof emailWeightsSchema>;

const envSchema = z
  .object({
    GOOGLE_API_KEY: z.string().default(''),
    GOOGLE_CX_ID: z.string().default(''),
    MAX_WORKERS: intInRange(1, 64).default(4),
    MAX_FALLBACK_PAGES: intInRange(1, 500).default(12),
    MAX_URLS_PER_SITEMAP: intInRange(1, 100_000).default(10_000),
    MAX_NESTED_SITEMAPS: intInRange(0, 50).default(5),
    DOMAIN_SCORE_THRESHOLD: intInRange(0, 100).default(60),
    MIN_CRAWL_DELAY_MS: intInRange(0, 60_000).default(500),
    MAX_CRAWL_DELAY_MS: intInRange(0, 60_000).default(2_000),
    GOOGLE_MAX_RETRIES: intInRange(1, 10).default(5),
    GOOGLE_SAFE_INTERVAL_MS: intInRange(0, 10_000).default(800),
    GOOGLE_BACKOFF_BASE_MS: intInRange(1, 60_000).default(1_000),
    GOOGLE_BACKOFF_MAX_MS: intInRange(1, 300_000).default(30_000),
    REQUEST_TIMEOUT_MS: intInRange(1_000, 120_000).default(20_000),
    HTTP_RETRY_COUNT: intInRange(1, 5).default(2),
    MAX_REDIRECTS: intInRange(0, 100).default(5),
    MAX_URL_LENGTH: intInRange(100, 10_000).default(2_000),
    DRAIN_TIMEOUT_MS: intInRange(0, 600_000).default(30_000),
    ALLOW_INSECURE_SSL: envBoolean.default('false'),
    SAVE_DOMAIN_ONLY: envBoolean.default('true'),
    PROXIES: csvListRaw.default(''),
    BLOCKED_DOMAINS: csvList.default(''),
    PRIORITY_PATH_PARTS: csvList.default(DEFAULT_PRIORITY_PARTS.join(',')),
    FALLBACK_PATHS: csvListRaw.default(DEFAULT_FALLBACK_PATHS.join(',')),
    EMAIL_KEYWORDS: csvList.default(DEFAULT_EMAIL_KEYWORDS.join(',')),
    RENDER_SERVICE_URL: z.string().url().optional().or(z.literal('').transform(() => undefined)),
    RENDER_TIMEOUT_MS: intInRange(1_000, 300_000).default(45_000),
    EMAIL_SCORE_BASE: numberInRange(0, 1).default(0.4),
    EMAIL_SCORE_MAILTO: numberInRange(0, 1).default(0.25),
    EMAIL_SCORE_PRIORITY_PAGE: numberInRange(0, 1).default(0.15),
    EMAIL_SCORE_KEYWORD: numberInRange(0, 1).default(0.1),
    EMAIL_SCORE_SAME_DOMAIN: numberInRange(0, 1).default(0.1)
  })
  .superRefine((env, ctx) => {
    if (env.MIN_CRAWL_DELAY_MS > env.MAX_CRAWL_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIN_CRAWL_DELAY_MS'],
        message: 'must not exceed MAX_CRAWL_DELAY_MS'
      });
    }
    if (env.GOOGLE_BACKOFF_BASE_MS > env.GOOGLE_BACKOFF_MAX_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GOOGLE_BACKOFF_BASE_MS'],
        message: 'must not exceed GOOGLE_BACKOFF_MAX_MS'
      });
    }
    if (env.PRIORITY_PATH_PARTS.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PRIORITY_PATH_PARTS'],
        message: 'must list at least one path part'
      });
    }
  });

export interface AppConfig {
  readonly googleApiKey: string;
  readonly googleCxId: string;
  readonly maxWorkers: number;
  readonly maxFallbackPages: number;
  readonly maxUrlsPerSitemap: number;
  readonly maxNestedSitemaps: number;
  readonly domainScoreThreshold: number;
  readonly minCrawlDelayMs: number;
  readonly maxCrawlDelayMs: number;
  readonly searchMaxRetries: number;
  readonly searchMinIntervalMs: number;
  readonly searchBackoffBaseMs: number;
  readonly searchBackoffMaxMs: number;
  readonly requestTimeoutMs: number;
  readonly httpRetryCount: number;
  readonly maxRedirects: number;
  readonly maxUrlLength: number;
  readonly drainTimeoutMs: number;
  readonly insecureSsl: boolean;
  readonly saveDomainOnly: boolean;
  readonly proxies: readonly string[];
  readonly blockedDomains: ReadonlySet<string>;
  readonly priorityParts: readonly string[];
  readonly fallbackPaths: readonly string[];
  readonly sitemapFilenames: readonly string[];
  readonly emailKeywords: readonly string[];
  readonly emailWeights: Readonly<EmailScoringWeights>;
  readonly renderServiceUrl: string | undefined;
  readonly renderTimeoutMs: number;
  readonly userAgents: readonly string[];
}

export interface LoadConfigOptions {
  /** Skip the search credential check, e.g. when every input row supplies a domain. */
  requireSearchCredentials?: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  options: LoadConfigOptions = {}
): AppConfig {
  const parsed = envSchema.safeParse(env);
  const problems: string[] = [];

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      problems.push(`${issue.path.join('.')} ${issue.message}`);
    }
    throw new ConfigurationError(problems);
  }

  const values = parsed.data;
  if (options.requireSearchCredentials ?? true) {
    if (!values.GOOGLE_API_KEY) problems.push('GOOGLE_API_KEY is missing');
    if (!values.GOOGLE_CX_ID) problems.push('GOOGLE_CX_ID is missing');
  }
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  const blocked = new Set(values.BLOCKED_DOMAINS.map((domain) => domain.replace(/^www\./, '')));

  return Object.freeze({
    googleApiKey: values.GOOGLE_API_KEY,
    googleCxId: values.GOOGLE_CX_ID,
    maxWorkers: values.MAX_WORKERS,
    maxFallbackPages: values.MAX_FALLBACK_PAGES,
    maxUrlsPerSitemap: values.MAX_URLS_PER_SITEMAP,
    maxNestedSitemaps: values.MAX_NESTED_SITEMAPS,
    domainScoreThreshold: values.DOMAIN_SCORE_THRESHOLD,
    minCrawlDelayMs: values.MIN_CRAWL_DELAY_MS,
    maxCrawlDelayMs: values.MAX_CRAWL_DELAY_MS,
    searchMaxRetries: values.GOOGLE_MAX_RETRIES,
    searchMinIntervalMs: values.GOOGLE_SAFE_INTERVAL_MS,
    searchBackoffBaseMs: values.GOOGLE_BACKOFF_BASE_MS,
    searchBackoffMaxMs: values.GOOGLE_BACKOFF_MAX_MS,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    httpRetryCount: values.HTTP_RETRY_COUNT,
    maxRedirects: values.MAX_REDIRECTS,
    maxUrlLength: values.MAX_URL_LENGTH,
    drainTimeoutMs: values.DRAIN_TIMEOUT_MS,
    insecureSsl: values.ALLOW_INSECURE_SSL,
    saveDomainOnly: values.SAVE_DOMAIN_ONLY,
    proxies: Object.freeze([...values.PROXIES]),
    blockedDomains: blocked,
    priorityParts: Object.freeze([...values.PRIORITY_PATH_PARTS]),
    fallbackPaths: Object.freeze([...values.FALLBACK_PATHS]),
    sitemapFilenames: Object.freeze([...DEFAULT_SITEMAP_FILENAMES]),
    emailKeywords: Object.freeze([...values.EMAIL_KEYWORDS]),
    emailWeights: Object.freeze({
      base: values.EMAIL_SCORE_BASE,
      mailto: values.EMAIL_SCORE_MAILTO,
      priorityPage: values.EMAIL_SCORE_PRIORITY_PAGE,
      keywordProximity: values.EMAIL_SCORE_KEYWORD,
      sameDomain: values.EMAIL_SCORE_SAME_DOMAIN
    }),
    renderServiceUrl: values.RENDER_SERVICE_URL,
    renderTimeoutMs: values.RENDER_TIMEOUT_MS,
    userAgents: Object.freeze([...USER_AGENTS])
  } satisfies AppConfig);
}

/** Defaults with credentials filled in; used by tests and library callers. */
export function createConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const base = loadConfig(
    { GOOGLE_API_KEY: 'unset', GOOGLE_CX_ID: 'unset' },
    { requireSearchCredentials: false }
  );
  return Object.freeze({ ...base, ...overrides });
}
