import { gunzipSync } from 'node:zlib';

import { XMLParser, XMLValidator } from 'fast-xml-parser';

import type { AppConfig } from '../config.js';
import { describeError } from '../errors.js';
import type { FetchResponse, Fetcher } from '../types.js';
import { canonicaliseUrl, isOnDomain, isValidUrl } from '../utils/domain.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('sitemap');

const MAX_SITEMAP_BYTES = 50 * 1024 * 1024;

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => name === 'url' || name === 'sitemap'
});

export type ParsedSitemap =
  | { kind: 'urlset'; urls: string[] }
  | { kind: 'index'; sitemaps: string[] }
  | { kind: 'invalid'; reason: string };

export type SitemapParserConfig = Pick<
  AppConfig,
  'sitemapFilenames' | 'maxUrlsPerSitemap' | 'maxNestedSitemaps' | 'maxUrlLength'
>;

export interface SitemapUrls {
  urls: string[];
  sitemapUrls: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function locsOf(entries: unknown, limit: number): string[] {
  const locs: string[] = [];
  if (!Array.isArray(entries)) {
    return locs;
  }
  for (const entry of entries) {
    if (locs.length >= limit) break;
    if (!isRecord(entry)) continue;
    const loc = entry.loc;
    if (typeof loc === 'string' && loc.length > 0) {
      locs.push(loc.trim());
    }
  }
  return locs;
}

export function looksLikeXml(content: string): boolean {
  const head = content.trimStart().slice(0, 200).toLowerCase();
  return head.startsWith('<?xml') || head.includes('<urlset') || head.includes('<sitemapindex');
}

/** Inflates gzip payloads; throws a `RangeError` once the output passes `maxBytes`. */
export function decodeSitemapBody(
  response: Pick<FetchResponse, 'body' | 'bytes'>,
  maxBytes: number = MAX_SITEMAP_BYTES
): string {
  const { bytes } = response;
  if (bytes && bytes.length > 2 && bytes[0] === 0x1f && bytes[1] === 0x8b) {
    return gunzipSync(bytes, { maxOutputLength: maxBytes }).toString('utf8');
  }
  return response.body;
}

/**
 * Parses a `<urlset>` or `<sitemapindex>` document. At most `limit` `<loc>`
 * entries are read. Never throws.
 */
export function parseSitemap(xml: string, limit: number): ParsedSitemap {
  if (!xml || xml.length > MAX_SITEMAP_BYTES) {
    return { kind: 'invalid', reason: 'empty or oversized document' };
  }
  if (!looksLikeXml(xml)) {
    return { kind: 'invalid', reason: 'content is not an XML sitemap' };
  }
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return { kind: 'invalid', reason: validation.err.msg };
  }

  let document: unknown;
  try {
    document = xmlParser.parse(xml);
  } catch (error) {
    return { kind: 'invalid', reason: describeError(error) };
  }
  if (!isRecord(document)) {
    return { kind: 'invalid', reason: 'unexpected document shape' };
  }

  if (isRecord(document.sitemapindex)) {
    return { kind: 'index', sitemaps: locsOf(document.sitemapindex.sitemap, limit) };
  }
  if (isRecord(document.urlset)) {
    return { kind: 'urlset', urls: locsOf(document.urlset.url, limit) };
  }
  if (document.urlset === '' || document.sitemapindex === '') {
    return { kind: 'urlset', urls: [] };
  }
  return { kind: 'invalid', reason: 'no <urlset> or <sitemapindex> root' };
}

export function extractRobotsSitemaps(robots: string): string[] {
  const sitemaps: string[] = [];
  for (const line of robots.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.toLowerCase().startsWith('sitemap:')) {
      const value = trimmed.slice('sitemap:'.length).trim();
      if (value) sitemaps.push(value);
    }
  }
  return sitemaps;
}

export class SitemapParser {
  private readonly config: SitemapParserConfig;
  private readonly fetcher: Fetcher;

  constructor(config: SitemapParserConfig, fetcher: Fetcher) {
    this.config = config;
    this.fetcher = fetcher;
  }

  /**
   * Sitemap documents for `domain`: the first well-known filename that answers
   * with XML, otherwise the same-host `Sitemap:` lines of robots.txt.
   */
  async discover(domain: string): Promise<Array<{ url: string; xml: string }>> {
    for (const filename of this.config.sitemapFilenames) {
      const url = `https://${domain}/${filename}`;
      const xml = await this.fetchSitemap(url, domain);
      if (xml !== null) {
        log.info(`Found sitemap via standard filename: ${url}`);
        return [{ url, xml }];
      }
    }

    const found: Array<{ url: string; xml: string }> = [];
    let robots: FetchResponse;
    try {
      robots = await this.fetcher.fetch(`https://${domain}/robots.txt`);
    } catch (error) {
      log.debug(`No robots.txt for ${domain}: ${describeError(error)}`);
      return found;
    }
    for (const candidate of extractRobotsSitemaps(robots.body)) {
      let url: string;
      try {
        url = new URL(candidate, `https://${domain}/`).toString();
      } catch {
        continue;
      }
      if (!isOnDomain(url, domain)) {
        log.debug(`Ignoring off-domain sitemap ${url} for ${domain}`);
        continue;
      }
      const xml = await this.fetchSitemap(url, domain);
      if (xml !== null) {
        log.info(`Found sitemap via robots.txt: ${url}`);
        found.push({ url, xml });
      }
    }
    if (found.length === 0) {
      log.debug(`No sitemap found for ${domain}`);
    }
    return found;
  }

  /** Same-domain page URLs listed by the domain's sitemaps, in document order. */
  async collectUrls(domain: string): Promise<SitemapUrls> {
    const documents = await this.discover(domain);
    const urls: string[] = [];
    const seen = new Set<string>();
    const sitemapUrls: string[] = [];

    const accept = (entries: string[]) => {
      for (const entry of entries) {
        if (!isValidUrl(entry, this.config.maxUrlLength) || !isOnDomain(entry, domain)) {
          continue;
        }
        const canonical = canonicaliseUrl(entry);
        if (seen.has(canonical)) continue;
        seen.add(canonical);
        urls.push(entry);
      }
    };

    for (const document of documents) {
      const parsed = parseSitemap(document.xml, this.config.maxUrlsPerSitemap);
      if (parsed.kind === 'invalid') {
        log.warn(`Error parsing ${document.url}: ${parsed.reason}`);
        continue;
      }
      sitemapUrls.push(document.url);
      if (parsed.kind === 'urlset') {
        accept(parsed.urls);
        continue;
      }

      const nested = parsed.sitemaps
        .filter((url) => isValidUrl(url, this.config.maxUrlLength) && isOnDomain(url, domain))
        .slice(0, this.config.maxNestedSitemaps);
      for (const nestedUrl of nested) {
        const xml = await this.fetchSitemap(nestedUrl, domain);
        if (xml === null) continue;
        const child = parseSitemap(xml, this.config.maxUrlsPerSitemap);
        if (child.kind !== 'urlset') {
          log.warn(`Skipping nested sitemap ${nestedUrl}: ${child.kind === 'invalid' ? child.reason : 'nested index'}`);
          continue;
        }
        sitemapUrls.push(nestedUrl);
        accept(child.urls);
      }
    }

    return { urls, sitemapUrls };
  }

  private async fetchSitemap(url: string, domain: string): Promise<string | null> {
    let response: FetchResponse;
    try {
      response = await this.fetcher.fetch(url);
    } catch (error) {
      log.debug(`Sitemap candidate ${url} unavailable: ${describeError(error)}`);
      return null;
    }
    if (!isOnDomain(response.finalUrl, domain)) {
      log.debug(`Sitemap ${url} redirected off-domain to ${response.finalUrl}`);
      return null;
    }
    let xml: string;
    try {
      xml = decodeSitemapBody(response);
    } catch (error) {
      log.warn(`gzip decode failed for ${url}: ${describeError(error)}`);
      return null;
    }
    return looksLikeXml(xml) ? xml : null;
  }
}
