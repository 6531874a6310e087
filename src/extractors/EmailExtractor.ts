import { load } from 'cheerio';
import type { Element } from 'domhandler';

import type { AppConfig, EmailScoringWeights } from '../config.js';
import { priorityBand } from '../crawl/CrawlPlanner.js';
import { describeError, ExtractionError } from '../errors.js';
import type { EmailCandidate } from '../types.js';
import { normaliseDomain } from '../utils/domain.js';
import { createLogger } from '../utils/logger.js';

import { visibleText } from './PageInfoExtractor.js';

const log = createLogger('emails');

const EMAIL_PATTERN = /(?<![A-Z0-9._%+-])[A-Z0-9._%+-]+@(?:[A-Z0-9-]+\.)+[A-Z]{2,63}(?![A-Z0-9_%+-])/gi;
const EMAIL_VALIDATION_REGEX = /^[a-z0-9._%+-]+@(?:[a-z0-9-]+\.)+[a-z]{2,63}$/;
const MAILTO_PATTERN = /^mailto:/i;
const CHAR_CODES_PATTERN = /fromCharCode\(([\d\s,]+)\)/g;
const BASE64_PATTERN = /atob\(\s*['"]([A-Za-z0-9+/=]+)['"]\s*\)/gi;
const CF_PROTECTION_PATTERN = /\/cdn-cgi\/l\/email-protection#([0-9a-f]+)/i;
const OBFUSCATED_PATTERN =
  /([A-Za-z0-9._%+-]+)\s*(?:\[\s*at\s*\]|\(\s*at\s*\)|\s+at\s+)\s*([A-Za-z0-9-]+(?:\s*(?:\[\s*dot\s*\]|\(\s*dot\s*\)|\s+dot\s+)\s*[A-Za-z0-9-]+)+)/gi;
const OBFUSCATED_DOT = /\s*(?:\[\s*dot\s*\]|\(\s*dot\s*\)|\s+dot\s+)\s*/gi;

const KEYWORD_WINDOW = 80;

export const ASSET_EXTENSIONS: ReadonlySet<string> = new Set([
  'png',
  'jpg',
  'jpeg',
  'gif',
  'svg',
  'webp',
  'bmp',
  'ico',
  'css',
  'js'
]);

export const PLACEHOLDER_DOMAINS: ReadonlySet<string> = new Set([
  'example.com',
  'example.org',
  'example.net',
  'test.com',
  'domain.com',
  'email.com',
  'company.com',
  'yourcompany.com',
  'yourdomain.com'
]);

export const UNANSWERED_ROLES: ReadonlySet<string> = new Set([
  'noreply',
  'no-reply',
  'donotreply',
  'do-not-reply',
  'postmaster',
  'hostmaster',
  'webmaster'
]);

export interface EmailSignals {
  fromMailto: boolean;
  onPriorityPage: boolean;
  nearKeyword: boolean;
  sameDomain: boolean;
}

/** Weighted sum of the signals, clamped to `[0, 1]` and rounded to 4 decimals. */
export function scoreEmail(signals: EmailSignals, weights: EmailScoringWeights): number {
  let score = weights.base;
  if (signals.fromMailto) score += weights.mailto;
  if (signals.onPriorityPage) score += weights.priorityPage;
  if (signals.nearKeyword) score += weights.keywordProximity;
  if (signals.sameDomain) score += weights.sameDomain;
  return Math.round(Math.min(1, Math.max(0, score)) * 10_000) / 10_000;
}

export function isValidEmail(address: string): boolean {
  if (!EMAIL_VALIDATION_REGEX.test(address)) {
    return false;
  }
  const at = address.lastIndexOf('@');
  const local = address.slice(0, at);
  const domain = address.slice(at + 1);
  if (local.length > 64 || domain.length > 255) {
    return false;
  }
  if (/^\d+$/.test(local) || /^[0-9a-f]{20,}$/.test(local)) {
    return false;
  }
  if (UNANSWERED_ROLES.has(local) || PLACEHOLDER_DOMAINS.has(domain)) {
    return false;
  }
  const labels = domain.split('.');
  if (labels.some((label) => label.startsWith('-') || label.endsWith('-'))) {
    return false;
  }
  const tld = labels[labels.length - 1] ?? '';
  return !ASSET_EXTENSIONS.has(tld);
}

/** Normalised address, or null when the token is not a usable e-mail. */
export function cleanEmail(raw: string): string | null {
  let value = raw.trim().replace(MAILTO_PATTERN, '');
  value = value.split('?')[0] ?? '';
  try {
    value = decodeURIComponent(value);
  } catch {
    log.debug(`Keeping undecodable address token ${value}`);
  }
  value = value
    .trim()
    .replace(/^[<("'\s]+/, '')
    .replace(/[%;,:.)}\]>"'`\s]+$/, '')
    .toLowerCase();
  return isValidEmail(value) ? value : null;
}

/** Decodes a Cloudflare `data-cfemail` token: the first byte is the XOR key. */
export function decodeCfEmail(token: string): string {
  if (!/^(?:[0-9a-f]{2}){2,}$/i.test(token)) {
    throw new ExtractionError(`Malformed cfemail token "${token}"`);
  }
  const key = parseInt(token.slice(0, 2), 16);
  let decoded = '';
  for (let offset = 2; offset < token.length; offset += 2) {
    decoded += String.fromCharCode(parseInt(token.slice(offset, offset + 2), 16) ^ key);
  }
  return decoded;
}

export function deobfuscateEmails(text: string): string {
  return text.replace(
    OBFUSCATED_PATTERN,
    (_match, user: string, host: string) => `${user}@${host.replace(OBFUSCATED_DOT, '.')}`
  );
}

/**
 * Merges per-page candidate lists. An address keeps its highest score and the
 * source URL it was first seen on; first-seen order is preserved.
 */
export function mergeCandidates(lists: ReadonlyArray<readonly EmailCandidate[]>): EmailCandidate[] {
  const merged = new Map<string, EmailCandidate>();
  for (const list of lists) {
    for (const candidate of list) {
      const existing = merged.get(candidate.address);
      if (!existing) {
        merged.set(candidate.address, { ...candidate });
      } else if (candidate.score > existing.score) {
        existing.score = candidate.score;
      }
    }
  }
  return [...merged.values()];
}

export type EmailExtractorConfig = Pick<AppConfig, 'emailWeights' | 'priorityParts' | 'emailKeywords'>;

export class EmailExtractor {
  private readonly config: EmailExtractorConfig;

  constructor(config: EmailExtractorConfig) {
    this.config = config;
  }

  /** Never throws; an unparsable page yields no candidates. */
  extract(sourceHtml: string, sourceUrl: string): EmailCandidate[] {
    try {
      return this.collect(sourceHtml, sourceUrl);
    } catch (error) {
      log.warn(`Email extraction failed on ${sourceUrl}: ${describeError(error)}`);
      return [];
    }
  }

  private collect(sourceHtml: string, sourceUrl: string): EmailCandidate[] {
    const found = new Map<string, { fromMailto: boolean }>();

    const addResult = (raw: string, fromMailto: boolean) => {
      const address = cleanEmail(raw);
      if (!address) {
        return;
      }
      const existing = found.get(address);
      if (existing) {
        existing.fromMailto ||= fromMailto;
      } else {
        found.set(address, { fromMailto });
      }
    };

    const scan = (text: string) => {
      for (const match of text.matchAll(EMAIL_PATTERN)) {
        addResult(match[0], false);
      }
    };

    const text = visibleText(sourceHtml);
    scan(deobfuscateEmails(text));

    const $ = load(sourceHtml);
    $('a[href]').each((_, element) => {
      const href = $(element).attr('href') ?? '';
      if (MAILTO_PATTERN.test(href)) {
        addResult(href, true);
        return;
      }
      const protectedToken = CF_PROTECTION_PATTERN.exec(href)?.[1];
      if (protectedToken) {
        this.addCfEmail(protectedToken, addResult);
      }
    });

    $('[data-cfemail]').each((_, element) => {
      const token = $(element).attr('data-cfemail');
      if (token) {
        this.addCfEmail(token, addResult);
      }
    });

    $<Element, '*'>('*').each((_, element) => {
      for (const [name, value] of Object.entries(element.attribs)) {
        if (name === 'href' || name === 'data-cfemail' || !value) continue;
        scan(value);
      }
    });

    for (const match of sourceHtml.matchAll(BASE64_PATTERN)) {
      const decoded = Buffer.from(match[1] ?? '', 'base64').toString('utf8');
      scan(decoded);
    }

    for (const match of sourceHtml.matchAll(CHAR_CODES_PATTERN)) {
      const codes = (match[1] ?? '')
        .split(',')
        .map((code) => Number.parseInt(code.trim(), 10))
        .filter((code) => Number.isInteger(code) && code > 0 && code < 0x10000);
      scan(String.fromCharCode(...codes));
    }

    const lowerText = text.toLowerCase();
    const onPriorityPage = priorityBand(sourceUrl, this.config.priorityParts) < this.config.priorityParts.length;
    const pageHost = normaliseDomain(sourceUrl);

    const candidates: EmailCandidate[] = [];
    for (const [address, { fromMailto }] of found) {
      const signals: EmailSignals = {
        fromMailto,
        onPriorityPage,
        nearKeyword: this.isNearKeyword(lowerText, address),
        sameDomain: isSameDomain(address, pageHost)
      };
      candidates.push({ address, sourceUrl, score: scoreEmail(signals, this.config.emailWeights) });
    }
    if (candidates.length > 0) {
      log.debug(`${candidates.length} e-mail(s) on ${sourceUrl}`);
    }
    return candidates.sort((a, b) => b.score - a.score);
  }

  private addCfEmail(token: string, addResult: (raw: string, fromMailto: boolean) => void): void {
    try {
      addResult(decodeCfEmail(token), false);
    } catch (error) {
      log.debug(describeError(error));
    }
  }

  private isNearKeyword(lowerText: string, address: string): boolean {
    const keywords = this.config.emailKeywords;
    let index = lowerText.indexOf(address);
    while (index !== -1) {
      const before = lowerText.slice(Math.max(0, index - KEYWORD_WINDOW), index);
      const after = lowerText.slice(index + address.length, index + address.length + KEYWORD_WINDOW);
      if (keywords.some((keyword) => before.includes(keyword) || after.includes(keyword))) {
        return true;
      }
      index = lowerText.indexOf(address, index + address.length);
    }
    return false;
  }
}

function isSameDomain(address: string, pageHost: string): boolean {
  if (!pageHost) {
    return false;
  }
  const domain = address.slice(address.lastIndexOf('@') + 1);
  return domain === pageHost || domain.endsWith(`.${pageHost}`) || pageHost.endsWith(`.${domain}`);
}
