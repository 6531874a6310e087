import { parse as parseDomain } from 'tldts';

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Lowercase host without `www.`. Accepts full URLs as well as bare hosts such as
 * `Acme.example/contact`.
 */
export function normaliseDomain(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    return '';
  }
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    return new URL(withScheme).hostname.toLowerCase().replace(/^www\./, '').replace(/\.$/, '');
  } catch {
    return '';
  }
}

export function isValidUrl(url: string, maxLength = 2_000): boolean {
  if (!url || url.length > maxLength) {
    return false;
  }
  try {
    const parsed = new URL(url);
    return ALLOWED_PROTOCOLS.has(parsed.protocol) && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

/** Scheme/host lowercased, `www.` dropped, query/hash removed, trailing slash trimmed. */
export function canonicaliseUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const host = parsed.hostname.toLowerCase().replace(/^www\./, '');
    const path = parsed.pathname.replace(/\/+$/, '') || '/';
    return `${parsed.protocol}//${host}${parsed.port ? `:${parsed.port}` : ''}${path}`;
  } catch {
    return url;
  }
}

export function isBlockedDomain(domain: string, blocked: ReadonlySet<string>): boolean {
  const host = normaliseDomain(domain);
  if (!host) {
    return false;
  }
  if (blocked.has(host)) {
    return true;
  }
  for (const entry of blocked) {
    if (host.endsWith(`.${entry}`)) {
      return true;
    }
  }
  return false;
}

/** True when `url` lives on `domain` or one of its subdomains. */
export function isOnDomain(url: string, domain: string): boolean {
  const host = normaliseDomain(url);
  const target = normaliseDomain(domain);
  return host.length > 0 && (host === target || host.endsWith(`.${target}`));
}

export interface DomainParts {
  host: string;
  label: string;
  subdomain: string;
}

/** Splits a host into registrable label (`acme` in `shop.acme.co.uk`) and subdomain. */
export function splitDomain(value: string): DomainParts {
  const host = normaliseDomain(value);
  const parsed = parseDomain(host);
  return {
    host,
    label: parsed.domainWithoutSuffix ?? '',
    subdomain: parsed.subdomain ?? ''
  };
}

export function pathDepth(url: string): number {
  try {
    return new URL(url).pathname.split('/').filter((segment) => segment.length > 0).length;
  } catch {
    return 0;
  }
}
