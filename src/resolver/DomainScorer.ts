import type { SearchHit } from '../types.js';
import { isBlockedDomain, normaliseDomain, splitDomain } from '../utils/domain.js';

export const PENALTY_HOSTS: readonly string[] = [
  'linkedin.com',
  'facebook.com',
  'instagram.com',
  'twitter.com',
  'x.com',
  'youtube.com',
  'medium.com',
  'github.com',
  'glassdoor.com',
  'indeed.com',
  'crunchbase.com',
  'bloomberg.com',
  'wikipedia.org'
];

export const SOCIAL_PENALTY = 25;
export const NEUTRAL_SCORE = 50;
const MIN_COMPANY_LENGTH = 3;

const LEGAL_SUFFIXES = [
  ' incorporated',
  ' corporation',
  ' limited',
  ' inc.',
  ' inc',
  ' llc',
  ' ltd.',
  ' ltd',
  ' gmbh',
  ' corp.',
  ' corp',
  ' co.',
  ' co',
  ' ag',
  ' sa',
  ' bv',
  ' plc'
];

export function cleanCompanyName(company: string): string {
  let cleaned = company.trim().toLowerCase();
  for (const suffix of LEGAL_SUFFIXES) {
    if (cleaned.endsWith(suffix)) {
      cleaned = cleaned.slice(0, -suffix.length);
      break;
    }
  }
  return cleaned.replace(/[^a-z0-9]/g, '');
}

function lcsLength(a: string, b: string): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
}

/** Indel similarity in `[0, 100]`. */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 0;
  }
  return (200 * lcsLength(a, b)) / total;
}

/**
 * Best `ratio` between the shorter string and every same-length window of the
 * longer one, rounded to an integer.
 */
export function partialRatio(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start += 1) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) {
      best = score;
      if (best === 100) break;
    }
  }
  return Math.round(best);
}

export function scoreDomain(company: string, url: string): number {
  const base = cleanCompanyName(company);
  const host = normaliseDomain(url);
  if (!base || !host) {
    return 0;
  }
  if (base.length < MIN_COMPANY_LENGTH) {
    return NEUTRAL_SCORE;
  }

  const penalty = PENALTY_HOSTS.some((penalised) => host === penalised || host.endsWith(`.${penalised}`))
    ? SOCIAL_PENALTY
    : 0;
  const { label, subdomain } = splitDomain(host);
  const similarity = Math.max(partialRatio(base, label), partialRatio(base, subdomain));
  return Math.max(0, similarity - penalty);
}

export interface ScoredDomain {
  host: string;
  url: string;
  score: number;
}

/**
 * Highest scoring host among the hits; blocklisted hosts never compete. The
 * first hit wins a tie, so search rank breaks ties.
 */
export function findBestDomain(
  company: string,
  hits: readonly SearchHit[],
  blocked: ReadonlySet<string>
): ScoredDomain | null {
  let best: ScoredDomain | null = null;
  for (const hit of hits) {
    const host = normaliseDomain(hit.url);
    if (!host || isBlockedDomain(host, blocked)) {
      continue;
    }
    const score = scoreDomain(company, hit.url);
    if (!best || score > best.score) {
      best = { host, url: hit.url, score };
    }
  }
  return best;
}
