import type { CompanyStatus } from '../types.js';

export type RunCounter =
  | 'leads'
  | 'domain'
  | 'sitemap'
  | 'skipped_domain'
  | 'google_error'
  | 'search_requests'
  | 'http_requests'
  | 'http_errors'
  | 'pages_fetched'
  | 'render_fallbacks'
  | 'render_errors';

export interface RunStatsSnapshot {
  statuses: Record<CompanyStatus, number>;
  counters: Record<RunCounter, number>;
  uniqueEmails: number;
  elapsedMs: number;
}

/**
 * Run-wide counters. Workers only ever call `increment`, `recordStatus` and
 * `recordEmails`; the totals are read once through `snapshot`.
 */
export class RunStats {
  private readonly statuses: Record<CompanyStatus, number> = {
    with_email: 0,
    without_email: 0,
    no_google: 0,
    domain_unclear: 0,
    processing_error: 0
  };
  private readonly counters: Record<RunCounter, number> = {
    leads: 0,
    domain: 0,
    sitemap: 0,
    skipped_domain: 0,
    google_error: 0,
    search_requests: 0,
    http_requests: 0,
    http_errors: 0,
    pages_fetched: 0,
    render_fallbacks: 0,
    render_errors: 0
  };
  private readonly emails = new Set<string>();
  private readonly startedAt: number;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
  }

  increment(counter: RunCounter, by = 1): void {
    this.counters[counter] += by;
  }

  recordStatus(status: CompanyStatus): void {
    this.statuses[status] += 1;
  }

  recordEmails(addresses: Iterable<string>): void {
    for (const address of addresses) {
      this.emails.add(address);
    }
  }

  snapshot(): RunStatsSnapshot {
    return {
      statuses: { ...this.statuses },
      counters: { ...this.counters },
      uniqueEmails: this.emails.size,
      elapsedMs: this.now() - this.startedAt
    };
  }
}

function row(label: string, value: string): string {
  return `| ${label.padEnd(16)}: ${value}`.padEnd(51) + '|';
}

export function formatSummary(snapshot: RunStatsSnapshot): string {
  const { statuses, counters } = snapshot;
  const border = `+${'-'.repeat(50)}+`;
  return [
    border,
    '| RUN SUMMARY'.padEnd(51) + '|',
    border,
    row('Leads', String(counters.leads)),
    row('Domain found', String(counters.domain)),
    row('No Google hits', String(statuses.no_google)),
    row('Google errors', String(counters.google_error)),
    row('Domain unclear', String(statuses.domain_unclear)),
    row('Duplicate domain', String(counters.skipped_domain)),
    row('Sitemap used', String(counters.sitemap)),
    row('With e-mail', String(statuses.with_email)),
    row('Without e-mail', String(statuses.without_email)),
    row('Errors', String(statuses.processing_error)),
    row('HTTP requests', `${counters.http_requests} (${counters.http_errors} failed)`),
    row('Pages fetched', String(counters.pages_fetched)),
    row('JS renders', String(counters.render_fallbacks)),
    row('Unique e-mails', String(snapshot.uniqueEmails)),
    row('Runtime', `${(snapshot.elapsedMs / 1000).toFixed(1)} s`),
    border
  ].join('\n');
}
