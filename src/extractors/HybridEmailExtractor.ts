import { describeError } from '../errors.js';
import type { RunStats } from '../pipeline/RunStats.js';
import type { EmailCandidate, PageRenderer } from '../types.js';
import { CacheManager } from '../utils/CacheManager.js';
import { createLogger } from '../utils/logger.js';

import type { EmailExtractor } from './EmailExtractor.js';
import { visibleText } from './PageInfoExtractor.js';

const log = createLogger('hybrid');

export interface HybridExtraction {
  emails: EmailCandidate[];
  rendered: boolean;
}

export interface HybridEmailExtractorOptions {
  renderer?: PageRenderer;
  stats?: RunStats;
  renderCache?: CacheManager<string>;
}

/**
 * Static extraction with a rendering fallback for pages whose addresses only
 * appear after scripts run.
 */
export class HybridEmailExtractor {
  private readonly extractor: EmailExtractor;
  private readonly renderer: PageRenderer | undefined;
  private readonly stats: RunStats | undefined;
  private readonly renderCache: CacheManager<string>;

  constructor(extractor: EmailExtractor, options: HybridEmailExtractorOptions = {}) {
    this.extractor = extractor;
    this.renderer = options.renderer;
    this.stats = options.stats;
    this.renderCache = options.renderCache ?? new CacheManager<string>({ maxSize: 256 });
  }

  async extractPage(url: string, html: string): Promise<HybridExtraction> {
    const emails = this.extractor.extract(html, url);
    if (emails.length > 0 || !this.renderer || visibleText(html).length === 0) {
      return { emails, rendered: false };
    }

    let rendered = this.renderCache.get(url);
    if (rendered === undefined) {
      log.info(`JS fallback for ${url}`);
      this.stats?.increment('render_fallbacks');
      try {
        rendered = await this.renderer.render(url);
      } catch (error) {
        this.stats?.increment('render_errors');
        log.warn(`Render fallback failed for ${url}: ${describeError(error)}`);
        return { emails: [], rendered: false };
      }
      this.renderCache.set(url, rendered);
    }

    const renderedEmails = this.extractor.extract(rendered, url);
    log.debug(`Rendered pass found ${renderedEmails.length} e-mail(s) on ${url}`);
    return { emails: renderedEmails, rendered: true };
  }
}
