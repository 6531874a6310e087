import fetch from 'node-fetch';

import { RenderError } from '../errors.js';
import type { PageRenderer } from '../types.js';
import { createLogger } from '../utils/logger.js';

import type { FetchImpl } from './HttpFetcher.js';

const log = createLogger('render');

export interface RenderServiceClientOptions {
  /** Endpoint that accepts `POST { url }` and answers with the rendered HTML. */
  endpoint: string;
  timeoutMs?: number;
  fetchImpl?: FetchImpl;
}

/**
 * Client for an external headless-browser rendering service, used when the
 * static HTML of a page carries no email address.
 */
export class RenderServiceClient implements PageRenderer {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchImpl;

  constructor(options: RenderServiceClientOptions) {
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs ?? 45_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async render(url: string): Promise<string> {
    log.debug(`Rendering ${url} via ${this.endpoint}`);
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'text/html' },
        body: JSON.stringify({ url, waitUntil: 'networkidle' }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      if (!response.ok) {
        throw new RenderError(url, `Render service answered ${response.status} ${response.statusText}`);
      }
      return await response.text();
    } catch (error) {
      if (error instanceof RenderError) {
        throw error;
      }
      throw new RenderError(url, `Render request failed: ${String(error)}`, { cause: error });
    }
  }
}
