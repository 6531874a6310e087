import http from 'node:http';
import https from 'node:https';

import fetch, { FetchError as NodeFetchError, type RequestInit, type Response } from 'node-fetch';
import { HttpsProxyAgent } from 'https-proxy-agent';

import type { AppConfig } from '../config.js';
import { FetchError } from '../errors.js';
import type { FetchOptions, FetchResponse, Fetcher } from '../types.js';
import { runWithRetry } from '../utils/backoff.js';
import { isValidUrl } from '../utils/domain.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

const MAX_BODY_BYTES = 10 * 1024 * 1024;
const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

export type HttpFetcherConfig = Pick<
  AppConfig,
  'requestTimeoutMs' | 'maxRedirects' | 'maxUrlLength' | 'insecureSsl' | 'proxies' | 'userAgents' | 'httpRetryCount'
>;

/** The slice of node-fetch's `fetch` the clients call; tests pass their own. */
export type FetchImpl = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpFetcherDependencies {
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<unknown>;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof FetchError) {
    return error.status === undefined || RETRY_STATUSES.has(error.status);
  }
  return false;
}

function headersToRecord(response: Response): Record<string, string> {
  const record: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
}

export class HttpFetcher implements Fetcher {
  private readonly config: HttpFetcherConfig;
  private readonly fetchImpl: FetchImpl;
  private readonly sleep: ((ms: number) => Promise<unknown>) | undefined;
  private readonly httpsAgent: https.Agent;
  private readonly httpAgent: http.Agent;
  private readonly proxyAgents = new Map<string, HttpsProxyAgent<string>>();
  private proxyCursor = 0;
  private userAgentCursor = 0;

  constructor(config: HttpFetcherConfig, dependencies: HttpFetcherDependencies = {}) {
    this.config = config;
    this.fetchImpl = dependencies.fetchImpl ?? fetch;
    this.sleep = dependencies.sleep;
    this.httpsAgent = new https.Agent({
      keepAlive: true,
      maxSockets: 50,
      maxFreeSockets: 10,
      timeout: config.requestTimeoutMs,
      rejectUnauthorized: !config.insecureSsl
    });
    this.httpAgent = new http.Agent({
      keepAlive: true,
      maxSockets: 50,
      maxFreeSockets: 10,
      timeout: config.requestTimeoutMs
    });
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResponse> {
    if (!isValidUrl(url, this.config.maxUrlLength)) {
      throw new FetchError(url, `Refusing invalid or overlong URL (${url.length} chars)`);
    }

    const result = await runWithRetry(
      () => this.attempt(url, options),
      { maxAttempts: this.config.httpRetryCount, baseDelayMs: 500, maxDelayMs: 8_000 },
      {
        isRetryable,
        onRetry: (attempt, delayMs, error) =>
          log.debug(`Retrying ${url} in ${delayMs}ms after attempt ${attempt + 1}: ${String(error)}`),
        ...(this.sleep ? { sleep: this.sleep } : {})
      }
    );

    if (result.phase === 'succeeded') {
      return result.value;
    }
    const failure = result.lastError;
    if (failure instanceof FetchError && failure.status === undefined && this.shouldTryWww(url)) {
      const alternate = new URL(url);
      alternate.hostname = `www.${alternate.hostname}`;
      log.debug(`Retrying ${url} with www prefix`);
      return this.attempt(alternate.toString(), options);
    }
    throw failure instanceof FetchError ? failure : new FetchError(url, String(failure), { cause: failure });
  }

  private shouldTryWww(url: string): boolean {
    const { hostname } = new URL(url);
    return !hostname.startsWith('www.') && hostname.split('.').length === 2;
  }

  private async attempt(url: string, options: FetchOptions): Promise<FetchResponse> {
    const timeoutMs = options.timeoutMs ?? this.config.requestTimeoutMs;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const proxy = options.proxy ?? this.nextProxy();

    const requestOptions: RequestInit = {
      method: options.method ?? 'GET',
      headers: {
        'User-Agent': this.nextUserAgent(),
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        'Accept-Encoding': 'gzip, deflate, br'
      },
      signal: controller.signal,
      redirect: 'follow',
      follow: options.maxRedirects ?? this.config.maxRedirects,
      size: MAX_BODY_BYTES,
      // Per hop, so a redirect to the other scheme gets a matching agent.
      agent: (parsed: URL) => this.agentFor(parsed.protocol, proxy)
    };

    try {
      const response = await this.fetchImpl(url, requestOptions);
      if (!response.ok) {
        throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`, { status: response.status });
      }
      const bytes = Buffer.from(await response.arrayBuffer());
      return {
        url,
        finalUrl: response.url || url,
        status: response.status,
        headers: headersToRecord(response),
        body: bytes.toString('utf8'),
        bytes
      };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      const reason =
        error instanceof Error && error.name === 'AbortError'
          ? `Timed out after ${timeoutMs}ms`
          : error instanceof NodeFetchError
            ? `${error.type}: ${error.message}`
            : String(error);
      throw new FetchError(url, reason, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  private agentFor(protocol: string, proxyUrl: string | undefined): http.Agent {
    if (proxyUrl) {
      let agent = this.proxyAgents.get(proxyUrl);
      if (!agent) {
        agent = new HttpsProxyAgent(proxyUrl, { keepAlive: true });
        this.proxyAgents.set(proxyUrl, agent);
      }
      return agent;
    }
    return protocol === 'https:' ? this.httpsAgent : this.httpAgent;
  }

  private nextProxy(): string | undefined {
    if (this.config.proxies.length === 0) {
      return undefined;
    }
    const proxy = this.config.proxies[this.proxyCursor % this.config.proxies.length];
    this.proxyCursor += 1;
    return proxy;
  }

  private nextUserAgent(): string {
    const agents = this.config.userAgents;
    const agent = agents[this.userAgentCursor % agents.length];
    this.userAgentCursor += 1;
    return agent;
  }

  destroy(): void {
    this.httpsAgent.destroy();
    this.httpAgent.destroy();
    for (const agent of this.proxyAgents.values()) {
      agent.destroy();
    }
  }
}
