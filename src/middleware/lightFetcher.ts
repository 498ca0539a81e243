/**
 * lightFetcher.ts: One HTTP exchange with the console, via got-scraping.
 *
 * got-scraping sends a browser-grade header set (Accept, Accept-Language,
 * sec-ch-ua…) which the console's form handlers expect from a real browser.
 * This layer performs exactly one exchange:
 *   • got's own retries are off; ConsoleSession owns the retry policy.
 *   • HTTP error statuses resolve normally; callers interpret them.
 *   • Cookies flow through the session's CookieJar, redirects included.
 *
 * got-scraping is imported on first use, so sessions built with an injected
 * request function never load it.
 */

import type { CookieJar } from '../core/cookieJar';
import { Logger } from '../core/logger';

const logger = new Logger('LightFetcher');

let gotScrapingModule: typeof import('got-scraping') | null = null;

async function getGotScraping(): Promise<typeof import('got-scraping')> {
  if (!gotScrapingModule) {
    gotScrapingModule = await import('got-scraping');
  }
  return gotScrapingModule;
}

export interface LightFetchRequest {
  url: string;
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string | FormData;
  cookieJar?: CookieJar;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  signal?: AbortSignal;
}

export interface LightFetchResult {
  body: string;
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
}

/** Signature shared by `lightFetch` and the in-process fakes used in tests. */
export type RequestFunction = (request: LightFetchRequest) => Promise<LightFetchResult>;

/**
 * Perform a single request.  Network-level failures reject with got's
 * RequestError (its `code` carries ECONNREFUSED, ETIMEDOUT, …).
 */
export async function lightFetch(request: LightFetchRequest): Promise<LightFetchResult> {
  const { gotScraping } = await getGotScraping();

  const response = await gotScraping({
    url: request.url,
    method: request.method,
    headers: request.headers,
    body: request.body,
    cookieJar: request.cookieJar,
    timeout: { request: request.timeout ?? 30_000 },
    signal: request.signal,
    retry: { limit: 0 },
    throwHttpErrors: false,
    followRedirect: true,
    responseType: 'text',
    headerGeneratorOptions: {
      browsers: [{ name: 'chrome', minVersion: 120 }],
      devices: ['desktop'],
      operatingSystems: ['linux', 'windows'],
    },
  });

  const statusCode = response.statusCode ?? 0;
  logger.debug(`${request.method} ${request.url} → HTTP ${statusCode}`);

  return {
    body: String(response.body),
    statusCode,
    headers: { ...response.headers },
  };
}
