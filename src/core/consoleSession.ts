/**
 * consoleSession.ts: The transport every component shares.
 *
 * A ConsoleSession owns one cookie jar and one request queue.  It exposes the
 * three request shapes the web console needs:
 *
 *   get(endpoint)                    plain page / JSON fetch
 *   post(endpoint, fields)           url-encoded form submission
 *   postMultipart(endpoint, fields)  file upload form
 *
 * Retry policy: a request that fails at the connection level (no HTTP
 * response) is attempted up to `retryAttempts` times in total, pausing
 * `retryDelayMs` between attempts; the last failure is rethrown unchanged.
 * HTTP status codes are never inspected here, since the console reports
 * application errors inside 200 pages.
 *
 * Requests of one session go through a Bottleneck queue with
 * `maxConcurrent: 1`, so they reach the server in call order.  Sessions are
 * independent: two sessions never share cookies.
 *
 * Every request takes an optional AbortSignal.  Once it fires, the in-flight
 * attempt is abandoned, no retry is made and the call rejects with the
 * signal's reason.
 */

import Bottleneck from 'bottleneck';
import { setTimeout as sleep } from 'timers/promises';
import { CookieJar } from './cookieJar';
import { getErrorMessage, isConnectionFailure } from './errors';
import { Logger } from './logger';
import type {
  ConsoleResponse,
  DriverConfig,
  FormFields,
  MultipartFields,
} from './types';
import { lightFetch, type LightFetchRequest, type RequestFunction } from '../middleware/lightFetcher';
import { buildMultipartBody, encodeForm, FORM_CONTENT_TYPE } from '../middleware/formEncoding';

const logger = new Logger('ConsoleSession');

export type SessionSettings = Pick<
  DriverConfig,
  'serverUrl' | 'requestSpacingMs' | 'requestTimeoutMs' | 'retryAttempts' | 'retryDelayMs'
>;

export interface SessionOptions {
  /** Replaces the got-scraping request function (tests use an in-process fake). */
  request?: RequestFunction;
  cookieJar?: CookieJar;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export class ConsoleSession {
  readonly cookies: CookieJar;
  private readonly settings: SessionSettings;
  private readonly request: RequestFunction;
  private readonly queue: Bottleneck;

  constructor(settings: SessionSettings, options: SessionOptions = {}) {
    this.settings = {
      ...settings,
      serverUrl: settings.serverUrl.replace(/\/+$/, ''),
      retryAttempts: Math.max(1, settings.retryAttempts),
    };
    this.request = options.request ?? lightFetch;
    this.cookies = options.cookieJar ?? new CookieJar();
    this.queue = new Bottleneck({
      maxConcurrent: 1,
      minTime: settings.requestSpacingMs,
    });
  }

  /** Absolute URL for an endpoint such as "/repo/?mod=auth". */
  urlFor(endpoint: string): string {
    return this.settings.serverUrl + endpoint;
  }

  // ── Public API ─────────────────────────────────────────

  async get(endpoint: string, options: RequestOptions = {}): Promise<ConsoleResponse> {
    const url = this.urlFor(endpoint);
    return this.send({ url, method: 'GET', signal: options.signal });
  }

  async post(
    endpoint: string,
    fields: FormFields,
    options: RequestOptions = {},
  ): Promise<ConsoleResponse> {
    const url = this.urlFor(endpoint);
    return this.send({
      url,
      method: 'POST',
      headers: { 'Content-Type': FORM_CONTENT_TYPE },
      body: encodeForm(fields),
      signal: options.signal,
    });
  }

  /**
   * Submit a multipart form.  The upload handler only accepts the post when it
   * looks browser-originated: no-cache directives and a same-URL referer.
   * The multipart Content-Type (with boundary) is set by the HTTP client.
   */
  async postMultipart(
    endpoint: string,
    fields: MultipartFields,
    options: RequestOptions = {},
  ): Promise<ConsoleResponse> {
    const url = this.urlFor(endpoint);
    return this.send({
      url,
      method: 'POST',
      headers: {
        Connection: 'keep-alive',
        Pragma: 'no-cache',
        'Cache-Control': 'no-cache',
        'Upgrade-Insecure-Requests': '1',
        Referer: url,
      },
      body: buildMultipartBody(fields),
      signal: options.signal,
    });
  }

  /** Wait for queued requests to drain and release the queue. */
  async close(): Promise<void> {
    await this.queue.stop({ dropWaitingJobs: false });
  }

  // ── Internals ──────────────────────────────────────────

  private send(
    request: Omit<LightFetchRequest, 'cookieJar' | 'timeout'>,
  ): Promise<ConsoleResponse> {
    return this.queue.schedule(() =>
      this.withRetry({
        ...request,
        cookieJar: this.cookies,
        timeout: this.settings.requestTimeoutMs,
      }),
    );
  }

  private async withRetry(request: LightFetchRequest): Promise<ConsoleResponse> {
    const { retryAttempts, retryDelayMs } = this.settings;
    const { signal } = request;
    logger.debug(`${request.method}: ${request.url}`);

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();
      try {
        return await untilAborted(this.request(request), signal);
      } catch (err) {
        if (signal?.aborted) throw err;
        if (!isConnectionFailure(err) || attempt >= retryAttempts) {
          if (attempt > 1) {
            logger.warn(
              `${request.method} ${request.url} failed after ${attempt} attempt(s): ` +
                getErrorMessage(err),
            );
          }
          throw err;
        }
        logger.debug(`attempt ${attempt}/${retryAttempts} failed: ${getErrorMessage(err)}`);
        await sleep(retryDelayMs, undefined, { signal });
      }
    }
  }
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * fires.  An injected request function may ignore the signal.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
